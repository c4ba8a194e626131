import { KeyType, KeyTypeSchema, checkEnum } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { JsonObject, StatusResponse } from "./shared";

export type CreateEncryptedKeyParams = OrgScoped & {
  name: string;
  keyType: KeyType;
  /** The secret itself. Stored encrypted by the provider and never returned. */
  value: string;
  description?: string;
  metadata?: JsonObject;
};

export type CreateEncryptedKeyResponse = StatusResponse & {
  key_id?: string;
};

export type KeyIdParams = OrgScoped & {
  keyId: string;
};

export const createEncryptedKey = defineOperation<CreateEncryptedKeyParams, CreateEncryptedKeyResponse>()({
  name: "createEncryptedKey",
  method: "POST",
  endpoint: "encryptedKeys",
  orgHeader: "encrypted_key",
  required: { name: "name", keyType: "key_type", value: "value" },
  prepare(p) {
    checkEnum(KeyTypeSchema, p.keyType, "key_type");
    return p;
  },
  body: (p) => ({
    name: p.name,
    type: p.keyType,
    value: p.value,
    description: p.description || undefined,
    metadata: p.metadata
  })
});

export const deleteEncryptedKey = defineOperation<KeyIdParams, StatusResponse>()({
  name: "deleteEncryptedKey",
  method: "DELETE",
  endpoint: "deleteEncryptedKey",
  orgHeader: "encrypted_key",
  required: { keyId: "key_id" },
  path: { key_id: "keyId" }
});
