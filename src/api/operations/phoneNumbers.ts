import { Model } from "../../config";
import { normalizePhoneNumber } from "../../domain/normalize/normalizePhoneNumber";
import { ModelSchema, checkEnum, checkPhoneNumbers, checkRange } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { StatusResponse } from "./shared";

export type PurchasePhoneNumberParams = OrgScoped & {
  /** Three-digit area code to buy in, e.g. "415". */
  areaCode?: string;
  /** ISO country code, e.g. "US". */
  country?: string;
};

export type PurchasePhoneNumberResponse = StatusResponse & {
  phone_number?: string;
};

export type NumberListParams = OrgScoped;

export type InboundNumber = {
  phone_number: string;
  created_at?: string;
  pathway_id?: string | null;
  task?: string | null;
  prompt?: string | null;
  voice?: string;
  model?: string;
  language?: string;
  temperature?: number;
  max_duration?: number;
};

export type InboundNumberList = {
  inbound_numbers: InboundNumber[];
};

export type OutboundNumber = {
  phone_number: string;
  created_at?: string;
  country?: string;
};

export type OutboundNumberList = {
  outbound_numbers: OutboundNumber[];
};

export type PhoneNumberParams = OrgScoped & {
  phoneNumber: string;
};

/** Agent settings applied to calls received on an inbound number. */
export type InboundAgentSettings = {
  pathwayId?: string;
  task?: string;
  model?: Model;
  voice?: string;
  language?: string;
  temperature?: number;
  maxDuration?: number;
};

export type UpdateInboundDetailsParams = OrgScoped & InboundAgentSettings & {
  phoneNumber: string;
};

export type UploadInboundNumbersParams = OrgScoped & InboundAgentSettings & {
  phoneNumbers: string[];
};

export type UploadInboundNumbersResponse = StatusResponse & {
  inserted?: string[];
};

export const purchasePhoneNumber = defineOperation<PurchasePhoneNumberParams, PurchasePhoneNumberResponse>()({
  name: "purchasePhoneNumber",
  method: "POST",
  endpoint: "purchasePhone",
  orgHeader: "encrypted_key",
  body: (p) => ({
    area_code: p.areaCode || undefined,
    country: p.country || undefined
  })
});

export const listInboundNumbers = defineOperation<NumberListParams, InboundNumberList>()({
  name: "listInboundNumbers",
  method: "GET",
  endpoint: "inboundNumbers",
  orgHeader: "encrypted_key"
});

export const listOutboundNumbers = defineOperation<NumberListParams, OutboundNumberList>()({
  name: "listOutboundNumbers",
  method: "GET",
  endpoint: "outboundNumbers",
  orgHeader: "encrypted_key"
});

export const getInboundDetails = defineOperation<PhoneNumberParams, InboundNumber>()({
  name: "getInboundDetails",
  method: "GET",
  endpoint: "inboundDetails",
  orgHeader: "encrypted_key",
  required: { phoneNumber: "phone_number" },
  path: { phone_number: "phoneNumber" },
  prepare: (p) => ({ ...p, phoneNumber: normalizePhoneNumber(p.phoneNumber) })
});

export const updateInboundDetails = defineOperation<UpdateInboundDetailsParams, StatusResponse>()({
  name: "updateInboundDetails",
  method: "POST",
  endpoint: "updateInbound",
  orgHeader: "encrypted_key",
  required: { phoneNumber: "phone_number" },
  prepare(p) {
    checkAgentSettings(p);
    return { ...p, phoneNumber: normalizePhoneNumber(p.phoneNumber) };
  },
  body: (p) => ({ phone_number: p.phoneNumber, ...agentSettingsBody(p) })
});

export const deleteInboundNumber = defineOperation<PhoneNumberParams, StatusResponse>()({
  name: "deleteInboundNumber",
  method: "DELETE",
  endpoint: "deleteInbound",
  orgHeader: "encrypted_key",
  required: { phoneNumber: "phone_number" },
  path: { phone_number: "phoneNumber" },
  prepare: (p) => ({ ...p, phoneNumber: normalizePhoneNumber(p.phoneNumber) })
});

export const uploadInboundNumbers = defineOperation<UploadInboundNumbersParams, UploadInboundNumbersResponse>()({
  name: "uploadInboundNumbers",
  method: "POST",
  endpoint: "uploadInbound",
  orgHeader: "encrypted_key",
  required: { phoneNumbers: "phone_numbers" },
  prepare(p) {
    const phoneNumbers = checkPhoneNumbers(p.phoneNumbers, "phone_numbers");
    checkAgentSettings(p);
    return { ...p, phoneNumbers };
  },
  body: (p) => ({ phone_numbers: p.phoneNumbers, ...agentSettingsBody(p) })
});

function checkAgentSettings(s: InboundAgentSettings): void {
  checkEnum(ModelSchema, s.model, "model");
  checkRange(s.temperature, "temperature");
}

function agentSettingsBody(s: InboundAgentSettings): Record<string, unknown> {
  return {
    pathway_id: s.pathwayId || undefined,
    task: s.task || undefined,
    model: s.model,
    voice: s.voice || undefined,
    language: s.language || undefined,
    temperature: s.temperature,
    max_duration: s.maxDuration || undefined
  };
}
