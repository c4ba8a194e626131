import { requireOneOf } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { Pathway } from "./pathways";
import { StatusResponse } from "./shared";

export type Folder = {
  folder_id?: string;
  id?: string;
  name: string;
  description?: string | null;
  created_at?: string;
  updated_at?: string;
};

export type CreateFolderParams = OrgScoped & {
  name: string;
  description?: string;
};

export type UpdateFolderParams = OrgScoped & {
  folderId: string;
  name?: string;
  description?: string;
};

export type FolderListParams = OrgScoped;

export type FolderIdParams = OrgScoped & {
  folderId: string;
};

export type CreateFolderResponse = StatusResponse & {
  folder_id?: string;
};

export type FolderList = {
  folders: Folder[];
};

export type FolderPathways = {
  folder_id?: string;
  pathways: Pathway[];
};

export const createFolder = defineOperation<CreateFolderParams, CreateFolderResponse>()({
  name: "createFolder",
  method: "POST",
  endpoint: "folders",
  orgHeader: "encrypted_key",
  required: { name: "name" },
  body: (p) => ({ name: p.name, description: p.description || undefined })
});

export const updateFolder = defineOperation<UpdateFolderParams, StatusResponse>()({
  name: "updateFolder",
  method: "PATCH",
  endpoint: "updateFolder",
  orgHeader: "encrypted_key",
  required: { folderId: "folder_id" },
  path: { folder_id: "folderId" },
  prepare(p) {
    requireOneOf({ name: p.name, description: p.description });
    return p;
  },
  body: (p) => ({
    name: p.name || undefined,
    description: p.description || undefined
  })
});

export const deleteFolder = defineOperation<FolderIdParams, StatusResponse>()({
  name: "deleteFolder",
  method: "DELETE",
  endpoint: "deleteFolder",
  orgHeader: "encrypted_key",
  required: { folderId: "folder_id" },
  path: { folder_id: "folderId" }
});

export const getAllFolders = defineOperation<FolderListParams, FolderList>()({
  name: "getAllFolders",
  method: "GET",
  endpoint: "folders",
  orgHeader: "encrypted_key"
});

export const getFolderPathways = defineOperation<FolderIdParams, FolderPathways>()({
  name: "getFolderPathways",
  method: "GET",
  endpoint: "folderPathways",
  orgHeader: "encrypted_key",
  required: { folderId: "folder_id" },
  path: { folder_id: "folderId" }
});
