import { OrgScoped, defineOperation } from "../defineOperation";
import { Pathway, PathwayEdge, PathwayIdParams, PathwayNode } from "./pathways";
import { StatusResponse } from "./shared";

export type PathwayVersion = Pathway & {
  version_id?: string;
  version_number?: number;
  is_production?: boolean;
};

export type CreatePathwayVersionParams = OrgScoped & {
  pathwayId: string;
  name: string;
  description?: string;
  nodes?: PathwayNode[];
  edges?: PathwayEdge[];
};

export type PathwayVersionParams = OrgScoped & {
  pathwayId: string;
  versionId: string;
};

export type CreatePathwayVersionResponse = StatusResponse & {
  version_id?: string;
};

export const createPathwayVersion = defineOperation<CreatePathwayVersionParams, CreatePathwayVersionResponse>()({
  name: "createPathwayVersion",
  method: "POST",
  endpoint: "createPathwayVersion",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id", name: "name" },
  path: { pathway_id: "pathwayId" },
  body: (p) => ({
    name: p.name,
    description: p.description || undefined,
    nodes: p.nodes && p.nodes.length > 0 ? p.nodes : undefined,
    edges: p.edges && p.edges.length > 0 ? p.edges : undefined
  })
});

export const getPathwayVersions = defineOperation<PathwayIdParams, PathwayVersion[]>()({
  name: "getPathwayVersions",
  method: "GET",
  endpoint: "pathwayVersions",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id" },
  path: { pathway_id: "pathwayId" }
});

export const getPathwayVersion = defineOperation<PathwayVersionParams, PathwayVersion>()({
  name: "getPathwayVersion",
  method: "GET",
  endpoint: "pathwayVersion",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id", versionId: "version_id" },
  path: { pathway_id: "pathwayId", version_id: "versionId" }
});

export const promotePathwayVersion = defineOperation<PathwayVersionParams, StatusResponse>()({
  name: "promotePathwayVersion",
  method: "POST",
  endpoint: "promotePathwayVersion",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id", versionId: "version_id" },
  path: { pathway_id: "pathwayId", version_id: "versionId" }
});

export const deletePathwayVersion = defineOperation<PathwayVersionParams, StatusResponse>()({
  name: "deletePathwayVersion",
  method: "DELETE",
  endpoint: "deletePathwayVersion",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id", versionId: "version_id" },
  path: { pathway_id: "pathwayId", version_id: "versionId" }
});
