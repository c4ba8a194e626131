import { MissingOneOfError } from "../../domain/errors/ValidationError";
import { isBlank, checkRange } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { JsonObject, StatusResponse } from "./shared";

/** One step of a conversation flow. `data` carries prompts, webhooks and conditions. */
export type PathwayNode = {
  id: string;
  type?: string;
  data?: JsonObject;
  [key: string]: unknown;
};

export type PathwayEdge = {
  id?: string;
  source: string;
  target: string;
  label?: string;
  [key: string]: unknown;
};

export type Pathway = {
  pathway_id?: string;
  name?: string;
  description?: string | null;
  version?: number | string;
  status?: string;
  nodes?: PathwayNode[];
  edges?: PathwayEdge[];
  metadata?: JsonObject;
  created_at?: string;
  updated_at?: string;
};

export type CreatePathwayParams = OrgScoped & {
  name: string;
  nodes: PathwayNode[];
  edges: PathwayEdge[];
  description?: string;
  metadata?: JsonObject;
};

export type UpdatePathwayParams = OrgScoped & {
  pathwayId: string;
  name?: string;
  nodes?: PathwayNode[];
  edges?: PathwayEdge[];
  description?: string;
  metadata?: JsonObject;
};

export type PathwayIdParams = OrgScoped & {
  pathwayId: string;
};

export type GetAllPathwaysParams = OrgScoped & {
  limit?: number;
  offset?: number;
};

export type MovePathwayParams = OrgScoped & {
  pathwayId: string;
  /** Target folder; omit to move the pathway to the top level. */
  folderId?: string;
};

export type CreatePathwayResponse = StatusResponse & {
  pathway_id?: string;
};

export type GetAllPathwaysResponse = {
  pathways: Pathway[];
  total?: number;
};

const UPDATABLE = ["name", "nodes", "edges", "description", "metadata"] as const;

export const createPathway = defineOperation<CreatePathwayParams, CreatePathwayResponse>()({
  name: "createPathway",
  method: "POST",
  endpoint: "pathways",
  orgHeader: "encrypted_key",
  required: { name: "name", nodes: "nodes", edges: "edges" },
  body: (p) => ({
    name: p.name,
    nodes: p.nodes,
    edges: p.edges,
    description: p.description || undefined,
    metadata: p.metadata
  })
});

export const updatePathway = defineOperation<UpdatePathwayParams, StatusResponse>()({
  name: "updatePathway",
  method: "POST",
  endpoint: "updatePathway",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id" },
  path: { pathway_id: "pathwayId" },
  prepare(p) {
    if (UPDATABLE.every((key) => isBlank(p[key]))) {
      throw new MissingOneOfError(UPDATABLE);
    }
    return p;
  },
  body: (p) => ({
    name: p.name || undefined,
    nodes: isBlank(p.nodes) ? undefined : p.nodes,
    edges: isBlank(p.edges) ? undefined : p.edges,
    description: p.description || undefined,
    metadata: p.metadata
  })
});

export const deletePathway = defineOperation<PathwayIdParams, StatusResponse>()({
  name: "deletePathway",
  method: "DELETE",
  endpoint: "deletePathway",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id" },
  path: { pathway_id: "pathwayId" }
});

export const getPathwayInfo = defineOperation<PathwayIdParams, Pathway>()({
  name: "getPathwayInfo",
  method: "GET",
  endpoint: "pathwayDetails",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id" },
  path: { pathway_id: "pathwayId" }
});

export const getAllPathways = defineOperation<GetAllPathwaysParams, GetAllPathwaysResponse>()({
  name: "getAllPathways",
  method: "GET",
  endpoint: "pathways",
  orgHeader: "encrypted_key",
  prepare(p) {
    checkRange(p.limit, "limit");
    checkRange(p.offset, "offset");
    return p;
  },
  query: (p, d) => ({
    limit: p.limit ?? d.limit,
    offset: p.offset ?? 0
  })
});

export const movePathway = defineOperation<MovePathwayParams, StatusResponse>()({
  name: "movePathway",
  method: "POST",
  endpoint: "movePathway",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id" },
  path: { pathway_id: "pathwayId" },
  body: (p) => ({ folder_id: p.folderId || undefined })
});
