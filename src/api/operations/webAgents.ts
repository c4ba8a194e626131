import { checkRange } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { JsonObject, StatusResponse } from "./shared";

export type WebAgentFields = {
  name: string;
  description: string;
  websiteUrl: string;
  allowedDomains: string[];
  capabilities?: string[];
  authentication?: JsonObject;
  customHeaders?: Record<string, string>;
  /** Requests per minute. */
  rateLimit?: number;
  /** Pages the agent may visit per session. */
  maxPages?: number;
};

export type CreateWebAgentParams = OrgScoped & WebAgentFields;

export type UpdateWebAgentParams = OrgScoped & Partial<WebAgentFields> & {
  agentId: string;
};

export type AgentIdParams = OrgScoped & {
  agentId: string;
};

export type ListWebAgentsParams = OrgScoped & {
  limit?: number;
  offset?: number;
};

export type AuthorizeWebAgentParams = OrgScoped & {
  agentId: string;
  callId: string;
  /** What the agent is allowed to do, e.g. "navigate" or "submit_form". */
  action: string;
  targetUrl: string;
  parameters?: JsonObject;
  context?: JsonObject;
};

export type WebAgent = {
  agent_id: string;
  name: string;
  description?: string;
  website_url?: string;
  allowed_domains?: string[];
  capabilities?: string[];
  created_at?: string;
};

export type CreateWebAgentResponse = StatusResponse & {
  agent_id?: string;
};

export type WebAgentList = {
  agents: WebAgent[];
  total?: number;
};

export type AuthorizeWebAgentResponse = StatusResponse & {
  authorization_id?: string;
  expires_at?: string;
};

export const createWebAgent = defineOperation<CreateWebAgentParams, CreateWebAgentResponse>()({
  name: "createWebAgent",
  method: "POST",
  endpoint: "webAgents",
  orgHeader: "encrypted_key",
  required: {
    name: "name",
    description: "description",
    websiteUrl: "website_url",
    allowedDomains: "allowed_domains"
  },
  body: (p) => webAgentBody(p)
});

export const updateWebAgent = defineOperation<UpdateWebAgentParams, StatusResponse>()({
  name: "updateWebAgent",
  method: "POST",
  endpoint: "updateWebAgent",
  orgHeader: "encrypted_key",
  required: { agentId: "agent_id" },
  path: { agent_id: "agentId" },
  body: (p) => webAgentBody(p)
});

export const deleteWebAgent = defineOperation<AgentIdParams, StatusResponse>()({
  name: "deleteWebAgent",
  method: "DELETE",
  endpoint: "deleteWebAgent",
  orgHeader: "encrypted_key",
  required: { agentId: "agent_id" },
  path: { agent_id: "agentId" }
});

export const listWebAgents = defineOperation<ListWebAgentsParams, WebAgentList>()({
  name: "listWebAgents",
  method: "GET",
  endpoint: "webAgents",
  orgHeader: "encrypted_key",
  prepare(p) {
    checkRange(p.limit, "limit");
    checkRange(p.offset, "offset");
    return p;
  },
  query: (p, d) => ({ limit: p.limit ?? d.limit, offset: p.offset ?? 0 })
});

export const authorizeWebAgent = defineOperation<AuthorizeWebAgentParams, AuthorizeWebAgentResponse>()({
  name: "authorizeWebAgent",
  method: "POST",
  endpoint: "authorizeWebAgent",
  orgHeader: "encrypted_key",
  required: { agentId: "agent_id", callId: "call_id", action: "action", targetUrl: "target_url" },
  path: { agent_id: "agentId" },
  body: (p) => ({
    call_id: p.callId,
    action: p.action,
    target_url: p.targetUrl,
    parameters: p.parameters,
    context: p.context
  })
});

function webAgentBody(a: Partial<WebAgentFields>): Record<string, unknown> {
  return {
    name: a.name,
    description: a.description,
    website_url: a.websiteUrl,
    allowed_domains: a.allowedDomains,
    capabilities: a.capabilities,
    authentication: a.authentication,
    custom_headers: a.customHeaders,
    rate_limit: a.rateLimit,
    max_pages: a.maxPages
  };
}
