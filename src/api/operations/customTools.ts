import { InvalidEnumError } from "../../domain/errors/ValidationError";
import { HttpMethodSchema, ToolHttpMethod, checkRange } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { JsonObject, StatusResponse } from "./shared";

export type ToolParameter = {
  name: string;
  type: string;
  description?: string;
  required?: boolean;
};

/** Tool definition as sent to the provider. */
export type CustomToolFields = {
  name: string;
  description: string;
  /** URL the agent calls when it uses the tool. */
  endpoint: string;
  /** Any case; upper-cased before it is checked and sent. */
  method: string;
  parameters: ToolParameter[];
  headers?: Record<string, string>;
  authentication?: JsonObject;
  responseMapping?: Record<string, string>;
};

export type CreateCustomToolParams = OrgScoped & CustomToolFields;

export type UpdateCustomToolParams = OrgScoped & Partial<CustomToolFields> & {
  toolId: string;
};

export type ToolIdParams = OrgScoped & {
  toolId: string;
};

export type ListCustomToolsParams = OrgScoped & {
  page?: number;
  limit?: number;
};

export type CustomTool = {
  tool_id: string;
  name: string;
  description?: string;
  endpoint?: string;
  method?: ToolHttpMethod;
  parameters?: ToolParameter[];
  headers?: Record<string, string>;
  response_mapping?: Record<string, string>;
  created_at?: string;
};

export type CreateCustomToolResponse = StatusResponse & {
  tool_id?: string;
};

export type CustomToolList = {
  tools: CustomTool[];
  total?: number;
  page?: number;
  total_pages?: number;
};

export const createCustomTool = defineOperation<CreateCustomToolParams, CreateCustomToolResponse>()({
  name: "createCustomTool",
  method: "POST",
  endpoint: "customTools",
  orgHeader: "encrypted_key",
  required: {
    name: "name",
    description: "description",
    endpoint: "endpoint",
    method: "method",
    parameters: "parameters"
  },
  prepare: (p) => ({ ...p, method: toolMethod(p.method) }),
  body: (p) => toolBody(p)
});

export const updateCustomTool = defineOperation<UpdateCustomToolParams, StatusResponse>()({
  name: "updateCustomTool",
  method: "POST",
  endpoint: "updateCustomTool",
  orgHeader: "encrypted_key",
  required: { toolId: "tool_id" },
  path: { tool_id: "toolId" },
  prepare: (p) => (p.method === undefined ? p : { ...p, method: toolMethod(p.method) }),
  body: (p) => toolBody(p)
});

export const deleteCustomTool = defineOperation<ToolIdParams, StatusResponse>()({
  name: "deleteCustomTool",
  method: "DELETE",
  endpoint: "deleteCustomTool",
  orgHeader: "encrypted_key",
  required: { toolId: "tool_id" },
  path: { tool_id: "toolId" }
});

export const getCustomToolDetails = defineOperation<ToolIdParams, CustomTool>()({
  name: "getCustomToolDetails",
  method: "GET",
  endpoint: "customToolDetails",
  orgHeader: "encrypted_key",
  required: { toolId: "tool_id" },
  path: { tool_id: "toolId" }
});

export const listCustomTools = defineOperation<ListCustomToolsParams, CustomToolList>()({
  name: "listCustomTools",
  method: "GET",
  endpoint: "listCustomTools",
  orgHeader: "encrypted_key",
  prepare(p) {
    checkRange(p.page, "page");
    checkRange(p.limit, "limit");
    return p;
  },
  query: (p) => ({ page: p.page ?? 1, limit: p.limit ?? 10 })
});

function toolMethod(method: string): ToolHttpMethod {
  const parsed = HttpMethodSchema.safeParse(method.toUpperCase());
  if (!parsed.success) {
    throw new InvalidEnumError("method", HttpMethodSchema.options);
  }
  return parsed.data;
}

function toolBody(t: Partial<CustomToolFields>): Record<string, unknown> {
  return {
    name: t.name,
    description: t.description,
    endpoint: t.endpoint,
    method: t.method,
    parameters: t.parameters,
    headers: t.headers,
    authentication: t.authentication,
    response_mapping: t.responseMapping
  };
}
