import { ClientConfig } from "../config";
import { MissingRequiredFieldError } from "../domain/errors/ValidationError";

/**
 * Every provider path, relative to `{baseUrl}/{apiVersion}`.
 * `{name}` segments are filled per call by `resolveEndpoint`.
 */
export const ENDPOINTS = {
  calls: "/calls",
  callDetails: "/calls/{call_id}",
  stopCall: "/calls/{call_id}/stop",
  stopAllCalls: "/calls/active/stop",
  analyzeCall: "/calls/{call_id}/analyze",

  batches: "/calls/batch",
  batchDetails: "/calls/batch/{batch_id}",
  batchAnalysis: "/calls/batch/{batch_id}/analysis/{analysis_id}",
  analyzeBatch: "/calls/batch/{batch_id}/analyze",
  stopBatch: "/calls/batch/{batch_id}/stop",

  pathways: "/pathways",
  pathwayDetails: "/pathways/{pathway_id}",
  updatePathway: "/pathways/{pathway_id}/update",
  deletePathway: "/pathways/{pathway_id}/delete",
  movePathway: "/pathways/{pathway_id}/move",
  pathwayVersions: "/pathways/{pathway_id}/versions",
  createPathwayVersion: "/pathways/{pathway_id}/versions/create",
  pathwayVersion: "/pathways/{pathway_id}/versions/{version_id}",
  promotePathwayVersion: "/pathways/{pathway_id}/versions/{version_id}/promote",
  deletePathwayVersion: "/pathways/{pathway_id}/versions/{version_id}/delete",

  createPathwayChat: "/pathway/chat/create",
  pathwayChat: "/pathway/chat/{chat_id}",

  folders: "/folders",
  folderPathways: "/folders/{folder_id}/pathways",
  updateFolder: "/folders/{folder_id}/update",
  deleteFolder: "/folders/{folder_id}/delete",

  purchasePhone: "/phone/purchase",
  inboundNumbers: "/phone/inbound",
  inboundDetails: "/phone/inbound/{phone_number}",
  updateInbound: "/phone/inbound/update",
  deleteInbound: "/phone/inbound/{phone_number}/delete",
  uploadInbound: "/phone/inbound/upload",
  outboundNumbers: "/phone/outbound",

  voices: "/voices",
  voiceDetails: "/voices/{voice_id}",
  generateAudio: "/voices/generate",
  publishVoice: "/voices/publish",

  customTools: "/tools",
  listCustomTools: "/tools/list",
  customToolDetails: "/tools/{tool_id}",
  updateCustomTool: "/tools/{tool_id}/update",
  deleteCustomTool: "/tools/{tool_id}/delete",

  webAgents: "/web-agents",
  updateWebAgent: "/web-agents/{agent_id}/update",
  deleteWebAgent: "/web-agents/{agent_id}/delete",
  authorizeWebAgent: "/web-agents/{agent_id}/authorize",

  encryptedKeys: "/encrypted-keys",
  deleteEncryptedKey: "/encrypted-keys/{key_id}/delete"
} as const;

export type EndpointName = keyof typeof ENDPOINTS;

type PlaceholdersOf<S extends string> = S extends `${string}{${infer P}}${infer Rest}`
  ? P | PlaceholdersOf<Rest>
  : never;

export type Placeholder<E extends EndpointName> = PlaceholdersOf<(typeof ENDPOINTS)[E]>;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function endpointBase(config: Pick<ClientConfig, "baseUrl" | "apiVersion">): string {
  return `${config.baseUrl}/${config.apiVersion}`;
}

/**
 * Fills every placeholder of the named template. A placeholder with no value
 * (or an empty one) is a missing required field.
 */
export function resolveEndpoint(
  config: Pick<ClientConfig, "baseUrl" | "apiVersion">,
  name: EndpointName,
  values: Readonly<Record<string, string | undefined>>
): string {
  const path = ENDPOINTS[name].replace(PLACEHOLDER, (_match, key: string) => {
    const value = values[key];
    if (value === undefined || value.trim() === "") {
      throw new MissingRequiredFieldError(key);
    }
    return encodeURIComponent(value);
  });
  return `${endpointBase(config)}${path}`;
}
