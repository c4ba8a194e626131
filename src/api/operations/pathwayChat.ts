import { OrgScoped, defineOperation } from "../defineOperation";
import { StatusResponse } from "./shared";

export type ChatMessage = {
  role: string;
  content: string;
  created_at?: string;
};

export type CreatePathwayChatParams = OrgScoped & {
  pathwayId: string;
  startNodeId?: string;
};

export type CreatePathwayChatResponse = StatusResponse & {
  chat_id?: string;
};

export type SendPathwayChatMessageParams = OrgScoped & {
  chatId: string;
  /** Omit to let the agent speak first. */
  message?: string;
};

export type PathwayChatReply = StatusResponse & {
  chat_id?: string;
  assistant_responses?: string[];
  current_node_id?: string;
  current_node_name?: string;
  variables?: Record<string, unknown>;
};

export type ChatIdParams = OrgScoped & {
  chatId: string;
};

export type PathwayChatHistory = {
  chat_id?: string;
  messages: ChatMessage[];
};

export const createPathwayChat = defineOperation<CreatePathwayChatParams, CreatePathwayChatResponse>()({
  name: "createPathwayChat",
  method: "POST",
  endpoint: "createPathwayChat",
  orgHeader: "encrypted_key",
  required: { pathwayId: "pathway_id" },
  body: (p) => ({
    pathway_id: p.pathwayId,
    start_node_id: p.startNodeId || undefined
  })
});

export const sendPathwayChatMessage = defineOperation<SendPathwayChatMessageParams, PathwayChatReply>()({
  name: "sendPathwayChatMessage",
  method: "POST",
  endpoint: "pathwayChat",
  orgHeader: "encrypted_key",
  required: { chatId: "chat_id" },
  path: { chat_id: "chatId" },
  body: (p) => ({ message: p.message || undefined })
});

export const getPathwayChatHistory = defineOperation<ChatIdParams, PathwayChatHistory>()({
  name: "getPathwayChatHistory",
  method: "GET",
  endpoint: "pathwayChat",
  orgHeader: "encrypted_key",
  required: { chatId: "chat_id" },
  path: { chat_id: "chatId" }
});
