import { Model } from "../../config";
import {
  BackgroundTrack,
  BackgroundTrackSchema,
  ModelSchema,
  checkEnum,
  checkRange,
  requireOneOf
} from "../../domain/validation/rules";
import { normalizePhoneNumber } from "../../domain/normalize/normalizePhoneNumber";
import { Credentials, OrgScoped, defineOperation } from "../defineOperation";
import { JsonObject, StatusResponse } from "./shared";

export type PronunciationRule = {
  word: string;
  pronunciation: string;
  case_sensitive?: boolean;
  spaced?: boolean;
};

export type SendCallParams = OrgScoped & {
  phoneNumber: string;
  /** Agent instructions. Either this or `pathwayId` is required. */
  task?: string;
  pathwayId?: string;
  startNodeId?: string;
  voice?: string;
  backgroundTrack?: BackgroundTrack;
  firstSentence?: string;
  waitForGreeting?: boolean;
  blockInterruptions?: boolean;
  /** Patience before the agent yields to the caller, roughly 50–200. */
  interruptionThreshold?: number;
  model?: Model;
  temperature?: number;
  keywords?: string[];
  pronunciationGuide?: PronunciationRule[];
  transferPhoneNumber?: string;
  transferList?: Record<string, string>;
  language?: string;
  timezone?: string;
  requestData?: JsonObject;
  tools?: JsonObject[];
  dynamicData?: JsonObject[];
  startTime?: string;
  voicemailMessage?: string;
  voicemailAction?: JsonObject;
  retry?: JsonObject;
  /** Minutes. */
  maxDuration?: number;
  record?: boolean;
  fromNumber?: string;
  webhook?: string;
  webhookEvents?: string[];
  metadata?: JsonObject;
  summaryPrompt?: string;
  analysisPrompt?: string;
  analysisSchema?: JsonObject;
  answeredByEnabled?: boolean;
};

export type SendCallResponse = StatusResponse & {
  call_id?: string;
  batch_id?: string | null;
  errors?: string[];
};

export type SendCallSimpleParams = OrgScoped & {
  phoneNumber: string;
  task: string;
};

export type SendCallPathwaySimpleParams = OrgScoped & {
  phoneNumber: string;
  pathwayId: string;
};

export type StopActiveCallParams = Credentials & {
  callId: string;
};

export type ListCallsParams = OrgScoped & {
  fromNumber?: string;
  toNumber?: string;
  /** Index of the first call to return. */
  fromIndex?: number;
  toIndex?: number;
  limit?: number;
  ascending?: boolean;
  startDate?: string;
  endDate?: string;
  createdAt?: string;
  completed?: boolean;
  batchId?: string;
  answeredBy?: string;
  inbound?: boolean;
  durationGt?: number;
  durationLt?: number;
  campaignId?: string;
};

export type CallSummary = {
  call_id: string;
  created_at?: string;
  call_length?: number;
  to?: string;
  from?: string;
  completed?: boolean;
  queue_status?: string;
  error_message?: string | null;
  answered_by?: string | null;
  batch_id?: string | null;
  inbound?: boolean;
};

export type ListCallsResponse = {
  total_count?: number;
  count?: number;
  calls: CallSummary[];
};

export type GetCallDetailsParams = OrgScoped & {
  callId: string;
};

export type TranscriptLine = {
  id?: number;
  created_at?: string;
  text: string;
  user: string;
};

export type CallDetails = CallSummary & {
  status?: string;
  transcripts?: TranscriptLine[];
  concatenated_transcript?: string;
  summary?: string;
  recording_url?: string | null;
  variables?: JsonObject;
  metadata?: JsonObject;
  price?: number;
  pathway_id?: string | null;
};

export type AnalyzeCallParams = Credentials & {
  callId: string;
  /** What the analysis should establish about the call. */
  goal: string;
  /** Pairs of `[question, expected answer type]`. */
  questions: string[][];
};

export type AnalyzeCallResponse = StatusResponse & {
  answers?: unknown[];
  credits_used?: number;
};

export const sendCall = defineOperation<SendCallParams, SendCallResponse>()({
  name: "sendCall",
  method: "POST",
  endpoint: "calls",
  orgHeader: "organization",
  required: { phoneNumber: "phone_number" },
  prepare(p) {
    requireOneOf({ task: p.task, pathway_id: p.pathwayId });
    checkEnum(ModelSchema, p.model, "model");
    checkEnum(BackgroundTrackSchema, p.backgroundTrack, "background_track");
    checkRange(p.temperature, "temperature");
    return { ...p, phoneNumber: normalizePhoneNumber(p.phoneNumber) };
  },
  body: (p, d) => ({
    phone_number: p.phoneNumber,
    task: p.task,
    pathway_id: p.pathwayId,
    start_node_id: p.startNodeId,
    voice: p.voice ?? d.voice,
    background_track: p.backgroundTrack,
    first_sentence: p.firstSentence,
    wait_for_greeting: p.waitForGreeting ?? false,
    block_interruptions: p.blockInterruptions ?? false,
    interruption_threshold: p.interruptionThreshold ?? d.interruptionThreshold,
    model: p.model ?? d.model,
    temperature: p.temperature ?? d.temperature,
    keywords: p.keywords,
    pronunciation_guide: p.pronunciationGuide,
    transfer_phone_number: p.transferPhoneNumber,
    transfer_list: p.transferList,
    language: p.language ?? d.language,
    timezone: p.timezone,
    request_data: p.requestData,
    tools: p.tools,
    dynamic_data: p.dynamicData,
    start_time: p.startTime,
    voicemail_message: p.voicemailMessage,
    voicemail_action: p.voicemailAction,
    retry: p.retry,
    max_duration: p.maxDuration ?? d.maxDuration,
    record: p.record ?? false,
    from: p.fromNumber,
    webhook: p.webhook,
    webhook_events: p.webhookEvents,
    metadata: p.metadata,
    summary_prompt: p.summaryPrompt,
    analysis_prompt: p.analysisPrompt,
    analysis_schema: p.analysisSchema,
    answered_by_enabled: p.answeredByEnabled ?? false
  })
});

export const sendCallSimple = defineOperation<SendCallSimpleParams, SendCallResponse>()({
  name: "sendCallSimple",
  method: "POST",
  endpoint: "calls",
  orgHeader: "organization",
  required: { phoneNumber: "phone_number", task: "task" },
  prepare: (p) => ({ ...p, phoneNumber: normalizePhoneNumber(p.phoneNumber) }),
  body: (p) => ({ phone_number: p.phoneNumber, task: p.task })
});

export const sendCallPathwaySimple = defineOperation<SendCallPathwaySimpleParams, SendCallResponse>()({
  name: "sendCallPathwaySimple",
  method: "POST",
  endpoint: "calls",
  orgHeader: "organization",
  required: { phoneNumber: "phone_number", pathwayId: "pathway_id" },
  prepare: (p) => ({ ...p, phoneNumber: normalizePhoneNumber(p.phoneNumber) }),
  body: (p) => ({ phone_number: p.phoneNumber, pathway_id: p.pathwayId })
});

export const stopActiveCall = defineOperation<StopActiveCallParams, StatusResponse>()({
  name: "stopActiveCall",
  method: "POST",
  endpoint: "stopCall",
  orgHeader: null,
  required: { callId: "call_id" },
  path: { call_id: "callId" }
});

export const stopAllActiveCalls = defineOperation<Credentials, StatusResponse & { num_calls?: number }>()({
  name: "stopAllActiveCalls",
  method: "POST",
  endpoint: "stopAllCalls",
  orgHeader: null
});

export const listCalls = defineOperation<ListCallsParams, ListCallsResponse>()({
  name: "listCalls",
  method: "GET",
  endpoint: "calls",
  orgHeader: "encrypted_key",
  prepare(p) {
    checkRange(p.limit, "limit");
    return p;
  },
  query: (p, d) => ({
    limit: p.limit ?? d.limit,
    ascending: p.ascending ?? false,
    from_number: p.fromNumber,
    to_number: p.toNumber,
    from: p.fromIndex,
    to: p.toIndex,
    start_date: p.startDate,
    end_date: p.endDate,
    created_at: p.createdAt,
    completed: p.completed,
    batch_id: p.batchId,
    answered_by: p.answeredBy,
    inbound: p.inbound,
    duration_gt: p.durationGt,
    duration_lt: p.durationLt,
    campaign_id: p.campaignId
  })
});

export const getCallDetails = defineOperation<GetCallDetailsParams, CallDetails>()({
  name: "getCallDetails",
  method: "GET",
  endpoint: "callDetails",
  orgHeader: "encrypted_key",
  required: { callId: "call_id" },
  path: { call_id: "callId" }
});

export const analyzeCall = defineOperation<AnalyzeCallParams, AnalyzeCallResponse>()({
  name: "analyzeCall",
  method: "POST",
  endpoint: "analyzeCall",
  orgHeader: null,
  required: { callId: "call_id", goal: "goal", questions: "questions" },
  path: { call_id: "callId" },
  body: (p) => ({ goal: p.goal, questions: p.questions })
});
