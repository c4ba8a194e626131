import { Model } from "../../config";
import {
  CallStatus,
  CallStatusSchema,
  ModelSchema,
  SortOrder,
  SortOrderSchema,
  checkEnum,
  checkPhoneNumbers,
  checkRange,
  requireOneOf
} from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { CallSummary } from "./calls";
import { JsonObject, StatusResponse } from "./shared";

export type SendBatchCallsParams = OrgScoped & {
  /** E.164 numbers; each one is checked. */
  phoneNumbers: string[];
  pathwayId?: string;
  task?: string;
  model?: Model;
  voice?: string;
  language?: string;
  temperature?: number;
  maxDuration?: number;
  /** ISO 8601 start time; omitted means now. */
  scheduleTime?: string;
  retryConfig?: JsonObject;
  metadata?: JsonObject;
};

export type SendBatchCallsResponse = StatusResponse & {
  batch_id?: string;
  call_ids?: string[];
};

export type ListBatchesParams = OrgScoped & {
  limit?: number;
  offset?: number;
  status?: CallStatus[];
  dateRange?: { start?: string; end?: string };
  sortBy?: string;
  /** Only sent together with `sortBy`. */
  sortOrder?: SortOrder;
};

export type BatchSummary = {
  batch_id: string;
  status?: string;
  created_at?: string;
  total_calls?: number;
  completed_calls?: number;
  metadata?: JsonObject;
};

export type ListBatchesResponse = {
  batches: BatchSummary[];
  total?: number;
};

export type GetBatchDetailsParams = OrgScoped & {
  batchId: string;
  includeCalls?: boolean;
  /** Filters the returned calls; ignored unless `includeCalls` is set. */
  callStatus?: CallStatus;
};

export type BatchDetails = BatchSummary & {
  calls?: CallSummary[];
};

export type GetBatchAnalysisParams = OrgScoped & {
  batchId: string;
  analysisId: string;
  includeCallDetails?: boolean;
};

export type BatchAnalysis = {
  analysis_id?: string;
  batch_id?: string;
  status?: string;
  goal?: string;
  answers?: unknown[];
  metrics?: JsonObject;
  calls?: CallSummary[];
};

export type AnalyzeBatchParams = OrgScoped & {
  batchId: string;
  goal: string;
  questions: string[];
  filters?: JsonObject;
  customMetrics?: JsonObject[];
};

export type AnalyzeBatchResponse = StatusResponse & {
  analysis_id?: string;
};

export type StopActiveBatchParams = OrgScoped & {
  batchId: string;
  stopReason?: string;
};

export const sendBatchCalls = defineOperation<SendBatchCallsParams, SendBatchCallsResponse>()({
  name: "sendBatchCalls",
  method: "POST",
  endpoint: "batches",
  orgHeader: "encrypted_key",
  required: { phoneNumbers: "phone_numbers" },
  prepare(p) {
    requireOneOf({ pathway_id: p.pathwayId, task: p.task });
    const phoneNumbers = checkPhoneNumbers(p.phoneNumbers, "phone_numbers");
    checkEnum(ModelSchema, p.model, "model");
    checkRange(p.temperature, "temperature");
    return { ...p, phoneNumbers };
  },
  body: (p, d) => ({
    phone_numbers: p.phoneNumbers,
    pathway_id: p.pathwayId,
    task: p.task,
    model: p.model ?? d.model,
    voice: p.voice ?? d.voice,
    language: p.language ?? d.language,
    temperature: p.temperature ?? d.temperature,
    max_duration: p.maxDuration ?? d.maxDuration,
    schedule_time: p.scheduleTime,
    retry_config: p.retryConfig,
    metadata: p.metadata
  })
});

export const listBatches = defineOperation<ListBatchesParams, ListBatchesResponse>()({
  name: "listBatches",
  method: "GET",
  endpoint: "batches",
  orgHeader: "encrypted_key",
  prepare(p) {
    checkRange(p.limit, "limit");
    checkRange(p.offset, "offset");
    checkEnum(SortOrderSchema, p.sortOrder, "sort_order");
    for (const s of p.status ?? []) checkEnum(CallStatusSchema, s, "status");
    return p;
  },
  query: (p, d) => ({
    limit: p.limit ?? d.limit,
    offset: p.offset ?? 0,
    status: p.status && p.status.length > 0 ? p.status : undefined,
    date_range: dateRangeOf(p.dateRange),
    sort_by: p.sortBy || undefined,
    sort_order: p.sortBy ? p.sortOrder ?? "desc" : undefined
  })
});

export const getBatchDetails = defineOperation<GetBatchDetailsParams, BatchDetails>()({
  name: "getBatchDetails",
  method: "GET",
  endpoint: "batchDetails",
  orgHeader: "encrypted_key",
  required: { batchId: "batch_id" },
  path: { batch_id: "batchId" },
  prepare(p) {
    checkEnum(CallStatusSchema, p.callStatus, "call_status");
    return p;
  },
  query: (p) => ({
    include_calls: p.includeCalls ? "true" : undefined,
    call_status: p.includeCalls ? p.callStatus : undefined
  })
});

export const getBatchAnalysis = defineOperation<GetBatchAnalysisParams, BatchAnalysis>()({
  name: "getBatchAnalysis",
  method: "GET",
  endpoint: "batchAnalysis",
  orgHeader: "encrypted_key",
  required: { batchId: "batch_id", analysisId: "analysis_id" },
  path: { batch_id: "batchId", analysis_id: "analysisId" },
  query: (p) => ({
    include_call_details: p.includeCallDetails ? "true" : undefined
  })
});

export const analyzeBatch = defineOperation<AnalyzeBatchParams, AnalyzeBatchResponse>()({
  name: "analyzeBatch",
  method: "POST",
  endpoint: "analyzeBatch",
  orgHeader: "encrypted_key",
  required: { batchId: "batch_id", goal: "goal", questions: "questions" },
  path: { batch_id: "batchId" },
  body: (p) => ({
    goal: p.goal,
    questions: p.questions,
    filters: p.filters,
    custom_metrics: p.customMetrics
  })
});

export const stopActiveBatch = defineOperation<StopActiveBatchParams, StatusResponse>()({
  name: "stopActiveBatch",
  method: "POST",
  endpoint: "stopBatch",
  orgHeader: "encrypted_key",
  required: { batchId: "batch_id" },
  path: { batch_id: "batchId" },
  body: (p) => ({ reason: p.stopReason })
});

function dateRangeOf(range: ListBatchesParams["dateRange"]): Record<string, string> | undefined {
  if (!range) return undefined;
  const out: Record<string, string> = {};
  if (range.start) out.start = range.start;
  if (range.end) out.end = range.end;
  return Object.keys(out).length > 0 ? out : undefined;
}
