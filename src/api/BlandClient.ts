import { ClientConfig, clientConfigFromEnv, env } from "../config";
import { logger as rootLogger, Logger } from "../logger";
import { FetchTransport } from "../adapters/transport/FetchTransport";
import { OperationRequest, SendOptions, Transport } from "../adapters/transport/Transport";
import { buildRequest } from "./buildRequest";
import { Credentials, Operation } from "./defineOperation";
import { OperationResult, sendAndNormalize } from "./normalizeResponse";
import * as ops from "./operations";

type BlandClientOpts = {
  transport?: Transport;
  config?: ClientConfig;
  logger?: Logger;
};

type Result<R> = Promise<OperationResult<R>>;

/**
 * One method per provider operation. Validation problems throw a
 * `ValidationError` before anything is sent; provider and network failures
 * resolve to `{ status: "error", message }`.
 */
export class BlandClient {
  readonly config: ClientConfig;
  private transport: Transport;
  private logger: Logger;

  constructor(opts: BlandClientOpts = {}) {
    this.config = opts.config ?? clientConfigFromEnv(env);
    this.transport = opts.transport ?? new FetchTransport({ timeoutMs: this.config.timeoutMs });
    this.logger = (opts.logger ?? rootLogger).child({ component: "bland-client" });
  }

  build<P extends Credentials, R>(op: Operation<P, R>, params: P): OperationRequest {
    return buildRequest(op, params, this.config);
  }

  async execute<P extends Credentials, R>(op: Operation<P, R>, params: P, opts?: SendOptions): Result<R> {
    const req = this.build(op, params);
    const result = await sendAndNormalize(this.transport, req, this.logger, opts);
    // Success bodies are passed through as the provider sent them.
    return result as OperationResult<R>;
  }

  // Calls
  sendCall(p: ops.SendCallParams, o?: SendOptions): Result<ops.SendCallResponse> {
    return this.execute(ops.sendCall, p, o);
  }
  sendCallSimple(p: ops.SendCallSimpleParams, o?: SendOptions): Result<ops.SendCallResponse> {
    return this.execute(ops.sendCallSimple, p, o);
  }
  sendCallPathwaySimple(p: ops.SendCallPathwaySimpleParams, o?: SendOptions): Result<ops.SendCallResponse> {
    return this.execute(ops.sendCallPathwaySimple, p, o);
  }
  stopActiveCall(p: ops.StopActiveCallParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.stopActiveCall, p, o);
  }
  stopAllActiveCalls(p: Credentials, o?: SendOptions): Result<ops.StatusResponse & { num_calls?: number }> {
    return this.execute(ops.stopAllActiveCalls, p, o);
  }
  listCalls(p: ops.ListCallsParams, o?: SendOptions): Result<ops.ListCallsResponse> {
    return this.execute(ops.listCalls, p, o);
  }
  getCallDetails(p: ops.GetCallDetailsParams, o?: SendOptions): Result<ops.CallDetails> {
    return this.execute(ops.getCallDetails, p, o);
  }
  analyzeCall(p: ops.AnalyzeCallParams, o?: SendOptions): Result<ops.AnalyzeCallResponse> {
    return this.execute(ops.analyzeCall, p, o);
  }

  // Batches
  sendBatchCalls(p: ops.SendBatchCallsParams, o?: SendOptions): Result<ops.SendBatchCallsResponse> {
    return this.execute(ops.sendBatchCalls, p, o);
  }
  listBatches(p: ops.ListBatchesParams, o?: SendOptions): Result<ops.ListBatchesResponse> {
    return this.execute(ops.listBatches, p, o);
  }
  getBatchDetails(p: ops.GetBatchDetailsParams, o?: SendOptions): Result<ops.BatchDetails> {
    return this.execute(ops.getBatchDetails, p, o);
  }
  getBatchAnalysis(p: ops.GetBatchAnalysisParams, o?: SendOptions): Result<ops.BatchAnalysis> {
    return this.execute(ops.getBatchAnalysis, p, o);
  }
  analyzeBatch(p: ops.AnalyzeBatchParams, o?: SendOptions): Result<ops.AnalyzeBatchResponse> {
    return this.execute(ops.analyzeBatch, p, o);
  }
  stopActiveBatch(p: ops.StopActiveBatchParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.stopActiveBatch, p, o);
  }

  // Pathways
  createPathway(p: ops.CreatePathwayParams, o?: SendOptions): Result<ops.CreatePathwayResponse> {
    return this.execute(ops.createPathway, p, o);
  }
  getAllPathways(p: ops.GetAllPathwaysParams, o?: SendOptions): Result<ops.GetAllPathwaysResponse> {
    return this.execute(ops.getAllPathways, p, o);
  }
  getPathwayInfo(p: ops.PathwayIdParams, o?: SendOptions): Result<ops.Pathway> {
    return this.execute(ops.getPathwayInfo, p, o);
  }
  updatePathway(p: ops.UpdatePathwayParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.updatePathway, p, o);
  }
  deletePathway(p: ops.PathwayIdParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deletePathway, p, o);
  }
  movePathway(p: ops.MovePathwayParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.movePathway, p, o);
  }
  getPathwayVersions(p: ops.PathwayIdParams, o?: SendOptions): Result<ops.PathwayVersion[]> {
    return this.execute(ops.getPathwayVersions, p, o);
  }
  createPathwayVersion(
    p: ops.CreatePathwayVersionParams,
    o?: SendOptions
  ): Result<ops.CreatePathwayVersionResponse> {
    return this.execute(ops.createPathwayVersion, p, o);
  }
  getPathwayVersion(p: ops.PathwayVersionParams, o?: SendOptions): Result<ops.PathwayVersion> {
    return this.execute(ops.getPathwayVersion, p, o);
  }
  promotePathwayVersion(p: ops.PathwayVersionParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.promotePathwayVersion, p, o);
  }
  deletePathwayVersion(p: ops.PathwayVersionParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deletePathwayVersion, p, o);
  }
  createPathwayChat(p: ops.CreatePathwayChatParams, o?: SendOptions): Result<ops.CreatePathwayChatResponse> {
    return this.execute(ops.createPathwayChat, p, o);
  }
  sendPathwayChatMessage(p: ops.SendPathwayChatMessageParams, o?: SendOptions): Result<ops.PathwayChatReply> {
    return this.execute(ops.sendPathwayChatMessage, p, o);
  }
  getPathwayChatHistory(p: ops.ChatIdParams, o?: SendOptions): Result<ops.PathwayChatHistory> {
    return this.execute(ops.getPathwayChatHistory, p, o);
  }

  // Folders
  createFolder(p: ops.CreateFolderParams, o?: SendOptions): Result<ops.CreateFolderResponse> {
    return this.execute(ops.createFolder, p, o);
  }
  getAllFolders(p: ops.FolderListParams, o?: SendOptions): Result<ops.FolderList> {
    return this.execute(ops.getAllFolders, p, o);
  }
  getFolderPathways(p: ops.FolderIdParams, o?: SendOptions): Result<ops.FolderPathways> {
    return this.execute(ops.getFolderPathways, p, o);
  }
  updateFolder(p: ops.UpdateFolderParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.updateFolder, p, o);
  }
  deleteFolder(p: ops.FolderIdParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deleteFolder, p, o);
  }

  // Phone numbers
  purchasePhoneNumber(
    p: ops.PurchasePhoneNumberParams,
    o?: SendOptions
  ): Result<ops.PurchasePhoneNumberResponse> {
    return this.execute(ops.purchasePhoneNumber, p, o);
  }
  listInboundNumbers(p: ops.NumberListParams, o?: SendOptions): Result<ops.InboundNumberList> {
    return this.execute(ops.listInboundNumbers, p, o);
  }
  listOutboundNumbers(p: ops.NumberListParams, o?: SendOptions): Result<ops.OutboundNumberList> {
    return this.execute(ops.listOutboundNumbers, p, o);
  }
  getInboundDetails(p: ops.PhoneNumberParams, o?: SendOptions): Result<ops.InboundNumber> {
    return this.execute(ops.getInboundDetails, p, o);
  }
  updateInboundDetails(p: ops.UpdateInboundDetailsParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.updateInboundDetails, p, o);
  }
  deleteInboundNumber(p: ops.PhoneNumberParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deleteInboundNumber, p, o);
  }
  uploadInboundNumbers(
    p: ops.UploadInboundNumbersParams,
    o?: SendOptions
  ): Result<ops.UploadInboundNumbersResponse> {
    return this.execute(ops.uploadInboundNumbers, p, o);
  }

  // Voices
  listVoices(p: ops.VoiceListParams, o?: SendOptions): Result<ops.VoiceList> {
    return this.execute(ops.listVoices, p, o);
  }
  getVoiceDetails(p: ops.VoiceIdParams, o?: SendOptions): Result<ops.Voice> {
    return this.execute(ops.getVoiceDetails, p, o);
  }
  generateAudioSample(
    p: ops.GenerateAudioSampleParams,
    o?: SendOptions
  ): Result<ops.GenerateAudioSampleResponse> {
    return this.execute(ops.generateAudioSample, p, o);
  }
  publishClonedVoice(p: ops.PublishClonedVoiceParams, o?: SendOptions): Result<ops.PublishClonedVoiceResponse> {
    return this.execute(ops.publishClonedVoice, p, o);
  }

  // Custom tools
  createCustomTool(p: ops.CreateCustomToolParams, o?: SendOptions): Result<ops.CreateCustomToolResponse> {
    return this.execute(ops.createCustomTool, p, o);
  }
  listCustomTools(p: ops.ListCustomToolsParams, o?: SendOptions): Result<ops.CustomToolList> {
    return this.execute(ops.listCustomTools, p, o);
  }
  getCustomToolDetails(p: ops.ToolIdParams, o?: SendOptions): Result<ops.CustomTool> {
    return this.execute(ops.getCustomToolDetails, p, o);
  }
  updateCustomTool(p: ops.UpdateCustomToolParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.updateCustomTool, p, o);
  }
  deleteCustomTool(p: ops.ToolIdParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deleteCustomTool, p, o);
  }

  // Web agents
  createWebAgent(p: ops.CreateWebAgentParams, o?: SendOptions): Result<ops.CreateWebAgentResponse> {
    return this.execute(ops.createWebAgent, p, o);
  }
  listWebAgents(p: ops.ListWebAgentsParams, o?: SendOptions): Result<ops.WebAgentList> {
    return this.execute(ops.listWebAgents, p, o);
  }
  updateWebAgent(p: ops.UpdateWebAgentParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.updateWebAgent, p, o);
  }
  deleteWebAgent(p: ops.AgentIdParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deleteWebAgent, p, o);
  }
  authorizeWebAgent(p: ops.AuthorizeWebAgentParams, o?: SendOptions): Result<ops.AuthorizeWebAgentResponse> {
    return this.execute(ops.authorizeWebAgent, p, o);
  }

  // Encrypted keys
  createEncryptedKey(p: ops.CreateEncryptedKeyParams, o?: SendOptions): Result<ops.CreateEncryptedKeyResponse> {
    return this.execute(ops.createEncryptedKey, p, o);
  }
  deleteEncryptedKey(p: ops.KeyIdParams, o?: SendOptions): Result<ops.StatusResponse> {
    return this.execute(ops.deleteEncryptedKey, p, o);
  }
}
