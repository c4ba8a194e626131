export { BlandClient } from "./api/BlandClient";
export { buildRequest } from "./api/buildRequest";
export { defineOperation } from "./api/defineOperation";
export type { Credentials, Operation, OrgHeader, OrgScoped } from "./api/defineOperation";
export { ENDPOINTS, endpointBase, resolveEndpoint } from "./api/endpoints";
export type { EndpointName } from "./api/endpoints";
export { isProviderError, sendAndNormalize } from "./api/normalizeResponse";
export type { OperationResult, ProviderError } from "./api/normalizeResponse";
export * from "./api/operations";

export { FetchTransport, withQuery } from "./adapters/transport/FetchTransport";
export { FakeTransport } from "./adapters/transport/FakeTransport";
export { TransportError } from "./adapters/transport/Transport";
export type { HttpMethod, OperationRequest, QueryValue, SendOptions, Transport } from "./adapters/transport/Transport";

export { clientConfigFromEnv, credentialsFromEnv, env, loadEnv } from "./config";
export type { ClientConfig, ClientDefaults, Env, Model } from "./config";
export { logger } from "./logger";
export type { Logger } from "./logger";

export * from "./domain/errors/ValidationError";
export { normalizePhoneNumber } from "./domain/normalize/normalizePhoneNumber";
export {
  BackgroundTrackSchema,
  CallStatusSchema,
  HttpMethodSchema,
  KeyTypeSchema,
  ModelSchema,
  RANGES,
  SortOrderSchema
} from "./domain/validation/rules";
export type { BackgroundTrack, CallStatus, KeyType, SortOrder, ToolHttpMethod } from "./domain/validation/rules";
