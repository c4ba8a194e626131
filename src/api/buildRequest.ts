import { ClientConfig } from "../config";
import { OperationRequest, QueryValue } from "../adapters/transport/Transport";
import { MissingAuthError, MissingRequiredFieldError } from "../domain/errors/ValidationError";
import { isBlank } from "../domain/validation/rules";
import { Credentials, Operation } from "./defineOperation";

/**
 * Validates params and assembles the request for one operation. Pure: nothing
 * is sent, and the same inputs always give a structurally equal request.
 */
export function buildRequest<P extends Credentials, R>(
  op: Operation<P, R>,
  params: P,
  config: ClientConfig
): OperationRequest {
  if (isBlank(params.authToken)) {
    throw new MissingAuthError();
  }
  for (const [key, wire] of op.required) {
    if (isBlank(fieldOf(params, key))) throw new MissingRequiredFieldError(wire);
  }

  const prepared = op.prepare(params, config.defaults);
  const url = op.url(prepared, config);

  const headers: Record<string, string> = { authorization: prepared.authToken };
  const orgId = orgIdOf(prepared);
  if (op.orgHeader && orgId) {
    headers[op.orgHeader] = orgId;
  }

  const req: OperationRequest = { operation: op.name, method: op.method, url, headers };

  if (op.body && op.method !== "GET" && op.method !== "DELETE") {
    headers["Content-Type"] = "application/json";
    req.body = Object.freeze(compact(op.body(prepared, config.defaults)));
  }
  if (op.query) {
    req.query = Object.freeze(compact<QueryValue>(op.query(prepared, config.defaults)));
  }

  Object.freeze(headers);
  return Object.freeze(req);
}

function orgIdOf(params: Credentials): string | undefined {
  if (!("orgId" in params)) return undefined;
  const value: unknown = params.orgId;
  return typeof value === "string" && value !== "" ? value : undefined;
}

function fieldOf(params: Credentials, key: string): unknown {
  return key in params ? Reflect.get(params, key) : undefined;
}

function compact<V>(input: Record<string, V | undefined>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
