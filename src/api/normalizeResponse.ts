import { OperationRequest, SendOptions, Transport } from "../adapters/transport/Transport";
import { Logger } from "../logger";

export type ProviderError = {
  status: "error";
  message: string;
};

export type OperationResult<T> = T | ProviderError;

export function isProviderError(result: unknown): result is ProviderError {
  return (
    typeof result === "object" &&
    result !== null &&
    "status" in result &&
    result.status === "error" &&
    "message" in result &&
    typeof result.message === "string"
  );
}

/**
 * Sends a built request and folds every transport failure into a
 * `{ status: "error", message }` value. Never rejects.
 */
export async function sendAndNormalize(
  transport: Transport,
  req: OperationRequest,
  logger: Logger,
  opts?: SendOptions
): Promise<unknown> {
  logger.debug({ operation: req.operation, method: req.method, url: req.url }, "provider request");
  try {
    return await transport.send(req, opts);
  } catch (err) {
    const message = errorMessage(err);
    logger.warn({ operation: req.operation, method: req.method, url: req.url, err: message }, "provider request failed");
    return { status: "error", message } satisfies ProviderError;
  }
}

function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  const text = String(err);
  return text && text !== "undefined" ? text : "Request failed";
}
