export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | string[] | Record<string, string>;

export type OperationRequest = {
  /** Operation name, used for logging only. */
  operation: string;
  method: HttpMethod;
  url: string;
  headers: Readonly<Record<string, string>>;
  body?: Readonly<Record<string, unknown>>;
  query?: Readonly<Record<string, QueryValue>>;
};

export type SendOptions = {
  /** Caller-side deadline; aborting fails the call like any other transport error. */
  signal?: AbortSignal;
};

/**
 * Raised by a transport for any failed exchange: non-2xx status, network error,
 * or a body that is not JSON. The response normalizer turns it into a value.
 */
export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "TransportError";
    this.status = opts.status;
  }
}

export interface Transport {
  /** Sends one request and resolves with the decoded JSON body. */
  send(req: OperationRequest, opts?: SendOptions): Promise<unknown>;
}
