import { OperationRequest, QueryValue, SendOptions, Transport, TransportError } from "./Transport";

type FetchTransportOpts = {
  /** Applied to every request on top of any per-call signal. */
  timeoutMs?: number;
};

/**
 * Sends requests with the global `fetch`. One request per call, no retries.
 */
export class FetchTransport implements Transport {
  private timeoutMs?: number;

  constructor(opts: FetchTransportOpts = {}) {
    this.timeoutMs = opts.timeoutMs;
  }

  async send(req: OperationRequest, opts: SendOptions = {}): Promise<unknown> {
    const url = withQuery(req.url, req.query);
    const signal = this.signalFor(opts.signal);

    let res: Response;
    try {
      res = await fetch(url, {
        method: req.method,
        headers: req.headers,
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal
      });
    } catch (err) {
      throw new TransportError(`${req.method} ${req.url} failed: ${describe(err)}`, { cause: err });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new TransportError(`${req.method} ${req.url} failed reading the body: ${describe(err)}`, {
        status: res.status,
        cause: err
      });
    }

    if (!res.ok) {
      throw new TransportError(
        `${res.status} ${res.statusText} for ${req.method} ${req.url}: ${text.slice(0, 500)}`,
        { status: res.status }
      );
    }

    try {
      const json: unknown = JSON.parse(text);
      return json;
    } catch (err) {
      throw new TransportError(`Invalid JSON in response to ${req.method} ${req.url}`, {
        status: res.status,
        cause: err
      });
    }
  }

  private signalFor(callerSignal?: AbortSignal): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (callerSignal) signals.push(callerSignal);
    if (this.timeoutMs !== undefined) signals.push(AbortSignal.timeout(this.timeoutMs));
    if (signals.length === 0) return undefined;
    if (signals.length === 1) return signals[0];
    return AbortSignal.any(signals);
  }
}

export function withQuery(url: string, query?: Readonly<Record<string, QueryValue>>): string {
  if (!query) return url;

  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (Array.isArray(value)) {
      for (const item of value) qs.append(key, item);
    } else if (typeof value === "object") {
      qs.set(key, JSON.stringify(value));
    } else {
      qs.set(key, String(value));
    }
  }

  const s = qs.toString();
  return s ? `${url}?${s}` : url;
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
