import { OperationRequest, SendOptions, Transport, TransportError } from "./Transport";

type FakeReply = { ok: true; body: unknown } | { ok: false; error: Error };

export class FakeTransport implements Transport {
  public sent: OperationRequest[] = [];
  private replies: FakeReply[] = [];

  /** Queues a successful JSON body for the next request. */
  respondWith(body: unknown): this {
    this.replies.push({ ok: true, body });
    return this;
  }

  /** Queues a failure for the next request. */
  failWith(error: Error | string): this {
    this.replies.push({
      ok: false,
      error: typeof error === "string" ? new TransportError(error) : error
    });
    return this;
  }

  async send(req: OperationRequest, opts: SendOptions = {}): Promise<unknown> {
    this.sent.push(req);
    if (opts.signal?.aborted) {
      throw new TransportError(`${req.method} ${req.url} aborted`, { cause: opts.signal.reason });
    }

    const reply = this.replies.shift();
    if (!reply) return { status: "success" };
    if (!reply.ok) throw reply.error;
    return reply.body;
  }

  reset(): void {
    this.sent = [];
    this.replies = [];
  }
}
