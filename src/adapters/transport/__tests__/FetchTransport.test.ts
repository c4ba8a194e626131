import Fastify, { FastifyInstance } from "fastify";
import pino from "pino";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import { BlandClient } from "../../../api/BlandClient";
import { clientConfigFromEnv, loadEnv } from "../../../config";
import { FetchTransport, withQuery } from "../FetchTransport";
import { OperationRequest, TransportError } from "../Transport";

// Stands in for the provider on an ephemeral local port.
function buildFakeProvider(): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get<{ Params: { pathwayId: string } }>("/v1/pathways/:pathwayId", async (req) => {
    return {
      pathway_id: req.params.pathwayId,
      auth: req.headers.authorization,
      org: req.headers.encrypted_key ?? null
    };
  });

  app.post("/v1/calls", async (req) => ({
    received: req.body,
    contentType: req.headers["content-type"],
    org: req.headers.organization ?? null
  }));

  app.get("/v1/calls", async (req) => ({ url: req.url }));

  app.get("/v1/voices", async (_req, reply) => {
    reply.code(404);
    return { message: "not found" };
  });

  app.get("/v1/folders", async (_req, reply) => {
    reply.type("text/plain");
    return "not json";
  });

  app.get("/v1/tools/list", async () => {
    await new Promise((resolve) => setTimeout(resolve, 300));
    return { tools: [] };
  });

  return app;
}

function request(url: string, over: Partial<OperationRequest> = {}): OperationRequest {
  return { operation: "test", method: "GET", url, headers: { authorization: "test-secret" }, ...over };
}

describe("FetchTransport", () => {
  let app: FastifyInstance;
  let base: string;
  const transport = new FetchTransport();

  beforeAll(async () => {
    app = buildFakeProvider();
    base = await app.listen({ port: 0, host: "127.0.0.1" });
  });

  afterAll(async () => {
    await app.close();
  });

  test("decodes a JSON body and sends headers", async () => {
    const body = await transport.send(
      request(`${base}/v1/pathways/p1`, { headers: { authorization: "test-secret", encrypted_key: "org-1" } })
    );
    expect(body).toEqual({ pathway_id: "p1", auth: "test-secret", org: "org-1" });
  });

  test("serializes the body as JSON", async () => {
    const body = await transport.send(
      request(`${base}/v1/calls`, {
        method: "POST",
        headers: { authorization: "test-secret", "Content-Type": "application/json" },
        body: { phone_number: "+12025550100", task: "Say hi" }
      })
    );
    expect(body).toEqual({
      received: { phone_number: "+12025550100", task: "Say hi" },
      contentType: "application/json",
      org: null
    });
  });

  test("appends the query string", async () => {
    const body = await transport.send(
      request(`${base}/v1/calls`, { query: { limit: 5, status: ["completed", "failed"], ascending: false } })
    );
    expect(body).toEqual({ url: "/v1/calls?limit=5&status=completed&status=failed&ascending=false" });
  });

  test("non-2xx responses raise with the status", async () => {
    const err = await transport.send(request(`${base}/v1/voices`)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      status: 404,
      message: `404 Not Found for GET ${base}/v1/voices: {"message":"not found"}`
    });
  });

  test("non-JSON bodies raise", async () => {
    await expect(transport.send(request(`${base}/v1/folders`))).rejects.toThrow(
      `Invalid JSON in response to GET ${base}/v1/folders`
    );
  });

  test("gives up after the configured timeout", async () => {
    const slow = new FetchTransport({ timeoutMs: 20 });
    const err = await slow.send(request(`${base}/v1/tools/list`)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: expect.stringContaining(`GET ${base}/v1/tools/list failed:`) });
  });

  test("end to end through the client", async () => {
    const config = { ...clientConfigFromEnv(loadEnv({})), baseUrl: base };
    const client = new BlandClient({ transport, config, logger: pino({ level: "silent" }) });

    await expect(
      client.getPathwayInfo({ authToken: "test-secret", orgId: "org-1", pathwayId: "p1" })
    ).resolves.toEqual({ pathway_id: "p1", auth: "test-secret", org: "org-1" });

    await expect(
      client.sendCallSimple({ authToken: "test-secret", orgId: "org-1", phoneNumber: "+1 202 555 0100", task: "Say hi" })
    ).resolves.toEqual({
      received: { phone_number: "+12025550100", task: "Say hi" },
      contentType: "application/json",
      org: "org-1"
    });

    await expect(client.listCalls({ authToken: "test-secret", limit: 5 })).resolves.toEqual({
      url: "/v1/calls?limit=5&ascending=false"
    });

    await expect(client.listVoices({ authToken: "test-secret" })).resolves.toEqual({
      status: "error",
      message: `404 Not Found for GET ${base}/v1/voices: {"message":"not found"}`
    });
  });
});

describe("FetchTransport without a server", () => {
  test("connection failures become error values", async () => {
    const closed = Fastify({ logger: false });
    const base = await closed.listen({ port: 0, host: "127.0.0.1" });
    await closed.close();

    const config = { ...clientConfigFromEnv(loadEnv({})), baseUrl: base };
    const client = new BlandClient({ transport: new FetchTransport(), config, logger: pino({ level: "silent" }) });

    const result = await client.getPathwayInfo({ authToken: "test-secret", pathwayId: "p1" });

    expect(result).toMatchObject({
      status: "error",
      message: expect.stringContaining(`GET ${base}/v1/pathways/p1 failed: fetch failed`)
    });
  });
});

describe("FetchTransport with a broken body", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("a body that fails mid-read raises a TransportError", async () => {
    const broken = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error("body stream broke"));
      }
    });
    vi.stubGlobal("fetch", vi.fn(async () => new Response(broken, { status: 200 })));

    const url = "https://api.bland.ai/v1/voices";
    const err = await new FetchTransport().send(request(url)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      status: 200,
      message: `GET ${url} failed reading the body: body stream broke`
    });
  });
});

describe("withQuery", () => {
  test("leaves the url alone without a query", () => {
    expect(withQuery("https://api.bland.ai/v1/voices")).toBe("https://api.bland.ai/v1/voices");
    expect(withQuery("https://api.bland.ai/v1/voices", {})).toBe("https://api.bland.ai/v1/voices");
  });

  test("repeats array keys and JSON-encodes objects", () => {
    expect(
      withQuery("https://api.bland.ai/v1/calls/batch", {
        status: ["queued", "failed"],
        date_range: { start: "2024-01-01" },
        include_calls: "true"
      })
    ).toBe(
      "https://api.bland.ai/v1/calls/batch?status=queued&status=failed&date_range=%7B%22start%22%3A%222024-01-01%22%7D&include_calls=true"
    );
  });
});
