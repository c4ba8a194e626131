import { describe, expect, test } from "vitest";
import { clientConfigFromEnv, loadEnv } from "../../../config";
import { buildRequest } from "../../buildRequest";
import { expectInvalidEnum, withField } from "./helpers";
import {
  analyzeBatch,
  getBatchAnalysis,
  getBatchDetails,
  listBatches,
  sendBatchCalls,
  stopActiveBatch
} from "../batches";

const config = clientConfigFromEnv(loadEnv({}));
const auth = { authToken: "test-secret" };

describe("sendBatchCalls", () => {
  test("cleans each number and fills defaults", () => {
    const req = buildRequest(
      sendBatchCalls,
      { ...auth, phoneNumbers: ["+1 415 555 0100", "+14155550101"], task: "Remind about the visit" },
      config
    );
    expect(req.url).toBe("https://api.bland.ai/v1/calls/batch");
    expect(req.body).toEqual({
      phone_numbers: ["+14155550100", "+14155550101"],
      task: "Remind about the visit",
      model: "enhanced",
      voice: "mason",
      language: "en-US",
      temperature: 0.7,
      max_duration: 30
    });
  });

  test("rejects an unknown model", () => {
    const params = withField({ ...auth, phoneNumbers: ["+14155550100"], task: "t" }, "model", "ultra");
    expectInvalidEnum(() => buildRequest(sendBatchCalls, params, config), "model", ["base", "turbo", "enhanced"]);
  });

  test("rejects an empty list", () => {
    expect(() => buildRequest(sendBatchCalls, { ...auth, phoneNumbers: [], task: "t" }, config)).toThrow(
      "Missing required parameter: phone_numbers"
    );
  });

  test("rejects a bad number in the list", () => {
    expect(() =>
      buildRequest(sendBatchCalls, { ...auth, phoneNumbers: ["+14155550100", "4155550101"], pathwayId: "pw-1" }, config)
    ).toThrow("Invalid phone number format: 4155550101");
  });
});

describe("listBatches", () => {
  test("defaults paging", () => {
    expect(buildRequest(listBatches, auth, config).query).toEqual({ limit: 1000, offset: 0 });
  });

  test("sort order defaults only when sorting", () => {
    const req = buildRequest(
      listBatches,
      { ...auth, status: ["completed", "failed"], sortBy: "created_at", dateRange: { start: "2024-01-01" } },
      config
    );
    expect(req.query).toEqual({
      limit: 1000,
      offset: 0,
      status: ["completed", "failed"],
      date_range: { start: "2024-01-01" },
      sort_by: "created_at",
      sort_order: "desc"
    });
  });

  test("drops an empty date range", () => {
    const req = buildRequest(listBatches, { ...auth, dateRange: {}, sortOrder: "asc" }, config);
    expect(req.query).toEqual({ limit: 1000, offset: 0 });
  });

  test("rejects an unknown status", () => {
    const params = withField(auth, "status", ["completed", "ringing"]);
    expectInvalidEnum(() => buildRequest(listBatches, params, config), "status", [
      "queued",
      "in_progress",
      "completed",
      "failed",
      "cancelled"
    ]);
  });

  test("rejects an unknown sort order", () => {
    const params = withField({ ...auth, sortBy: "created_at" }, "sortOrder", "newest");
    expectInvalidEnum(() => buildRequest(listBatches, params, config), "sort_order", ["asc", "desc"]);
  });

  test("rejects a negative offset", () => {
    expect(() => buildRequest(listBatches, { ...auth, offset: -1 }, config)).toThrow(
      "offset must be greater than or equal to 0"
    );
  });
});

describe("getBatchDetails", () => {
  test("sends the call filter only with calls included", () => {
    const withCalls = buildRequest(
      getBatchDetails,
      { ...auth, batchId: "b-1", includeCalls: true, callStatus: "completed" },
      config
    );
    expect(withCalls.url).toBe("https://api.bland.ai/v1/calls/batch/b-1");
    expect(withCalls.query).toEqual({ include_calls: "true", call_status: "completed" });

    const without = buildRequest(getBatchDetails, { ...auth, batchId: "b-1", callStatus: "completed" }, config);
    expect(without.query).toEqual({});
  });
});

describe("getBatchDetails call filter", () => {
  test("rejects an unknown call status", () => {
    const params = withField({ ...auth, batchId: "b-1", includeCalls: true }, "callStatus", "ringing");
    expectInvalidEnum(() => buildRequest(getBatchDetails, params, config), "call_status", [
      "queued",
      "in_progress",
      "completed",
      "failed",
      "cancelled"
    ]);
  });
});

describe("getBatchAnalysis", () => {
  test("needs both ids", () => {
    const req = buildRequest(
      getBatchAnalysis,
      { ...auth, batchId: "b-1", analysisId: "a-1", includeCallDetails: true },
      config
    );
    expect(req.url).toBe("https://api.bland.ai/v1/calls/batch/b-1/analysis/a-1");
    expect(req.query).toEqual({ include_call_details: "true" });

    expect(() => buildRequest(getBatchAnalysis, { ...auth, batchId: "b-1", analysisId: "" }, config)).toThrow(
      "Missing required parameter: analysis_id"
    );
  });
});

describe("analyzeBatch", () => {
  test("maps metrics", () => {
    const req = buildRequest(
      analyzeBatch,
      { ...auth, batchId: "b-1", goal: "Measure interest", questions: ["Interested?"], customMetrics: [{ name: "m" }] },
      config
    );
    expect(req.body).toEqual({ goal: "Measure interest", questions: ["Interested?"], custom_metrics: [{ name: "m" }] });
  });
});

describe("stopActiveBatch", () => {
  test("sends the reason", () => {
    const req = buildRequest(stopActiveBatch, { ...auth, batchId: "b-1", stopReason: "paused" }, config);
    expect(req.url).toBe("https://api.bland.ai/v1/calls/batch/b-1/stop");
    expect(req.body).toEqual({ reason: "paused" });
  });
});
