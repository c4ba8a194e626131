import { describe, expect, test } from "vitest";
import { clientConfigFromEnv, credentialsFromEnv, loadEnv } from "../config";

describe("loadEnv", () => {
  test("applies defaults to an empty environment", () => {
    const e = loadEnv({});
    expect(e.NODE_ENV).toBe("development");
    expect(e.LOG_LEVEL).toBe("info");
    expect(e.BLAND_API_BASE_URL).toBe("https://api.bland.ai");
    expect(e.BLAND_API_VERSION).toBe("v1");
    expect(e.BLAND_REQUEST_TIMEOUT_MS).toBeUndefined();
  });

  test("coerces numeric settings", () => {
    const e = loadEnv({ BLAND_DEFAULT_LIMIT: "25", BLAND_REQUEST_TIMEOUT_MS: "5000" });
    expect(e.BLAND_DEFAULT_LIMIT).toBe(25);
    expect(e.BLAND_REQUEST_TIMEOUT_MS).toBe(5000);
  });

  test("rejects an out-of-range default temperature", () => {
    expect(() => loadEnv({ BLAND_DEFAULT_TEMPERATURE: "2" })).toThrow();
  });

  test("rejects an unknown default model", () => {
    expect(() => loadEnv({ BLAND_DEFAULT_MODEL: "ultra" })).toThrow();
  });
});

describe("clientConfigFromEnv", () => {
  test("builds defaults", () => {
    expect(clientConfigFromEnv(loadEnv({}))).toEqual({
      baseUrl: "https://api.bland.ai",
      apiVersion: "v1",
      timeoutMs: undefined,
      defaults: {
        model: "enhanced",
        voice: "mason",
        language: "en-US",
        maxDuration: 30,
        temperature: 0.7,
        interruptionThreshold: 100,
        limit: 1000
      }
    });
  });

  test("strips trailing slashes from the base url", () => {
    const config = clientConfigFromEnv(loadEnv({ BLAND_API_BASE_URL: "http://127.0.0.1:8080//" }));
    expect(config.baseUrl).toBe("http://127.0.0.1:8080");
  });
});

describe("credentialsFromEnv", () => {
  test("reads key and org", () => {
    const e = loadEnv({ BLAND_API_KEY: "test-secret", BLAND_ORG_ID: "org-1" });
    expect(credentialsFromEnv(e)).toEqual({ authToken: "test-secret", orgId: "org-1" });
  });

  test("leaves the token blank when no key is set", () => {
    expect(credentialsFromEnv(loadEnv({}))).toEqual({ authToken: "", orgId: undefined });
  });
});
