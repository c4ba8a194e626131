import { z } from "zod";
import { ModelSchema } from "./domain/validation/rules";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Optional: every operation takes its own auth token; these only seed callers.
  BLAND_API_KEY: z.string().min(1).optional(),
  BLAND_ORG_ID: z.string().min(1).optional(),

  BLAND_API_BASE_URL: z.string().url().default("https://api.bland.ai"),
  BLAND_API_VERSION: z.string().min(1).default("v1"),
  BLAND_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

  BLAND_DEFAULT_MODEL: ModelSchema.default("enhanced"),
  BLAND_DEFAULT_VOICE: z.string().min(1).default("mason"),
  BLAND_DEFAULT_LANGUAGE: z.string().min(1).default("en-US"),
  BLAND_DEFAULT_MAX_DURATION: z.coerce.number().int().positive().default(30),
  BLAND_DEFAULT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
  BLAND_DEFAULT_INTERRUPTION_THRESHOLD: z.coerce.number().int().positive().default(100),
  BLAND_DEFAULT_LIMIT: z.coerce.number().int().positive().default(1000)
});

export type Env = z.infer<typeof EnvSchema>;

export type Model = Env["BLAND_DEFAULT_MODEL"];

/**
 * Values the provider would otherwise need on every call. Operations fall back
 * to these when the caller leaves the matching field out.
 */
export type ClientDefaults = {
  model: Model;
  voice: string;
  language: string;
  maxDuration: number;
  temperature: number;
  interruptionThreshold: number;
  limit: number;
};

export type ClientConfig = {
  baseUrl: string;
  apiVersion: string;
  timeoutMs?: number;
  defaults: ClientDefaults;
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

export function clientConfigFromEnv(e: Env): ClientConfig {
  return {
    baseUrl: e.BLAND_API_BASE_URL.replace(/\/+$/, ""),
    apiVersion: e.BLAND_API_VERSION,
    timeoutMs: e.BLAND_REQUEST_TIMEOUT_MS,
    defaults: {
      model: e.BLAND_DEFAULT_MODEL,
      voice: e.BLAND_DEFAULT_VOICE,
      language: e.BLAND_DEFAULT_LANGUAGE,
      maxDuration: e.BLAND_DEFAULT_MAX_DURATION,
      temperature: e.BLAND_DEFAULT_TEMPERATURE,
      interruptionThreshold: e.BLAND_DEFAULT_INTERRUPTION_THRESHOLD,
      limit: e.BLAND_DEFAULT_LIMIT
    }
  };
}

/** Credentials from `BLAND_API_KEY` and `BLAND_ORG_ID`, for spreading into operation params. */
export function credentialsFromEnv(e: Env): { authToken: string; orgId?: string } {
  return { authToken: e.BLAND_API_KEY ?? "", orgId: e.BLAND_ORG_ID };
}

export const env: Env = loadEnv();
