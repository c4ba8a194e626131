import { z } from "zod";
import {
  InvalidEnumError,
  MissingOneOfError,
  OutOfRangeError
} from "../errors/ValidationError";
import { normalizePhoneNumber } from "../normalize/normalizePhoneNumber";

export const HttpMethodSchema = z.enum(["GET", "POST", "PUT", "DELETE"]);
export const ModelSchema = z.enum(["base", "turbo", "enhanced"]);
export const CallStatusSchema = z.enum(["queued", "in_progress", "completed", "failed", "cancelled"]);
export const KeyTypeSchema = z.enum(["api_key", "password", "token", "secret"]);
export const BackgroundTrackSchema = z.enum(["none", "office", "cafe", "restaurant"]);
export const SortOrderSchema = z.enum(["asc", "desc"]);

export type ToolHttpMethod = z.infer<typeof HttpMethodSchema>;
export type CallStatus = z.infer<typeof CallStatusSchema>;
export type KeyType = z.infer<typeof KeyTypeSchema>;
export type BackgroundTrack = z.infer<typeof BackgroundTrackSchema>;
export type SortOrder = z.infer<typeof SortOrderSchema>;

type Bounds = { min?: number; max?: number };

export const RANGES = {
  temperature: { min: 0, max: 1 },
  speed: { min: 0.5, max: 2 },
  pitch: { min: -20, max: 20 },
  limit: { min: 1 },
  offset: { min: 0 },
  page: { min: 1 }
} as const satisfies Record<string, Bounds>;

export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim() === "";
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export function requireOneOf(values: Record<string, unknown>): void {
  if (Object.values(values).every(isBlank)) {
    throw new MissingOneOfError(Object.keys(values));
  }
}

/** Checks an optional value against a fixed set; absent values pass. */
export function checkEnum<U extends [string, ...string[]]>(
  schema: z.ZodEnum<U>,
  value: string | undefined,
  field: string
): U[number] | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidEnumError(field, schema.options);
  }
  return parsed.data;
}

export function checkRange(
  value: number | undefined,
  field: keyof typeof RANGES
): number | undefined {
  if (value === undefined) return undefined;
  const bounds: Bounds = RANGES[field];
  let schema = z.number().finite();
  if (bounds.min !== undefined) schema = schema.gte(bounds.min);
  if (bounds.max !== undefined) schema = schema.lte(bounds.max);
  if (!schema.safeParse(value).success) {
    throw new OutOfRangeError(field, bounds);
  }
  return value;
}

export function checkPhoneNumbers(values: readonly string[], field: string): string[] {
  return values.map((n) => normalizePhoneNumber(n, field));
}
