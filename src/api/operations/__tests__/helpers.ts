import { expect } from "vitest";
import { InvalidEnumError } from "../../../domain/errors/ValidationError";

/** Copies params with one field set to a value its type would not allow. */
export function withField<P extends object>(params: P, key: string, value: unknown): P {
  return Object.assign({}, params, { [key]: value });
}

export function expectInvalidEnum(build: () => unknown, field: string, allowed: string[]): void {
  try {
    build();
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidEnumError);
    expect(err).toMatchObject({ reason: "invalid_enum", field, allowed });
  }
}
