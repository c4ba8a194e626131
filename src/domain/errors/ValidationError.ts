export type ValidationReason =
  | "missing_auth"
  | "missing_required_field"
  | "invalid_enum"
  | "out_of_range"
  | "invalid_phone_number"
  | "missing_one_of";

/**
 * Raised synchronously while a request is being built, before anything is sent.
 *
 * Provider and network failures never use this class; they come back from an
 * operation as `{ status: "error", message }`.
 */
export class ValidationError extends Error {
  readonly field: string;
  readonly reason: ValidationReason;

  constructor(reason: ValidationReason, field: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.reason = reason;
    this.field = field;
  }
}

export class MissingAuthError extends ValidationError {
  constructor() {
    super("missing_auth", "authorization", "Missing authorization header");
  }
}

export class MissingRequiredFieldError extends ValidationError {
  constructor(field: string) {
    super("missing_required_field", field, `Missing required parameter: ${field}`);
  }
}

export class InvalidEnumError extends ValidationError {
  readonly allowed: readonly string[];

  constructor(field: string, allowed: readonly string[]) {
    super("invalid_enum", field, `Invalid ${field}. Must be one of: ${allowed.join(", ")}`);
    this.allowed = allowed;
  }
}

export class OutOfRangeError extends ValidationError {
  readonly min?: number;
  readonly max?: number;

  constructor(field: string, bounds: { min?: number; max?: number }) {
    super("out_of_range", field, describeRange(field, bounds));
    this.min = bounds.min;
    this.max = bounds.max;
  }
}

export class InvalidPhoneNumberError extends ValidationError {
  readonly value: string;

  constructor(field: string, value: string) {
    super("invalid_phone_number", field, `Invalid phone number format: ${value}`);
    this.value = value;
  }
}

export class MissingOneOfError extends ValidationError {
  readonly fields: readonly string[];

  constructor(fields: readonly string[]) {
    super(
      "missing_one_of",
      fields.join("|"),
      fields.length === 2
        ? `Either ${fields[0]} or ${fields[1]} must be provided`
        : `At least one of ${fields.join(", ")} must be provided`
    );
    this.fields = fields;
  }
}

function describeRange(field: string, { min, max }: { min?: number; max?: number }): string {
  if (min !== undefined && max !== undefined) {
    return `${field} must be between ${min} and ${max}`;
  }
  if (min !== undefined) return `${field} must be greater than or equal to ${min}`;
  if (max !== undefined) return `${field} must be less than or equal to ${max}`;
  return `${field} is out of range`;
}
