import { parsePhoneNumberFromString } from "libphonenumber-js";
import { InvalidPhoneNumberError } from "../errors/ValidationError";

// "+", a non-zero country digit, 11–15 digits in all.
const E164 = /^\+[1-9]\d{10,14}$/;

/**
 * Strips formatting (spaces, dashes, dots, parentheses) and checks the result
 * is an E.164 number with a known country code and a possible length.
 * Returns the cleaned number.
 */
export function normalizePhoneNumber(input: string, field = "phone_number"): string {
  const cleaned = input.replace(/[^\d+]/g, "");
  if (!E164.test(cleaned)) {
    throw new InvalidPhoneNumberError(field, input);
  }

  const phone = parsePhoneNumberFromString(cleaned);
  if (!phone || !phone.isPossible()) {
    throw new InvalidPhoneNumberError(field, input);
  }
  return phone.number;
}
