import type { Logger } from "pino";
import { moduleLogger } from "../ops/logs";
import { PaymentFieldError } from "../utils/errors";
import { clean } from "../text/sanitizer";

export type FieldMessageType = "warning" | "error";

export type FieldMessageCode =
  | "replaced_unsupported_characters"
  | "field_value_clipped"
  | "field_value_missing";

export interface FieldMessage {
  field: string;
  type: FieldMessageType;
  code: FieldMessageCode;
}

export interface FieldValidation {
  value: string | undefined;
  messages: FieldMessage[];
}

export interface TextFieldOptions {
  maxLength: number;
  required?: boolean;
}

export const FIELD_LIMITS = Object.freeze({
  name: 70,
  street: 70,
  houseNumber: 16,
  postalCode: 16,
  town: 35,
  unstructuredMessage: 140,
  billInformation: 140,
  alternativeScheme: 100,
});

export type PaymentTextField = keyof typeof FIELD_LIMITS;

let fieldLogger: Logger | undefined;

function log(): Logger {
  fieldLogger ??= moduleLogger("fields");
  return fieldLogger;
}

function clip(value: string, maxLength: number): string {
  const codePoints = Array.from(value);
  if (codePoints.length <= maxLength) {
    return value;
  }
  return codePoints.slice(0, maxLength).join("").replace(/ +$/, "");
}

export function validateTextField(field: string, value: string | null | undefined, options: TextFieldOptions): FieldValidation {
  if (!Number.isInteger(options.maxLength) || options.maxLength < 1) {
    throw new PaymentFieldError("INVALID_MAX_LENGTH", `maxLength for ${field} must be a positive integer`);
  }
  const messages: FieldMessage[] = [];
  const outcome = clean(value);
  let cleaned = outcome.cleanedValue;

  if (cleaned === undefined) {
    if (options.required) {
      messages.push({ field, type: "error", code: "field_value_missing" });
      log().debug({ field }, "field_value_missing");
    }
    return { value: undefined, messages };
  }

  if (outcome.wasModified) {
    messages.push({ field, type: "warning", code: "replaced_unsupported_characters" });
    log().debug({ field }, "replaced_unsupported_characters");
  }

  const clipped = clip(cleaned, options.maxLength);
  if (clipped !== cleaned) {
    messages.push({ field, type: "warning", code: "field_value_clipped" });
    log().debug({ field, maxLength: options.maxLength }, "field_value_clipped");
    cleaned = clipped;
  }

  return { value: cleaned.length > 0 ? cleaned : undefined, messages };
}

/** Validates one of the standard payment slip text fields with its default limit. */
export function validatePaymentTextField(
  field: PaymentTextField,
  value: string | null | undefined,
  required = false
): FieldValidation {
  return validateTextField(field, value, { maxLength: FIELD_LIMITS[field], required });
}
