import { isAlphaNumeric, isAsciiDigit, isAsciiLetter, isNumeric, removeWhitespace } from "../text/charset";
import { isPaymentFieldError, PaymentFieldError } from "../utils/errors";
import { calculateMod10, calculateMod97, mod10CheckDigit } from "./checksums";

export type ReferenceType = "QRR" | "SCOR" | "NON";

export const NUMERIC_REFERENCE_LENGTH = 27;
const CREDITOR_REFERENCE_MIN = 5;
const CREDITOR_REFERENCE_MAX = 25;
const QR_IID_MIN = 30000;
const QR_IID_MAX = 31999;

function hasValidMod97CheckDigits(value: string): boolean {
  try {
    return calculateMod97(value) === 1;
  } catch (err) {
    if (isPaymentFieldError(err)) {
      return false;
    }
    throw err;
  }
}

/**
 * Validates an IBAN. Whitespace must have been removed beforehand.
 */
export function isValidBankIdentifierReference(iban: string): boolean {
  if (iban.length < 5 || !isAlphaNumeric(iban)) {
    return false;
  }
  if (
    !isAsciiLetter(iban.charCodeAt(0)) ||
    !isAsciiLetter(iban.charCodeAt(1)) ||
    !isAsciiDigit(iban.charCodeAt(2)) ||
    !isAsciiDigit(iban.charCodeAt(3))
  ) {
    return false;
  }
  return hasValidMod97CheckDigits(iban);
}

/**
 * QR-IBAN: a Swiss or Liechtenstein IBAN whose institution id lies in the
 * range reserved for QR references (30000-31999).
 */
export function isQrIban(iban: string): boolean {
  if (!isValidBankIdentifierReference(iban)) {
    return false;
  }
  const country = iban.slice(0, 2).toUpperCase();
  if (country !== "CH" && country !== "LI") {
    return false;
  }
  const iid = iban.slice(4, 9);
  if (!isNumeric(iid)) {
    return false;
  }
  const value = Number(iid);
  return value >= QR_IID_MIN && value <= QR_IID_MAX;
}

/**
 * Validates an ISO 11649 creditor reference. Whitespace must have been removed beforehand.
 */
export function isValidStructuredCreditorReference(reference: string): boolean {
  if (reference.length < CREDITOR_REFERENCE_MIN || reference.length > CREDITOR_REFERENCE_MAX) {
    return false;
  }
  if (!isAlphaNumeric(reference)) {
    return false;
  }
  if (!isAsciiDigit(reference.charCodeAt(2)) || !isAsciiDigit(reference.charCodeAt(3))) {
    return false;
  }
  return hasValidMod97CheckDigits(reference);
}

/**
 * Prefixes a raw payload with "RF" and its two MOD 97 check digits.
 * Whitespace in the payload is removed first.
 */
export function createStructuredCreditorReference(rawPayload: string): string {
  const payload = removeWhitespace(rawPayload);
  const modulo = calculateMod97(`RF00${payload}`);
  return `RF${String(98 - modulo).padStart(2, "0")}${payload}`;
}

export function isValidNumericPaymentReference(reference: string): boolean {
  if (reference.length !== NUMERIC_REFERENCE_LENGTH || !isNumeric(reference)) {
    return false;
  }
  return calculateMod10(reference) === 0;
}

/**
 * Builds a 27-digit QR reference from up to 26 digits: zero-padded on the
 * left, MOD 10 check digit appended.
 */
export function createNumericPaymentReference(rawPayload: string): string {
  const payload = removeWhitespace(rawPayload);
  if (payload.length === 0) {
    throw new PaymentFieldError("REFERENCE_EMPTY", "Reference payload is empty");
  }
  if (payload.length > NUMERIC_REFERENCE_LENGTH - 1) {
    throw new PaymentFieldError(
      "REFERENCE_TOO_LONG",
      `Reference payload exceeds ${NUMERIC_REFERENCE_LENGTH - 1} digits`
    );
  }
  const padded = payload.padStart(NUMERIC_REFERENCE_LENGTH - 1, "0");
  return `${padded}${mod10CheckDigit(padded)}`;
}

/**
 * Groups an IBAN or creditor reference in blocks of four; the shorter
 * block, if any, comes last.
 */
export function formatBankIdentifierReference(iban: string): string {
  const groups: string[] = [];
  for (let pos = 0; pos < iban.length; pos += 4) {
    groups.push(iban.slice(pos, pos + 4));
  }
  return groups.join(" ");
}

/**
 * Groups a QR reference in blocks of five counted from the end; the shorter
 * block, if any, comes first.
 */
export function formatNumericPaymentReference(reference: string): string {
  const groups: string[] = [];
  let pos = 0;
  while (pos < reference.length) {
    const end = pos + ((reference.length - pos - 1) % 5) + 1;
    groups.push(reference.slice(pos, end));
    pos = end;
  }
  return groups.join(" ");
}

/**
 * Reference type a payment slip carries for the given reference, or
 * `undefined` if it is neither a QR nor a creditor reference.
 */
export function detectReferenceType(reference: string | undefined): ReferenceType | undefined {
  const compact = removeWhitespace(reference ?? "");
  if (compact.length === 0) {
    return "NON";
  }
  if (isNumeric(compact)) {
    return isValidNumericPaymentReference(compact) ? "QRR" : undefined;
  }
  return isValidStructuredCreditorReference(compact.toUpperCase()) ? "SCOR" : undefined;
}
