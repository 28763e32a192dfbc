import { isAsciiDigit } from "../text/charset";
import { InvalidCharacterError, PaymentFieldError } from "../utils/errors";

const MOD97_REDUCE_ABOVE = 9_999_999;
const MOD10_CARRY = [0, 9, 4, 6, 8, 2, 7, 1, 3, 5];

/**
 * ISO 7064 MOD 97-10 remainder as used by IBAN and ISO 11649 references.
 *
 * The first four characters are moved to the end, letters count as 10..35
 * (case-insensitive). A reference carrying correct check digits yields 1.
 * Throws `InvalidCharacterError` for anything but ASCII letters and digits.
 */
export function calculateMod97(reference: string): number {
  if (reference.length < 4) {
    throw new PaymentFieldError("REFERENCE_TOO_SHORT", "Reference must have at least 4 characters");
  }
  const rearranged = reference.slice(4) + reference.slice(0, 4);
  let sum = 0;
  for (let i = 0; i < rearranged.length; i++) {
    const code = rearranged.charCodeAt(i);
    if (code >= 0x30 && code <= 0x39) {
      sum = sum * 10 + (code - 0x30);
    } else if (code >= 0x41 && code <= 0x5a) {
      sum = sum * 100 + (code - 0x41 + 10);
    } else if (code >= 0x61 && code <= 0x7a) {
      sum = sum * 100 + (code - 0x61 + 10);
    } else {
      throw new InvalidCharacterError(rearranged.charAt(i), (i + 4) % rearranged.length);
    }
    if (sum > MOD97_REDUCE_ABOVE) {
      sum %= 97;
    }
  }
  return sum % 97;
}

/**
 * Running MOD 10 carry (recursive modulo 10) over a digit string.
 * A complete reference is valid when the carry ends at 0.
 */
export function calculateMod10(digits: string): number {
  let carry = 0;
  for (let i = 0; i < digits.length; i++) {
    const code = digits.charCodeAt(i);
    if (!isAsciiDigit(code)) {
      throw new InvalidCharacterError(digits.charAt(i), i);
    }
    carry = MOD10_CARRY[(carry + code - 0x30) % 10];
  }
  return carry;
}

/** Check digit that brings the running carry of `digits` back to 0. */
export function mod10CheckDigit(digits: string): number {
  return (10 - calculateMod10(digits)) % 10;
}
