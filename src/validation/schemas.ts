import { z } from "zod";
import {
  isValidBankIdentifierReference,
  isValidNumericPaymentReference,
  isValidStructuredCreditorReference,
} from "../rails/references";
import { removeWhitespace } from "../text/charset";
import { clean } from "../text/sanitizer";

const compact = z.string().transform((value) => removeWhitespace(value));

export const bankIdentifierReferenceSchema = compact
  .transform((value) => value.toUpperCase())
  .refine(isValidBankIdentifierReference, { message: "IBAN is invalid" });

export const structuredCreditorReferenceSchema = compact
  .transform((value) => value.toUpperCase())
  .refine(isValidStructuredCreditorReference, { message: "Creditor reference is invalid" });

export const numericPaymentReferenceSchema = compact.refine(isValidNumericPaymentReference, {
  message: "QR reference is invalid",
});

export function paymentTextSchema(maxLength: number) {
  return z
    .string()
    .transform((value) => clean(value).cleanedValue ?? "")
    .refine((value) => Array.from(value).length <= maxLength, {
      message: `Must be at most ${maxLength} characters`,
    });
}

export type BankIdentifierReference = z.infer<typeof bankIdentifierReferenceSchema>;
export type StructuredCreditorReference = z.infer<typeof structuredCreditorReferenceSchema>;
export type NumericPaymentReference = z.infer<typeof numericPaymentReferenceSchema>;
