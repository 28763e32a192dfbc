export { clean, type CleaningOutcome } from "./text/sanitizer";
export {
  isAlphaNumeric,
  isNumeric,
  isPermittedCharCode,
  isPermittedText,
  removeWhitespace,
} from "./text/charset";
export { calculateMod10, calculateMod97, mod10CheckDigit } from "./rails/checksums";
export {
  createNumericPaymentReference,
  createStructuredCreditorReference,
  detectReferenceType,
  formatBankIdentifierReference,
  formatNumericPaymentReference,
  isQrIban,
  isValidBankIdentifierReference,
  isValidNumericPaymentReference,
  isValidStructuredCreditorReference,
  NUMERIC_REFERENCE_LENGTH,
  type ReferenceType,
} from "./rails/references";
export {
  FIELD_LIMITS,
  validatePaymentTextField,
  validateTextField,
  type FieldMessage,
  type FieldMessageCode,
  type FieldValidation,
  type PaymentTextField,
  type TextFieldOptions,
} from "./validation/fields";
export {
  bankIdentifierReferenceSchema,
  numericPaymentReferenceSchema,
  paymentTextSchema,
  structuredCreditorReferenceSchema,
} from "./validation/schemas";
export { InvalidCharacterError, PaymentFieldError, isPaymentFieldError } from "./utils/errors";
export { applyConfigDefaults, loadConfig, loadEnvFile, type CoreConfig } from "./config/env";
export { createLogger, getLogger } from "./ops/logs";
