export class PaymentFieldError extends Error {
  code: string;
  detail?: string;

  constructor(code: string, title: string, detail?: string) {
    super(title);
    this.name = "PaymentFieldError";
    this.code = code;
    this.detail = detail ?? title;
  }
}

export class InvalidCharacterError extends PaymentFieldError {
  readonly character: string;
  readonly position: number;

  constructor(character: string, position: number) {
    super("INVALID_CHARACTER", `Invalid character in reference: ${character}`, `position ${position}`);
    this.name = "InvalidCharacterError";
    this.character = character;
    this.position = position;
  }
}

export function isPaymentFieldError(err: unknown): err is PaymentFieldError {
  return err instanceof PaymentFieldError;
}
