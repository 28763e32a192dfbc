// Latin-1 letters the payment standard refuses even though the rest of 0xC0-0xFD is accepted.
const EXCLUDED_LATIN1 = new Set([
  0xc3, 0xc5, 0xc6, 0xd0, 0xd5, 0xd7, 0xd8, 0xdd, 0xde, 0xe3, 0xe5, 0xe6, 0xf0, 0xf5, 0xf8,
]);

function buildPermittedTable(): Uint8Array {
  const table = new Uint8Array(0x100);
  for (let code = 0x20; code <= 0x7e; code++) {
    table[code] = 1;
  }
  table[0x5e] = 0;
  table[0xa3] = 1;
  table[0xb4] = 1;
  for (let code = 0xc0; code <= 0xfd; code++) {
    table[code] = EXCLUDED_LATIN1.has(code) ? 0 : 1;
  }
  return table;
}

const PERMITTED = buildPermittedTable();

/**
 * Whether a single UTF-16 code unit belongs to the payment slip character set.
 * Everything above 0xFF is rejected.
 */
export function isPermittedCharCode(code: number): boolean {
  return code >= 0 && code < PERMITTED.length && PERMITTED[code] === 1;
}

export function isPermittedText(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (!isPermittedCharCode(value.charCodeAt(i))) return false;
  }
  return true;
}

export function isAsciiDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

export function isAsciiLetter(code: number): boolean {
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

export function isNumeric(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (!isAsciiDigit(value.charCodeAt(i))) return false;
  }
  return true;
}

export function isAlphaNumeric(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (!isAsciiDigit(code) && !isAsciiLetter(code)) return false;
  }
  return true;
}

const WHITESPACE = /\s/u;

export function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

export function removeWhitespace(value: string): string {
  return value.replace(/\s+/gu, "");
}
