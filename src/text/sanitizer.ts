import { isPermittedCharCode, isWhitespace } from "./charset";

export interface CleaningOutcome {
  /** Cleaned text, `undefined` if nothing visible is left. */
  cleanedValue: string | undefined;
  /** Set if at least one character had to be replaced or dropped. */
  wasModified: boolean;
}

interface ScanPass {
  text: string;
  substituted: boolean;
}

const RESTART_NORMALIZED = Symbol("restart-normalized");

const SPACING_COMBINING_MARK = /^\p{Mc}$/u;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function trimSpaces(value: string): string {
  return value.replace(/^ +| +$/g, "");
}

function scanValue(value: string, checkNormalization: false): ScanPass;
function scanValue(value: string, checkNormalization: boolean): ScanPass | typeof RESTART_NORMALIZED;
function scanValue(value: string, checkNormalization: boolean): ScanPass | typeof RESTART_NORMALIZED {
  const len = value.length;
  let output = "";
  let substituted = false;
  let justProcessedSpace = false;
  let lastCopiedPos = 0;
  let pendingCheck = checkNormalization;

  // Runs of permitted characters are copied in one slice once an invalid character shows up.
  let pos = 0;
  while (pos < len) {
    const code = value.charCodeAt(pos);

    if (isPermittedCharCode(code)) {
      justProcessedSpace = code === 0x20;
      pos++;
      continue;
    }

    if (code > 0xff && pendingCheck) {
      pendingCheck = false;
      if (value.normalize("NFC") !== value) {
        return RESTART_NORMALIZED;
      }
    }

    if (pos > lastCopiedPos) {
      output += value.slice(lastCopiedPos, pos);
    }
    substituted = true;

    if (isHighSurrogate(code)) {
      const codePoint = value.codePointAt(pos) ?? code;
      if (!SPACING_COMBINING_MARK.test(String.fromCodePoint(codePoint))) {
        output += ".";
      }
      justProcessedSpace = false;
      pos += codePoint > 0xffff ? 2 : 1;
    } else if (isWhitespace(value.charAt(pos))) {
      if (!justProcessedSpace) {
        output += " ";
      }
      justProcessedSpace = true;
      pos++;
    } else {
      output += ".";
      justProcessedSpace = false;
      pos++;
    }
    lastCopiedPos = pos;
  }

  if (!substituted) {
    return { text: value, substituted };
  }
  if (lastCopiedPos < len) {
    output += value.slice(lastCopiedPos);
  }
  return { text: output, substituted };
}

/**
 * Reduces a text to the payment slip character set.
 *
 * Unsupported whitespace becomes a single space, every other unsupported
 * character a dot. Supplementary characters count as one character, and
 * spacing combining marks among them are dropped. When a character above
 * 0xFF turns up in a string that is not NFC, the string is normalized once
 * and scanned again so decomposed accents can merge into permitted letters.
 */
export function clean(text?: string | null): CleaningOutcome {
  if (text === undefined || text === null || text.trim().length === 0) {
    return { cleanedValue: undefined, wasModified: false };
  }

  let source = text;
  let pass = scanValue(source, true);
  if (pass === RESTART_NORMALIZED) {
    source = source.normalize("NFC");
    pass = scanValue(source, false);
  }

  const cleanedValue = trimSpaces(pass.text);
  return {
    cleanedValue: cleanedValue.length > 0 ? cleanedValue : undefined,
    wasModified: pass.substituted,
  };
}
