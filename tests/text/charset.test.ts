import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  isAlphaNumeric,
  isNumeric,
  isPermittedCharCode,
  isPermittedText,
  removeWhitespace,
} from "../../src/text/charset";

describe("isPermittedCharCode", () => {
  it("accepts printable ASCII except the caret", () => {
    assert.equal(isPermittedCharCode(0x20), true);
    assert.equal(isPermittedCharCode(0x41), true);
    assert.equal(isPermittedCharCode(0x7e), true);
    assert.equal(isPermittedCharCode(0x5e), false);
    assert.equal(isPermittedCharCode(0x7f), false);
    assert.equal(isPermittedCharCode(0x1f), false);
  });

  it("accepts the Latin-1 letters minus the excluded ones", () => {
    assert.equal(isPermittedCharCode(0xa3), true);
    assert.equal(isPermittedCharCode(0xb4), true);
    assert.equal(isPermittedCharCode(0xa0), false);
    assert.equal(isPermittedCharCode(0xc0), true);
    assert.equal(isPermittedCharCode(0xfd), true);
    assert.equal(isPermittedCharCode(0xfe), false);
    for (const excluded of [0xc3, 0xc5, 0xc6, 0xd0, 0xd5, 0xd7, 0xd8, 0xdd, 0xde, 0xe3, 0xe5, 0xe6, 0xf0, 0xf5, 0xf8]) {
      assert.equal(isPermittedCharCode(excluded), false, excluded.toString(16));
    }
  });

  it("rejects everything above 0xFF", () => {
    assert.equal(isPermittedCharCode(0x100), false);
    assert.equal(isPermittedCharCode(0x20ac), false);
  });
});

describe("string predicates", () => {
  it("checks whole strings", () => {
    assert.equal(isPermittedText("Z\u00fcrich 8000"), true);
    assert.equal(isPermittedText("Z\u00fcrich^"), false);
    assert.equal(isNumeric("0123456789"), true);
    assert.equal(isNumeric("12 3"), false);
    assert.equal(isAlphaNumeric("RF18abc"), true);
    assert.equal(isAlphaNumeric("RF18-abc"), false);
    assert.equal(isAlphaNumeric("\u00c41"), false);
  });

  it("removes every kind of whitespace", () => {
    assert.equal(removeWhitespace(" CH93 0076\t2011\u00a06238\n"), "CH93007620116238");
  });
});
