import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { PaymentFieldError } from "../../src/utils/errors";
import { FIELD_LIMITS, validatePaymentTextField, validateTextField } from "../../src/validation/fields";

describe("validateTextField", () => {
  it("passes clean values through without messages", () => {
    assert.deepEqual(validateTextField("town", "  Z\u00fcrich ", { maxLength: 35 }), {
      value: "Z\u00fcrich",
      messages: [],
    });
  });

  it("warns when characters were replaced", () => {
    assert.deepEqual(validateTextField("name", "Caf\u00e9^ M\u00fcller", { maxLength: 70 }), {
      value: "Caf\u00e9. M\u00fcller",
      messages: [{ field: "name", type: "warning", code: "replaced_unsupported_characters" }],
    });
  });

  it("clips by code point and trims the cut", () => {
    assert.deepEqual(validateTextField("street", "abcd efgh", { maxLength: 5 }), {
      value: "abcd",
      messages: [{ field: "street", type: "warning", code: "field_value_clipped" }],
    });
    assert.deepEqual(validateTextField("street", "\u00e9\u00e9\u00e9\u00e9\u00e9", { maxLength: 3 }), {
      value: "\u00e9\u00e9\u00e9",
      messages: [{ field: "street", type: "warning", code: "field_value_clipped" }],
    });
  });

  it("reports both replacement and clipping", () => {
    const result = validateTextField("name", "^^^^^^", { maxLength: 4 });
    assert.equal(result.value, "....");
    assert.deepEqual(
      result.messages.map((message) => message.code),
      ["replaced_unsupported_characters", "field_value_clipped"]
    );
  });

  it("warns about unsupported whitespace trimmed from the ends", () => {
    assert.deepEqual(validateTextField("name", "\tName", { maxLength: 70 }), {
      value: "Name",
      messages: [{ field: "name", type: "warning", code: "replaced_unsupported_characters" }],
    });
  });

  it("rejects a maximum length below one", () => {
    for (const maxLength of [0, -3, 2.5]) {
      assert.throws(
        () => validateTextField("name", "Name", { maxLength, required: true }),
        (err: unknown) => err instanceof PaymentFieldError && err.code === "INVALID_MAX_LENGTH"
      );
    }
  });

  it("flags missing required values only", () => {
    assert.deepEqual(validateTextField("name", " \t ", { maxLength: 70, required: true }), {
      value: undefined,
      messages: [{ field: "name", type: "error", code: "field_value_missing" }],
    });
    assert.deepEqual(validateTextField("name", undefined, { maxLength: 70 }), { value: undefined, messages: [] });
  });
});

describe("validatePaymentTextField", () => {
  it("applies the standard field limits", () => {
    assert.equal(FIELD_LIMITS.town, 35);
    const result = validatePaymentTextField("town", "A".repeat(40));
    assert.equal(result.value, "A".repeat(35));
    assert.deepEqual(result.messages, [{ field: "town", type: "warning", code: "field_value_clipped" }]);
  });

  it("passes the required flag through", () => {
    assert.deepEqual(validatePaymentTextField("name", "", true).messages, [
      { field: "name", type: "error", code: "field_value_missing" },
    ]);
  });
});
