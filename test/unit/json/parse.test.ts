import assert from "node:assert/strict";
import { test } from "vitest";

import { JsonError } from "../../../src/core/errors.js";
import type { JsonValue } from "../../../src/core/types.js";
import { parseJson, positionAt } from "../../../src/json/parse.js";

const expectMessage = (text: string, message: string): void => {
  assert.throws(
    () => parseJson(text),
    (error: unknown) => {
      assert.ok(error instanceof JsonError);
      assert.equal(error.message, message);
      return true;
    }
  );
};

const objectKeys = (value: JsonValue): string[] => {
  assert.equal(value.kind, "object");
  return value.kind === "object" ? [...value.entries.keys()] : [];
};

test("parseJson keeps insertion order, numeric-looking keys included", () => {
  assert.deepEqual(objectKeys(parseJson('{"b":1,"a":2,"10":3}')), ["b", "a", "10"]);
});

test("parseJson keeps the first position and last value of a repeated key", () => {
  const value = parseJson('{"a":1,"b":2,"a":3}');
  assert.deepEqual(objectKeys(value), ["a", "b"]);
  assert.ok(value.kind === "object");
  assert.deepEqual(value.entries.get("a"), { kind: "number", raw: "3" });
});

test("parseJson keeps number lexemes", () => {
  const value = parseJson("[1.0, 1e5, 12345678901234567890, -0]");
  assert.ok(value.kind === "array");
  assert.deepEqual(
    value.items.map((item) => (item.kind === "number" ? item.raw : null)),
    ["1.0", "1e5", "12345678901234567890", "-0"]
  );
});

test("parseJson decodes string escapes", () => {
  assert.deepEqual(parseJson('"a\\u00e9\\n\\"b\\/"'), { kind: "string", value: 'aé\n"b/' });
  assert.deepEqual(parseJson(" [true, false, null] "), {
    kind: "array",
    items: [
      { kind: "boolean", value: true },
      { kind: "boolean", value: false },
      { kind: "null" },
    ],
  });
});

test("parseJson reports what it expected and where", () => {
  expectMessage('{"a":}', "Expecting value: line 1 column 6 (char 5)");
  expectMessage("[1,]", "Expecting value: line 1 column 4 (char 3)");
  expectMessage('{"a":1,}', "Expecting property name enclosed in double quotes: line 1 column 8 (char 7)");
  expectMessage('{"a" 1}', "Expecting ':' delimiter: line 1 column 6 (char 5)");
  expectMessage("[1 2]", "Expecting ',' delimiter: line 1 column 4 (char 3)");
  expectMessage("{} 1", "Extra data: line 1 column 4 (char 3)");
  expectMessage('"abc', "Unterminated string starting at: line 1 column 1 (char 0)");
  expectMessage("NaN", "Invalid symbol: line 1 column 1 (char 0)");
  expectMessage('{"a": 1 // c\n}', "Unexpected comment: line 1 column 9 (char 8)");
  expectMessage("", "Expecting value: line 1 column 1 (char 0)");
  expectMessage('{\n  "a": \n}', "Expecting value: line 3 column 1 (char 10)");
});

test("parseJson rejects bad escapes", () => {
  assert.throws(
    () => parseJson('"\\x"'),
    (error: unknown) => {
      assert.ok(error instanceof JsonError);
      assert.ok(error.message.startsWith("Invalid \\escape: line 1 column "));
      return true;
    }
  );
});

test("JsonError exposes the structured position", () => {
  assert.throws(
    () => parseJson('{\n"a" 1}'),
    (error: unknown) => {
      assert.ok(error instanceof JsonError);
      assert.deepEqual(error.position, { offset: 6, line: 2, column: 5 });
      return true;
    }
  );
  assert.deepEqual(positionAt("ab\ncd", 4), { offset: 4, line: 2, column: 2 });
});
