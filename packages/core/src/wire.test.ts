import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  fromJson,
  isWireList,
  isWireStruct,
  isWireValue,
  jsonValueSchema,
  isJsonValue,
  listToJson,
  structToJson,
  toJson,
  wireList,
  wireStruct,
  type JsonValue,
} from "./wire.js";

describe("wire format", () => {
  it("tags JSON values", () => {
    assert.deepEqual(fromJson([1, "a", null, { k: false }]), {
      kind: "list",
      value: {
        values: [
          { kind: "number", value: 1 },
          { kind: "string", value: "a" },
          { kind: "null" },
          { kind: "struct", value: { fields: { k: { kind: "bool", value: false } } } },
        ],
      },
    });
  });

  it("recovers the JSON form", () => {
    const json = { a: [1, 2.5, "x"], b: { c: null } };
    assert.deepEqual(toJson(fromJson(json)), json);
    assert.deepEqual(listToJson(wireList([true, []])), [true, []]);
  });

  it("recognises wire shapes", () => {
    assert.equal(isWireValue({ kind: "number", value: 1 }), true);
    assert.equal(isWireValue({ kind: "number", value: "1" }), false);
    assert.equal(isWireValue({ kind: "list", value: wireList([]) }), true);
    assert.equal(isWireValue({ kind: "set" }), false);
    assert.equal(isWireList({ values: [] }), true);
    assert.equal(isWireList([]), false);
    assert.equal(isWireStruct(wireStruct({})), true);
    assert.equal(isWireStruct({ fields: [] }), false);
  });

  it("validates JSON input", () => {
    assert.equal(jsonValueSchema.safeParse([1, { a: ["b"] }]).success, true);
    assert.equal(jsonValueSchema.safeParse([1, undefined]).success, false);
  });

  it("keeps a __proto__ key as an own field", () => {
    const entries: [string, JsonValue][] = [["__proto__", 1], ["a", 2]];
    const struct = wireStruct(Object.fromEntries(entries));
    assert.deepEqual(Object.keys(struct.fields), ["__proto__", "a"]);
    assert.equal(Object.getPrototypeOf(struct.fields), Object.prototype);
    const json = structToJson(struct);
    assert.deepEqual(Object.keys(json), ["__proto__", "a"]);
    assert.equal(Object.getPrototypeOf(json), Object.prototype);
  });

  it("validates without copying", () => {
    const parsed: unknown = JSON.parse('{"__proto__": 1}');
    assert.equal(isJsonValue(parsed), true);
    assert.equal(isJsonValue({ a: Symbol("s") }), false);
  });
});
