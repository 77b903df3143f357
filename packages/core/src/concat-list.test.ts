import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import type { Val } from "./ref.js";
import { ConcatListValue } from "./concat-list.js";
import { JsonListValue } from "./json-list.js";
import { NativeListValue } from "./native-list.js";
import { WireAdapter } from "./adapter.js";
import { BoolValue } from "./bool.js";
import { IntValue } from "./int.js";
import { ErrorValue } from "./err.js";
import { ConversionError } from "./errors.js";
import { ListType, TypeType } from "./types.js";
import { NativeTypes } from "./native.js";
import { wireList } from "./wire.js";

const adapter = new WireAdapter({ integralNumbersAsInt: true });

function concat(): ConcatListValue {
  const sum = new JsonListValue(adapter, wireList([1, 2])).add(new NativeListValue(adapter, [3, 4]));
  assert.ok(sum instanceof ConcatListValue);
  return sum;
}

function errMessage(v: Val): string {
  assert.ok(v instanceof ErrorValue, `expected an error value, got ${v.toString()}`);
  return v.getMessage();
}

describe("ConcatListValue", () => {
  it("sums the operand sizes", () => {
    assert.equal(concat().size().value(), 4n);
  });

  it("routes reads to the list holding the position", () => {
    const l = concat();
    assert.deepEqual(
      [0, 1, 2, 3].map((i) => l.get(IntValue.of(i)).toString()),
      ["1", "2", "3", "4"]
    );
  });

  it("checks indices against the combined size", () => {
    assert.equal(errMessage(concat().get(IntValue.of(4))), "index '4' out of range in list size '4'");
  });

  it("finds elements in either operand", () => {
    const l = concat();
    assert.equal(l.contains(IntValue.of(1)), BoolValue.True);
    assert.equal(l.contains(IntValue.of(4)), BoolValue.True);
    assert.equal(l.contains(IntValue.of(5)), BoolValue.False);
  });

  it("equals a flat list with the same elements", () => {
    assert.equal(concat().equal(new JsonListValue(adapter, wireList([1, 2, 3, 4]))), BoolValue.True);
    assert.equal(concat().equal(new JsonListValue(adapter, wireList([1, 2, 4, 3]))), BoolValue.False);
  });

  it("nests further concatenations", () => {
    const more = concat().add(new JsonListValue(adapter, wireList([5])));
    assert.ok(more instanceof ConcatListValue);
    assert.equal(more.size().value(), 5n);
    assert.equal(more.get(IntValue.of(4)).toString(), "5");
  });

  it("rejects non-list operands", () => {
    assert.equal(errMessage(concat().add(IntValue.of(1))), "no such overload");
  });

  it("collects element values", () => {
    assert.deepEqual(concat().value(), [1n, 2n, 3n, 4n]);
  });

  it("iterates over both operands", () => {
    const iter = concat().iterator();
    const seen: string[] = [];
    for (let next = iter.next(); next !== undefined; next = iter.next()) {
      seen.push(next.toString());
    }
    assert.deepEqual(seen, ["1", "2", "3", "4"]);
    assert.equal(iter.hasNext(), BoolValue.False);
  });

  it("converts to list and type", () => {
    const l = concat();
    assert.equal(l.convertToType(ListType), l);
    assert.equal(l.convertToType(TypeType), ListType);
  });

  it("converts to native arrays and wire lists", () => {
    assert.deepEqual(concat().convertToNative(NativeTypes.arrayOf(NativeTypes.number)), [1, 2, 3, 4]);
    assert.deepEqual(concat().convertToNative(NativeTypes.wireList), wireList([1, 2, 3, 4]));
    assert.deepEqual(concat().convertToNative(NativeTypes.wireValue), {
      kind: "list",
      value: wireList([1, 2, 3, 4]),
    });
  });

  it("names its element type in conversion errors", () => {
    assert.throws(
      () => concat().convertToNative(NativeTypes.boolean),
      (err: unknown) =>
        err instanceof ConversionError &&
        err.message === "no conversion found from list type to native type. list elem: dyn, native type: boolean"
    );
  });

  it("renders both operands", () => {
    assert.equal(concat().toString(), "[1, 2, 3, 4]");
  });
});
