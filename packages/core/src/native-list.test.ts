import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { NativeListValue } from "./native-list.js";
import { ConcatListValue } from "./concat-list.js";
import { JsonListValue } from "./json-list.js";
import { defaultAdapter } from "./adapter.js";
import { BoolValue } from "./bool.js";
import { DoubleValue } from "./double.js";
import { IntValue } from "./int.js";
import { StringValue } from "./string.js";
import { UnknownValue } from "./unknown.js";
import { ConversionError } from "./errors.js";
import { NativeTypes } from "./native.js";
import { wireList } from "./wire.js";

describe("NativeListValue", () => {
  it("adapts elements on read", () => {
    const l = new NativeListValue(defaultAdapter, [1, "a", true]);
    assert.ok(l.get(IntValue.of(0)) instanceof DoubleValue);
    assert.equal(l.get(IntValue.of(1)).equal(StringValue.of("a")), BoolValue.True);
    assert.equal(l.get(IntValue.of(2)), BoolValue.True);
  });

  it("adapts nested arrays to lists", () => {
    const l = new NativeListValue(defaultAdapter, [[1, 2]]);
    const inner = l.get(IntValue.of(0));
    assert.ok(inner instanceof NativeListValue);
    assert.equal(inner.size().value(), 2n);
  });

  it("compares doubles with ints", () => {
    const l = new NativeListValue(defaultAdapter, [1, 2]);
    assert.equal(l.contains(IntValue.of(2)), BoolValue.True);
  });

  it("concatenates another native list eagerly", () => {
    const sum = new NativeListValue(defaultAdapter, [1]).add(new NativeListValue(defaultAdapter, ["b"]));
    assert.ok(sum instanceof NativeListValue);
    assert.deepEqual(sum.value(), [1, "b"]);
  });

  it("defers concatenation with a wire-backed list", () => {
    const sum = new NativeListValue(defaultAdapter, [1]).add(new JsonListValue(defaultAdapter, wireList([2])));
    assert.ok(sum instanceof ConcatListValue);
    assert.equal(sum.toString(), "[1, 2]");
  });

  it("returns the backing array as its value", () => {
    const elems = [1, 2];
    assert.equal(new NativeListValue(defaultAdapter, elems).value(), elems);
  });

  it("renders adapted elements", () => {
    assert.equal(new NativeListValue(defaultAdapter, [1.5, "a", null]).toString(), '[1.5, "a", null]');
  });

  it("converts to a wire list", () => {
    const l = new NativeListValue(defaultAdapter, [1, "a", [true]]);
    assert.deepEqual(l.convertToNative(NativeTypes.wireList), wireList([1, "a", [true]]));
  });

  it("reports elements with no wire form", () => {
    const l = new NativeListValue(defaultAdapter, [UnknownValue.Instance]);
    assert.throws(
      () => l.convertToNative(NativeTypes.wireList),
      (err: unknown) =>
        err instanceof ConversionError && err.message === "type conversion error from 'unknown' to 'wire.Value'"
    );
  });

  it("keeps unknown elements out of native arrays", () => {
    const l = new NativeListValue(defaultAdapter, [1, UnknownValue.Instance]);
    assert.throws(
      () => l.convertToNative(NativeTypes.arrayOf(NativeTypes.number)),
      (err: unknown) =>
        err instanceof ConversionError && err.message === "type conversion error from 'unknown' to 'number'"
    );
  });
});
