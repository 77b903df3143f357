import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import type { Val } from "./ref.js";
import { BoolValue } from "./bool.js";
import { INT64_MAX, INT64_MIN, IntValue } from "./int.js";
import { DoubleValue } from "./double.js";
import { StringValue } from "./string.js";
import { NullValue } from "./null.js";
import { ErrorValue, isError, isUnknownOrError, valOrErr } from "./err.js";
import { UnknownValue } from "./unknown.js";
import { ConversionError } from "./errors.js";
import {
  BoolType,
  DoubleType,
  IntType,
  ListType,
  NullType,
  StringType,
  TypeType,
  TypeValue,
} from "./types.js";
import { NativeTypes, formatNativeType } from "./native.js";
import { unpackAny } from "./wire-any.js";
import { isWireAny } from "./wire.js";

function errMessage(v: Val): string {
  assert.ok(v instanceof ErrorValue, `expected an error value, got ${v.toString()}`);
  return v.getMessage();
}

function isConversionError(message: string): (err: unknown) => boolean {
  return (err) => err instanceof ConversionError && err.message === message;
}

describe("BoolValue", () => {
  it("has exactly two instances", () => {
    assert.equal(BoolValue.of(true), BoolValue.True);
    assert.equal(BoolValue.True.negate(), BoolValue.False);
  });

  it("compares with booleans only", () => {
    assert.equal(BoolValue.True.equal(BoolValue.True), BoolValue.True);
    assert.equal(errMessage(BoolValue.True.equal(IntValue.One)), "no such overload");
  });

  it("converts to string and native forms", () => {
    assert.equal(BoolValue.False.convertToType(StringType).value(), "false");
    assert.equal(BoolValue.True.convertToNative(NativeTypes.boolean), true);
    assert.deepEqual(BoolValue.True.convertToNative(NativeTypes.wireValue), { kind: "bool", value: true });
  });
});

describe("IntValue", () => {
  it("compares across int and double", () => {
    assert.equal(IntValue.of(3).equal(IntValue.of(3n)), BoolValue.True);
    assert.equal(IntValue.of(3).equal(DoubleValue.of(3)), BoolValue.True);
    assert.equal(IntValue.of(3).equal(DoubleValue.of(3.5)), BoolValue.False);
    assert.equal(errMessage(IntValue.of(3).equal(StringValue.of("3"))), "no such overload");
  });

  it("compares with doubles exactly past the safe-integer range", () => {
    const near = DoubleValue.of(2 ** 53);
    assert.equal(IntValue.of(2n ** 53n + 1n).equal(near), BoolValue.False);
    assert.equal(near.equal(IntValue.of(2n ** 53n + 1n)), BoolValue.False);
    assert.equal(IntValue.of(2n ** 53n).equal(near), BoolValue.True);
    assert.equal(DoubleValue.of(2 ** 60).equal(IntValue.of(2n ** 60n)), BoolValue.True);
  });

  it("checks the 64-bit range", () => {
    assert.equal(IntValue.checked(INT64_MAX).value(), 9223372036854775807n);
    assert.equal(IntValue.checked(INT64_MIN).value(), -9223372036854775808n);
    assert.equal(errMessage(IntValue.checked(INT64_MAX + 1n)), "integer overflow");
    assert.equal(errMessage(IntValue.checked(INT64_MIN - 1n)), "integer overflow");
  });

  it("orders values", () => {
    assert.equal(IntValue.of(1).compare(IntValue.of(2)), -1);
    assert.equal(IntValue.of(2).compare(IntValue.of(2)), 0);
  });

  it("converts between runtime types", () => {
    assert.equal(IntValue.of(5).convertToType(StringType).value(), "5");
    assert.equal(IntValue.of(5).convertToType(DoubleType).value(), 5);
    assert.equal(IntValue.of(5).convertToType(TypeType), IntType);
    assert.equal(errMessage(IntValue.of(5).convertToType(ListType)), "type conversion error from 'int' to 'list'");
  });

  it("converts to number only within the safe range", () => {
    assert.equal(IntValue.of(7).convertToNative(NativeTypes.number), 7);
    assert.equal(IntValue.of(7).convertToNative(NativeTypes.bigint), 7n);
    const big = IntValue.of(2n ** 60n);
    assert.equal(big.convertToNative(NativeTypes.bigint), 2n ** 60n);
    assert.throws(
      () => big.convertToNative(NativeTypes.number),
      isConversionError("type conversion error from 'int' to 'number'")
    );
  });

  it("has no wire form past the safe-integer range", () => {
    const big = IntValue.of(2n ** 53n + 1n);
    assert.throws(
      () => big.convertToNative(NativeTypes.wireValue),
      isConversionError("type conversion error from 'int' to 'wire.Value'")
    );
    assert.throws(
      () => big.convertToNative(NativeTypes.wireAny),
      isConversionError("type conversion error from 'int' to 'wire.Any'")
    );
  });

  it("packs into an any envelope as a number", () => {
    const packed = IntValue.of(7).convertToNative(NativeTypes.wireAny);
    assert.ok(isWireAny(packed));
    assert.deepEqual(unpackAny(packed), { type: "wire.Value", message: { kind: "number", value: 7 } });
  });
});

describe("DoubleValue", () => {
  it("truncates when converted to int", () => {
    assert.equal(DoubleValue.of(1.9).convertToType(IntType).value(), 1n);
    assert.equal(
      errMessage(DoubleValue.of(Infinity).convertToType(IntType)),
      "double Infinity is not representable as int"
    );
  });

  it("reports doubles outside the int range", () => {
    assert.equal(errMessage(DoubleValue.of(1e300).convertToType(IntType)), "integer overflow");
    assert.equal(errMessage(DoubleValue.of(2 ** 63).convertToType(IntType)), "integer overflow");
    assert.equal(DoubleValue.of(-(2 ** 63)).convertToType(IntType).value(), -9223372036854775808n);
    assert.equal(errMessage(DoubleValue.of(NaN).convertToType(IntType)), "double NaN is not representable as int");
  });

  it("converts to bigint only when integral", () => {
    assert.equal(DoubleValue.of(4).convertToNative(NativeTypes.bigint), 4n);
    assert.throws(
      () => DoubleValue.of(4.5).convertToNative(NativeTypes.bigint),
      isConversionError("type conversion error from 'double' to 'bigint'")
    );
  });

  it("renders like a number", () => {
    assert.equal(DoubleValue.of(2.5).toString(), "2.5");
  });
});

describe("StringValue", () => {
  it("parses numeric and boolean text", () => {
    assert.equal(StringValue.of("42").convertToType(IntType).value(), 42n);
    assert.equal(StringValue.of("2.5").convertToType(DoubleType).value(), 2.5);
    assert.equal(StringValue.of("true").convertToType(BoolType), BoolValue.True);
  });

  it("reports int text outside the 64-bit range", () => {
    assert.equal(errMessage(StringValue.of("99999999999999999999999").convertToType(IntType)), "integer overflow");
    assert.equal(StringValue.of("-9223372036854775808").convertToType(IntType).value(), -9223372036854775808n);
  });

  it("reports unparseable text", () => {
    assert.equal(errMessage(StringValue.of("4x").convertToType(IntType)), "cannot convert '4x' to int");
    assert.equal(errMessage(StringValue.of("").convertToType(DoubleType)), "cannot convert '' to double");
    assert.equal(errMessage(StringValue.of("yes").convertToType(BoolType)), "cannot convert 'yes' to bool");
  });

  it("renders quoted", () => {
    assert.equal(StringValue.of('say "hi"').toString(), '"say \\"hi\\""');
  });
});

describe("NullValue", () => {
  it("equals only null", () => {
    assert.equal(NullValue.Instance.equal(NullValue.Instance), BoolValue.True);
    assert.equal(errMessage(NullValue.Instance.equal(BoolValue.False)), "no such overload");
  });

  it("converts to null and the wire null", () => {
    assert.equal(NullValue.Instance.convertToNative(NativeTypes.null), null);
    assert.deepEqual(NullValue.Instance.convertToNative(NativeTypes.wireValue), { kind: "null" });
    assert.equal(NullValue.Instance.type(), NullType);
  });
});

describe("TypeValue", () => {
  it("is a value of type type", () => {
    assert.equal(IntType.type(), TypeType);
    assert.equal(IntType.equal(new TypeValue("int")), BoolValue.True);
    assert.equal(IntType.equal(DoubleType), BoolValue.False);
    assert.equal(IntType.convertToType(StringType).value(), "int");
  });
});

describe("ErrorValue and UnknownValue", () => {
  it("absorb comparisons and conversions", () => {
    const err = ErrorValue.of("boom");
    assert.equal(err.equal(IntValue.One), err);
    assert.equal(err.convertToType(StringType), err);
    assert.equal(UnknownValue.Instance.equal(err), UnknownValue.Instance);
  });

  it("lets unknown cross the native boundary only as itself", () => {
    assert.equal(UnknownValue.Instance.convertToNative(NativeTypes.dynamic), UnknownValue.Instance);
    assert.throws(
      () => UnknownValue.Instance.convertToNative(NativeTypes.number),
      isConversionError("type conversion error from 'unknown' to 'number'")
    );
  });

  it("throws the error message at the native boundary", () => {
    assert.throws(() => ErrorValue.of("boom").convertToNative(NativeTypes.string), isConversionError("boom"));
  });

  it("builds adaptation errors", () => {
    assert.equal(ErrorValue.unsupportedAdaptation("Date").getMessage(), "unsupported type conversion: 'Date'");
  });

  it("renders", () => {
    assert.equal(ErrorValue.of("boom").toString(), "error: boom");
    assert.equal(UnknownValue.Instance.toString(), "unknown");
  });

  it("merges attribute ids", () => {
    assert.deepEqual(UnknownValue.of([1, 2]).merge(UnknownValue.of([2, 3])).value(), [1, 2, 3]);
  });

  it("classifies values", () => {
    assert.equal(isError(ErrorValue.of("x")), true);
    assert.equal(isUnknownOrError(UnknownValue.Instance), true);
    assert.equal(isUnknownOrError(NullValue.Instance), false);
  });

  it("passes errors through valOrErr", () => {
    const err = ErrorValue.of("first");
    assert.equal(valOrErr(err, "second"), err);
    assert.equal(errMessage(valOrErr(IntValue.One, "second")), "second");
  });
});

describe("formatNativeType", () => {
  it("names compound descriptors", () => {
    assert.equal(formatNativeType(NativeTypes.arrayOf(NativeTypes.recordOf(NativeTypes.string))), "Record<string, string>[]");
    assert.equal(formatNativeType(NativeTypes.dynamic), "interface unknown");
    assert.equal(formatNativeType(NativeTypes.wireAny), "wire.Any");
  });
});
