import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { NullType, StringType, TypeType } from "./types.js";
import { BoolValue } from "./bool.js";
import { StringValue } from "./string.js";
import { ErrorValue, valOrErr } from "./err.js";
import { scalarToNative } from "./scalar-native.js";

export class NullValue implements Val {
  static readonly Instance = new NullValue();

  private constructor() {}

  type(): TypeValue {
    return NullType;
  }

  equal(other: Val): Val {
    if (other instanceof NullValue) return BoolValue.True;
    return valOrErr(other, "no such overload");
  }

  value(): null {
    return null;
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === NullType) return this;
    if (typeVal === TypeType) return NullType;
    if (typeVal === StringType) return StringValue.of("null");
    return ErrorValue.typeConversion(NullType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    return scalarToNative(this, typeDesc, { kind: "null" }, { null: () => null });
  }

  toString(): string {
    return "null";
  }
}

export const Null = NullValue.Instance;
