import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { DoubleType, IntType, StringType, TypeType } from "./types.js";
import { BoolValue } from "./bool.js";
import { IntValue } from "./int.js";
import { StringValue } from "./string.js";
import { ErrorValue, valOrErr } from "./err.js";
import { scalarToNative, type ScalarNatives } from "./scalar-native.js";

/**
 * IEEE-754 double value. Wire numbers adapt to this type by default.
 */
export class DoubleValue implements Val {
  private constructor(private readonly val: number) {}

  static of(val: number): DoubleValue {
    return new DoubleValue(val);
  }

  type(): TypeValue {
    return DoubleType;
  }

  equal(other: Val): Val {
    if (other instanceof DoubleValue) {
      return BoolValue.of(this.val === other.val);
    }
    if (other instanceof IntValue) {
      return BoolValue.of(other.equalsNumber(this.val));
    }
    return valOrErr(other, "no such overload");
  }

  value(): number {
    return this.val;
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === DoubleType) return this;
    if (typeVal === TypeType) return DoubleType;
    if (typeVal === StringType) return StringValue.of(String(this.val));
    if (typeVal === IntType) {
      if (!Number.isFinite(this.val)) {
        return ErrorValue.of(`double ${this.val} is not representable as int`);
      }
      return IntValue.checked(BigInt(Math.trunc(this.val)));
    }
    return ErrorValue.typeConversion(DoubleType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    const natives: ScalarNatives = { number: () => this.val };
    if (Number.isInteger(this.val)) {
      natives.bigint = () => BigInt(this.val);
    }
    return scalarToNative(this, typeDesc, { kind: "number", value: this.val }, natives);
  }

  toString(): string {
    return String(this.val);
  }
}
