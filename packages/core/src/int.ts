import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { DoubleType, IntType, StringType, TypeType } from "./types.js";
import { BoolValue } from "./bool.js";
import { DoubleValue } from "./double.js";
import { StringValue } from "./string.js";
import { ErrorValue, valOrErr } from "./err.js";
import { scalarToNative, type ScalarNatives } from "./scalar-native.js";

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * Signed 64-bit integer value. `of` trusts its caller; conversions from
 * other types go through `checked`.
 */
export class IntValue implements Val {
  static readonly Zero = new IntValue(0n);
  static readonly One = new IntValue(1n);

  private constructor(private readonly val: bigint) {}

  static of(val: bigint | number): IntValue {
    const v = typeof val === "number" ? BigInt(Math.trunc(val)) : val;
    if (v === 0n) return IntValue.Zero;
    if (v === 1n) return IntValue.One;
    return new IntValue(v);
  }

  /** `IntValue` for `val`, or an overflow error outside the 64-bit range. */
  static checked(val: bigint): Val {
    if (val < INT64_MIN || val > INT64_MAX) {
      return ErrorValue.intOverflow();
    }
    return IntValue.of(val);
  }

  type(): TypeValue {
    return IntType;
  }

  equal(other: Val): Val {
    if (other instanceof IntValue) {
      return BoolValue.of(this.val === other.val);
    }
    if (other instanceof DoubleValue) {
      return BoolValue.of(this.equalsNumber(other.value()));
    }
    return valOrErr(other, "no such overload");
  }

  /** Exact comparison with a double; no rounding through `Number`. */
  equalsNumber(n: number): boolean {
    return Number.isInteger(n) && this.val === BigInt(n);
  }

  value(): bigint {
    return this.val;
  }

  compare(other: IntValue): number {
    if (this.val < other.val) return -1;
    if (this.val > other.val) return 1;
    return 0;
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === IntType) return this;
    if (typeVal === TypeType) return IntType;
    if (typeVal === DoubleType) return DoubleValue.of(Number(this.val));
    if (typeVal === StringType) return StringValue.of(this.val.toString());
    return ErrorValue.typeConversion(IntType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    const asNumber = Number(this.val);
    const natives: ScalarNatives = { bigint: () => this.val };
    if (!Number.isSafeInteger(asNumber)) {
      return scalarToNative(this, typeDesc, undefined, natives);
    }
    natives.number = () => asNumber;
    return scalarToNative(this, typeDesc, { kind: "number", value: asNumber }, natives);
  }

  toString(): string {
    return this.val.toString();
  }
}
