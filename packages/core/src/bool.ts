import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { BoolType, StringType, TypeType } from "./types.js";
import { StringValue } from "./string.js";
import { ErrorValue, valOrErr } from "./err.js";
import { scalarToNative } from "./scalar-native.js";

/**
 * Boolean value. Only the `True` and `False` singletons exist, so results
 * may be compared by identity.
 */
export class BoolValue implements Val {
  static readonly True = new BoolValue(true);
  static readonly False = new BoolValue(false);

  private constructor(private readonly val: boolean) {}

  static of(val: boolean): BoolValue {
    return val ? BoolValue.True : BoolValue.False;
  }

  type(): TypeValue {
    return BoolType;
  }

  equal(other: Val): Val {
    if (other instanceof BoolValue) {
      return BoolValue.of(this.val === other.val);
    }
    return valOrErr(other, "no such overload");
  }

  value(): boolean {
    return this.val;
  }

  negate(): BoolValue {
    return BoolValue.of(!this.val);
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === BoolType) return this;
    if (typeVal === TypeType) return BoolType;
    if (typeVal === StringType) return StringValue.of(String(this.val));
    return ErrorValue.typeConversion(BoolType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    return scalarToNative(this, typeDesc, { kind: "bool", value: this.val }, {
      boolean: () => this.val,
    });
  }

  toString(): string {
    return String(this.val);
  }
}

export const True = BoolValue.True;
export const False = BoolValue.False;
