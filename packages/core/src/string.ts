import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { BoolType, DoubleType, IntType, StringType, TypeType } from "./types.js";
import { BoolValue } from "./bool.js";
import { DoubleValue } from "./double.js";
import { IntValue } from "./int.js";
import { ErrorValue, valOrErr } from "./err.js";
import { scalarToNative } from "./scalar-native.js";

export class StringValue implements Val {
  private constructor(private readonly val: string) {}

  static of(val: string): StringValue {
    return new StringValue(val);
  }

  type(): TypeValue {
    return StringType;
  }

  equal(other: Val): Val {
    if (other instanceof StringValue) {
      return BoolValue.of(this.val === other.val);
    }
    return valOrErr(other, "no such overload");
  }

  value(): string {
    return this.val;
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === StringType) return this;
    if (typeVal === TypeType) return StringType;
    if (typeVal === IntType) {
      if (!/^-?\d+$/.test(this.val)) {
        return ErrorValue.of(`cannot convert '${this.val}' to int`);
      }
      return IntValue.checked(BigInt(this.val));
    }
    if (typeVal === DoubleType) {
      const n = Number(this.val);
      if (this.val.trim() === "" || Number.isNaN(n)) {
        return ErrorValue.of(`cannot convert '${this.val}' to double`);
      }
      return DoubleValue.of(n);
    }
    if (typeVal === BoolType) {
      if (this.val === "true") return BoolValue.True;
      if (this.val === "false") return BoolValue.False;
      return ErrorValue.of(`cannot convert '${this.val}' to bool`);
    }
    return ErrorValue.typeConversion(StringType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    return scalarToNative(this, typeDesc, { kind: "string", value: this.val }, {
      string: () => this.val,
    });
  }

  toString(): string {
    return JSON.stringify(this.val);
  }
}
