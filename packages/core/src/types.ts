/**
 * Runtime type descriptors. A type is itself a value whose type is `type`.
 */
import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import { BoolValue } from "./bool.js";
import { StringValue } from "./string.js";
import { ErrorValue, valOrErr } from "./err.js";
import { scalarToNative } from "./scalar-native.js";

export class TypeValue implements Val {
  constructor(readonly name: string) {}

  type(): TypeValue {
    return TypeType;
  }

  equal(other: Val): Val {
    if (other instanceof TypeValue) {
      return BoolValue.of(this.name === other.name);
    }
    return valOrErr(other, "no such overload");
  }

  value(): string {
    return this.name;
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === TypeType) return TypeType;
    if (typeVal === StringType) return StringValue.of(this.name);
    return ErrorValue.typeConversion(TypeType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    return scalarToNative(this, typeDesc, { kind: "string", value: this.name }, {
      string: () => this.name,
    });
  }

  toString(): string {
    return this.name;
  }
}

export const BoolType = new TypeValue("bool");
export const IntType = new TypeValue("int");
export const DoubleType = new TypeValue("double");
export const StringType = new TypeValue("string");
export const NullType = new TypeValue("null_type");
export const ListType = new TypeValue("list");
export const MapType = new TypeValue("map");
export const TypeType = new TypeValue("type");
export const ErrorType = new TypeValue("error");
export const UnknownType = new TypeValue("unknown");
export const IteratorType = new TypeValue("iterator");
