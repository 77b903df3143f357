/**
 * Record value backed by a wire-format struct.
 */
import type { TypeAdapter, Val } from "./ref.js";
import type { NativeType } from "./native.js";
import { formatNativeType } from "./native.js";
import type { Iterator, Mapper } from "./traits.js";
import { isMapper } from "./traits.js";
import type { TypeValue } from "./types.js";
import { MapType, TypeType } from "./types.js";
import { BoolValue } from "./bool.js";
import { IntValue } from "./int.js";
import { StringValue } from "./string.js";
import { ErrorValue, isUnknownOrError, valOrErr } from "./err.js";
import { ConversionError } from "./errors.js";
import { BaseIterator } from "./base-iterator.js";
import type { WireStruct, WireValue } from "./wire.js";
import { packAny } from "./wire-any.js";

export function newJsonStruct(adapter: TypeAdapter, struct: WireStruct): Mapper {
  return new JsonStructValue(adapter, struct);
}

export class JsonStructValue implements Mapper {
  constructor(
    private readonly adapter: TypeAdapter,
    private readonly struct: WireStruct
  ) {}

  private keys(): string[] {
    return Object.keys(this.struct.fields);
  }

  private has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.struct.fields, key);
  }

  size(): IntValue {
    return IntValue.of(this.keys().length);
  }

  get(key: Val): Val {
    if (!(key instanceof StringValue)) {
      if (isUnknownOrError(key)) return key;
      return ErrorValue.of(`unsupported key type '${key.type().name}' in map`);
    }
    const k = key.value();
    if (!this.has(k)) {
      return ErrorValue.noSuchKey(k);
    }
    return this.adapter.nativeToValue(this.struct.fields[k]);
  }

  contains(key: Val): Val {
    if (isUnknownOrError(key)) {
      return key;
    }
    if (!(key instanceof StringValue)) {
      return BoolValue.False;
    }
    return BoolValue.of(this.has(key.value()));
  }

  equal(other: Val): Val {
    if (!isMapper(other)) {
      return valOrErr(other, "no such overload");
    }
    if (this.size().compare(other.size()) !== 0) {
      return BoolValue.False;
    }
    for (const k of this.keys()) {
      const key = StringValue.of(k);
      const present = other.contains(key);
      if (present !== BoolValue.True) {
        return present;
      }
      const eq = this.get(key).equal(other.get(key));
      if (eq !== BoolValue.True) {
        return eq;
      }
    }
    return BoolValue.True;
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === MapType) return this;
    if (typeVal === TypeType) return MapType;
    return ErrorValue.typeConversion(MapType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    switch (typeDesc.kind) {
      case "record": {
        const out: Record<string, unknown> = {};
        for (const k of this.keys()) {
          out[k] = this.get(StringValue.of(k)).convertToNative(typeDesc.elem);
        }
        return out;
      }
      case "wire.Value": {
        const wire: WireValue = { kind: "struct", value: this.struct };
        return wire;
      }
      case "wire.Struct":
        return this.struct;
      case "wire.Any":
        return packAny({ type: "wire.Struct", message: this.struct });
      case "interface":
        if (typeDesc.implementedBy(this)) return this;
        break;
    }
    throw new ConversionError(
      `no conversion found from map type to native type. map elem: wire.Value, native type: ${formatNativeType(typeDesc)}`
    );
  }

  iterator(): Iterator {
    return new JsonStructKeyIterator(this.keys());
  }

  type(): TypeValue {
    return MapType;
  }

  value(): WireStruct {
    return this.struct;
  }

  toString(): string {
    const parts = this.keys().map(
      (k) => `${JSON.stringify(k)}: ${this.get(StringValue.of(k)).toString()}`
    );
    return `{${parts.join(", ")}}`;
  }
}

/** Yields the struct's keys in insertion order. */
class JsonStructKeyIterator extends BaseIterator {
  private cursor = 0;

  constructor(private readonly keys: readonly string[]) {
    super();
  }

  hasNext(): BoolValue {
    return BoolValue.of(this.cursor < this.keys.length);
  }

  next(): Val | undefined {
    const key = this.keys[this.cursor];
    if (key === undefined) {
      return undefined;
    }
    this.cursor++;
    return StringValue.of(key);
  }
}
