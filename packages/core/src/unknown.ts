import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import { formatNativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { UnknownType } from "./types.js";
import { ConversionError } from "./errors.js";

/**
 * Unknown value produced by partial evaluation. Carries the ids of the
 * attributes whose values were not available.
 */
export class UnknownValue implements Val {
  static readonly Instance = new UnknownValue([]);

  private readonly attributeIds: readonly number[];

  private constructor(attributeIds: readonly number[]) {
    this.attributeIds = [...attributeIds];
  }

  static of(attributeIds: readonly number[]): UnknownValue {
    if (attributeIds.length === 0) return UnknownValue.Instance;
    return new UnknownValue(attributeIds);
  }

  type(): TypeValue {
    return UnknownType;
  }

  equal(_other: Val): Val {
    return this;
  }

  value(): readonly number[] {
    return this.attributeIds;
  }

  merge(other: UnknownValue): UnknownValue {
    const merged = new Set([...this.attributeIds, ...other.attributeIds]);
    return UnknownValue.of([...merged]);
  }

  convertToType(_typeVal: TypeValue): Val {
    return this;
  }

  /**
   * Unknowns only cross the native boundary as themselves, through an
   * interface they satisfy; every concrete target is a conversion error.
   */
  convertToNative(typeDesc: NativeType): unknown {
    if (typeDesc.kind === "interface" && typeDesc.implementedBy(this)) {
      return this;
    }
    const to = formatNativeType(typeDesc);
    throw new ConversionError(`type conversion error from 'unknown' to '${to}'`, { from: "unknown", to });
  }

  toString(): string {
    return "unknown";
  }
}
