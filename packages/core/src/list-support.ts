/**
 * Operations shared by every list backing: index checks, containment,
 * equality and native conversion expressed against the Lister trait.
 */
import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import { NativeTypes, formatNativeType } from "./native.js";
import type { Indexer, Lister, Sizer } from "./traits.js";
import { isLister } from "./traits.js";
import { BoolValue } from "./bool.js";
import { IntValue } from "./int.js";
import { ErrorValue, isUnknownOrError, valOrErr } from "./err.js";
import { ConversionError } from "./errors.js";
import { BaseIterator } from "./base-iterator.js";
import { isWireValue, type WireList, type WireValue } from "./wire.js";
import { packAny } from "./wire-any.js";

export function sizeOf(sizer: Sizer): number {
  return Number(sizer.size().value());
}

/**
 * Resolve a runtime index against a list of `size` elements. Returns the
 * position, or the error value to hand back to the caller.
 */
export function resolveIndex(index: Val, size: number): number | Val {
  if (!(index instanceof IntValue)) {
    if (isUnknownOrError(index)) return index;
    return ErrorValue.unsupportedIndexType(index.type());
  }
  const i = index.value();
  if (i < 0n || i >= BigInt(size)) {
    return ErrorValue.indexOutOfRange(i, size);
  }
  return Number(i);
}

/**
 * Membership with three-valued precedence: a true comparison wins, then the
 * first comparison that did not produce a boolean, then false.
 */
export function listContains(list: Lister, elem: Val): Val {
  if (isUnknownOrError(elem)) {
    return elem;
  }
  let err: Val | undefined;
  const n = sizeOf(list);
  for (let i = 0; i < n; i++) {
    const cmp = elem.equal(list.get(IntValue.of(i)));
    if (!(cmp instanceof BoolValue)) {
      err ??= valOrErr(cmp, "no such overload");
      continue;
    }
    if (cmp === BoolValue.True) {
      return BoolValue.True;
    }
  }
  return err ?? BoolValue.False;
}

/**
 * Ordered element-wise equality. The first comparison that is not `True`
 * (false, error or unknown) is the result.
 */
export function listEqual(list: Lister, other: Val): Val {
  if (!isLister(other)) {
    return valOrErr(other, "no such overload");
  }
  const n = sizeOf(list);
  if (n !== sizeOf(other)) {
    return BoolValue.False;
  }
  for (let i = 0; i < n; i++) {
    const idx = IntValue.of(i);
    const elemEq = list.get(idx).equal(other.get(idx));
    if (elemEq !== BoolValue.True) {
      return elemEq;
    }
  }
  return BoolValue.True;
}

export function listToArray(list: Lister, elem: NativeType): unknown[] {
  const n = sizeOf(list);
  const out = new Array<unknown>(n);
  for (let i = 0; i < n; i++) {
    out[i] = list.get(IntValue.of(i)).convertToNative(elem);
  }
  return out;
}

export function toWireValue(val: Val): WireValue {
  const wire = val.convertToNative(NativeTypes.wireValue);
  if (!isWireValue(wire)) {
    throw new ConversionError(`'${val.type().name}' value has no wire.Value form`);
  }
  return wire;
}

export function listToWireList(list: Lister): WireList {
  const n = sizeOf(list);
  const values: WireValue[] = [];
  for (let i = 0; i < n; i++) {
    values.push(toWireValue(list.get(IntValue.of(i))));
  }
  return { values };
}

export function noConversionFound(elemType: string, typeDesc: NativeType): ConversionError {
  const nativeType = formatNativeType(typeDesc);
  return new ConversionError(
    `no conversion found from list type to native type. list elem: ${elemType}, native type: ${nativeType}`,
    { elemType, nativeType }
  );
}

/**
 * Native conversion for lists whose elements must be converted one by one
 * to reach the wire format.
 */
export function convertListToNative(list: Lister, typeDesc: NativeType, elemType: string): unknown {
  switch (typeDesc.kind) {
    case "array":
      return listToArray(list, typeDesc.elem);
    case "wire.Value": {
      const wire: WireValue = { kind: "list", value: listToWireList(list) };
      return wire;
    }
    case "wire.ListValue":
      return listToWireList(list);
    case "wire.Any":
      return packAny({ type: "wire.ListValue", message: listToWireList(list) });
    case "interface":
      if (typeDesc.implementedBy(list)) return list;
      break;
  }
  throw noConversionFound(elemType, typeDesc);
}

/**
 * Iterator over any indexable list of known size.
 */
export class IndexedIterator extends BaseIterator {
  private cursor = 0;

  constructor(
    private readonly list: Indexer,
    private readonly len: number
  ) {
    super();
  }

  hasNext(): BoolValue {
    return BoolValue.of(this.cursor < this.len);
  }

  next(): Val | undefined {
    if (this.cursor >= this.len) {
      return undefined;
    }
    const index = this.cursor;
    this.cursor++;
    return this.list.get(IntValue.of(index));
  }
}

export function formatList(list: Lister): string {
  const n = sizeOf(list);
  const parts: string[] = [];
  for (let i = 0; i < n; i++) {
    parts.push(list.get(IntValue.of(i)).toString());
  }
  return `[${parts.join(", ")}]`;
}
