import type { TypeAdapter, Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { Iterator, Lister } from "./traits.js";
import { isLister } from "./traits.js";
import type { TypeValue } from "./types.js";
import { ListType, TypeType } from "./types.js";
import { IntValue } from "./int.js";
import { ErrorValue, valOrErr } from "./err.js";
import { ConcatListValue } from "./concat-list.js";
import {
  IndexedIterator,
  convertListToNative,
  formatList,
  listContains,
  listEqual,
  resolveIndex,
} from "./list-support.js";

/**
 * List value backed by a plain JavaScript array. Elements are adapted on
 * read, like the wire-backed list.
 */
export class NativeListValue implements Lister {
  constructor(
    private readonly adapter: TypeAdapter,
    private readonly elems: readonly unknown[]
  ) {}

  size(): IntValue {
    return IntValue.of(this.elems.length);
  }

  get(index: Val): Val {
    const i = resolveIndex(index, this.elems.length);
    if (typeof i !== "number") {
      return i;
    }
    return this.adapter.nativeToValue(this.elems[i]);
  }

  contains(elem: Val): Val {
    return listContains(this, elem);
  }

  add(other: Val): Val {
    if (other.type() !== ListType) {
      return valOrErr(other, "no such overload");
    }
    if (other instanceof NativeListValue) {
      return new NativeListValue(this.adapter, [...this.elems, ...other.elems]);
    }
    if (!isLister(other)) {
      return valOrErr(other, "no such overload");
    }
    return new ConcatListValue(this.adapter, this, other);
  }

  equal(other: Val): Val {
    return listEqual(this, other);
  }

  convertToType(typeVal: TypeValue): Val {
    if (typeVal === ListType) return this;
    if (typeVal === TypeType) return ListType;
    return ErrorValue.typeConversion(ListType, typeVal);
  }

  convertToNative(typeDesc: NativeType): unknown {
    return convertListToNative(this, typeDesc, "dyn");
  }

  iterator(): Iterator {
    return new IndexedIterator(this, this.elems.length);
  }

  type(): TypeValue {
    return ListType;
  }

  value(): readonly unknown[] {
    return this.elems;
  }

  toString(): string {
    return formatList(this);
  }
}
