import type { TypeAdapter, Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { Iterator, Lister } from "./traits.js";
import { isLister } from "./traits.js";
import type { TypeValue } from "./types.js";
import { ListType, TypeType } from "./types.js";
import { IntValue } from "./int.js";
import { ErrorValue, valOrErr } from "./err.js";
import {
  IndexedIterator,
  convertListToNative,
  formatList,
  listContains,
  listEqual,
  resolveIndex,
  sizeOf,
} from "./list-support.js";

/**
 * Lazy concatenation of two lists. Neither operand is copied or converted;
 * reads are routed to whichever list holds the position.
 */
export class ConcatListValue implements Lister {
  constructor(
    private readonly adapter: TypeAdapter,
    private readonly prevList: Lister,
    private readonly nextList: Lister
  ) {}

  size(): IntValue {
    return IntValue.of(sizeOf(this.prevList) + sizeOf(this.nextList));
  }

  get(index: Val): Val {
    const prevSize = sizeOf(this.prevList);
    const i = resolveIndex(index, prevSize + sizeOf(this.nextList));
    if (typeof i !== "number") {
      return i;
    }
    if (i < prevSize) {
      return this.prevList.get(IntValue.of(i));
    }
    return this.nextList.get(IntValue.of(i - prevSize));
  }

  contains(elem: Val): Val {
    return listContains(this, elem);
  }

  add(other: Val): Val {
    if (other.type() !== ListType || !isLister(other)) {
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
    return new IndexedIterator(this, sizeOf(this));
  }

  type(): TypeValue {
    return ListType;
  }

  /** Element values of both lists, in order. */
  value(): unknown[] {
    const n = sizeOf(this);
    const out: unknown[] = [];
    for (let i = 0; i < n; i++) {
      out.push(this.get(IntValue.of(i)).value());
    }
    return out;
  }

  toString(): string {
    return formatList(this);
  }
}
