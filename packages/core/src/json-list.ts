/**
 * List value backed by a wire-format list.
 *
 * Elements stay in wire form and are converted through the adapter each
 * time they are read.
 */
import type { TypeAdapter, Val } from "./ref.js";
import type { NativeType } from "./native.js";
import { formatNativeType } from "./native.js";
import type { Iterator, Lister } from "./traits.js";
import { isLister } from "./traits.js";
import type { TypeValue } from "./types.js";
import { ListType, TypeType } from "./types.js";
import { BoolValue } from "./bool.js";
import { IntValue } from "./int.js";
import { ErrorValue, valOrErr } from "./err.js";
import { BaseIterator } from "./base-iterator.js";
import { ConcatListValue } from "./concat-list.js";
import {
  convertListToNative,
  formatList,
  listContains,
  listEqual,
  resolveIndex,
} from "./list-support.js";
import type { WireList, WireValue } from "./wire.js";
import { packAny } from "./wire-any.js";
import { getDynvalLogger } from "./logger.js";

const logger = getDynvalLogger("list");

/** Element type reported in conversion errors. */
const ELEM_TYPE = "wire.Value";

/**
 * Create a lister backed by a wire-format list. The adapter is shared, not
 * copied, by every value derived from the list.
 */
export function newJsonList(adapter: TypeAdapter, list: WireList): Lister {
  return new JsonListValue(adapter, list);
}

export class JsonListValue implements Lister {
  constructor(
    private readonly adapter: TypeAdapter,
    private readonly list: WireList
  ) {}

  size(): IntValue {
    return IntValue.of(this.list.values.length);
  }

  get(index: Val): Val {
    const i = resolveIndex(index, this.list.values.length);
    if (typeof i !== "number") {
      return i;
    }
    return this.adapter.nativeToValue(this.list.values[i]);
  }

  contains(elem: Val): Val {
    return listContains(this, elem);
  }

  add(other: Val): Val {
    if (other.type() !== ListType) {
      return valOrErr(other, "no such overload");
    }
    if (other instanceof JsonListValue) {
      logger.debug("add: concatenating {left} + {right} wire elements", {
        left: this.list.values.length,
        right: other.list.values.length,
      });
      return new JsonListValue(this.adapter, {
        values: [...this.list.values, ...other.list.values],
      });
    }
    if (!isLister(other)) {
      return valOrErr(other, "no such overload");
    }
    logger.debug("add: deferring concatenation with a {kind} list", {
      kind: other.constructor.name,
    });
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
    logger.debug("convertToNative: {target}", { target: formatNativeType(typeDesc) });
    switch (typeDesc.kind) {
      case "wire.Value": {
        const wire: WireValue = { kind: "list", value: this.list };
        return wire;
      }
      case "wire.ListValue":
        return this.list;
      case "wire.Any":
        return packAny({ type: "wire.ListValue", message: this.list });
      default:
        return convertListToNative(this, typeDesc, ELEM_TYPE);
    }
  }

  iterator(): Iterator {
    return new JsonListIterator(this.adapter, this.list.values);
  }

  type(): TypeValue {
    return ListType;
  }

  value(): WireList {
    return this.list;
  }

  toString(): string {
    return formatList(this);
  }
}

/**
 * Cursor over the backing values of a `JsonListValue`. Not safe for
 * concurrent `next()` calls on the same instance.
 */
export class JsonListIterator extends BaseIterator {
  private cursor = 0;
  private readonly len: number;

  constructor(
    private readonly adapter: TypeAdapter,
    private readonly elems: readonly WireValue[]
  ) {
    super();
    this.len = elems.length;
  }

  hasNext(): BoolValue {
    return BoolValue.of(this.cursor < this.len);
  }

  next(): Val | undefined {
    if (this.hasNext() !== BoolValue.True) {
      return undefined;
    }
    const index = this.cursor;
    this.cursor++;
    return this.adapter.nativeToValue(this.elems[index]);
  }
}
