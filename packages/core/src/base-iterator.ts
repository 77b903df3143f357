import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { Iterator } from "./traits.js";
import type { BoolValue } from "./bool.js";
import type { TypeValue } from "./types.js";
import { IteratorType } from "./types.js";
import { ErrorValue } from "./err.js";
import { ConversionError } from "./errors.js";

/**
 * Default `Val` behaviour for iterators: they are not comparable and have
 * no conversions.
 */
export abstract class BaseIterator implements Iterator {
  abstract hasNext(): BoolValue;
  abstract next(): Val | undefined;

  type(): TypeValue {
    return IteratorType;
  }

  equal(_other: Val): Val {
    return ErrorValue.noSuchOverload();
  }

  value(): unknown {
    return null;
  }

  convertToType(typeVal: TypeValue): Val {
    return ErrorValue.typeConversion(IteratorType, typeVal);
  }

  convertToNative(_typeDesc: NativeType): unknown {
    throw new ConversionError("type conversion on iterators not supported");
  }

  toString(): string {
    return "<iterator>";
  }
}
