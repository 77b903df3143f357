/**
 * Error values. Evaluation errors flow through the same channel as results
 * so that error and unknown can take part in three-valued logic.
 */
import type { Val } from "./ref.js";
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";
import { ErrorType } from "./types.js";
import { UnknownValue } from "./unknown.js";
import { ConversionError } from "./errors.js";

export class ErrorValue implements Val {
  private constructor(private readonly message: string) {}

  static of(message: string): ErrorValue {
    return new ErrorValue(message);
  }

  static noSuchOverload(): ErrorValue {
    return ErrorValue.of("no such overload");
  }

  static indexOutOfRange(index: bigint | number, size: number): ErrorValue {
    return ErrorValue.of(`index '${index}' out of range in list size '${size}'`);
  }

  static unsupportedIndexType(indexType: TypeValue): ErrorValue {
    return ErrorValue.of(`unsupported index type '${indexType.name}' in list`);
  }

  static typeConversion(from: TypeValue, to: TypeValue): ErrorValue {
    return ErrorValue.of(`type conversion error from '${from.name}' to '${to.name}'`);
  }

  static noSuchKey(key: string): ErrorValue {
    return ErrorValue.of(`no such key: ${key}`);
  }

  static unsupportedAdaptation(description: string): ErrorValue {
    return ErrorValue.of(`unsupported type conversion: '${description}'`);
  }

  static intOverflow(): ErrorValue {
    return ErrorValue.of("integer overflow");
  }

  type(): TypeValue {
    return ErrorType;
  }

  equal(_other: Val): Val {
    return this;
  }

  value(): string {
    return this.message;
  }

  getMessage(): string {
    return this.message;
  }

  convertToType(_typeVal: TypeValue): Val {
    return this;
  }

  convertToNative(_typeDesc: NativeType): unknown {
    throw new ConversionError(this.message);
  }

  toString(): string {
    return `error: ${this.message}`;
  }
}

export function isError(val: Val): val is ErrorValue {
  return val instanceof ErrorValue;
}

export function isUnknownOrError(val: Val): val is ErrorValue | UnknownValue {
  return val instanceof ErrorValue || val instanceof UnknownValue;
}

/**
 * Pass an error or unknown operand through unchanged; otherwise report
 * `message` as a new error.
 */
export function valOrErr(val: Val, message: string): Val {
  if (isUnknownOrError(val)) return val;
  return ErrorValue.of(message);
}
