/**
 * dynval value contract.
 *
 * Every runtime value, whatever its backing storage, implements `Val`.
 */
import type { NativeType } from "./native.js";
import type { TypeValue } from "./types.js";

export interface Val {
  /** Runtime type descriptor of this value. */
  type(): TypeValue;

  /**
   * Structural equality. Returns a boolean value, or an error/unknown value
   * when the comparison is not defined for the operand.
   */
  equal(other: Val): Val;

  /** Underlying representation, unconverted. */
  value(): unknown;

  /** Conversion to another runtime type; failures are error values. */
  convertToType(typeVal: TypeValue): Val;

  /**
   * Conversion to a native or wire representation.
   * Throws `ConversionError` when no conversion exists.
   */
  convertToNative(typeDesc: NativeType): unknown;

  toString(): string;
}

/**
 * Converts raw storage values (wire values, plain JS values) into runtime
 * values. Implementations must be pure; a single instance is shared by every
 * value it produces.
 */
export interface TypeAdapter {
  nativeToValue(value: unknown): Val;
}

/**
 * Standard function called with evaluated arguments.
 */
export interface StdFn {
  readonly name: string;
  call(args: readonly Val[]): Val;
}

export type Predicate = (elem: Val) => Val;

/**
 * Comprehension over an iterable target; the predicate is applied per
 * element rather than passed as a value.
 */
export interface StdMacro {
  readonly name: string;
  expand(target: Val, pred: Predicate): Val;
}
