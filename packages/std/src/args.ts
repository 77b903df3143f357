/**
 * Argument checks shared by the standard functions.
 */
import { ErrorValue, isUnknownOrError } from "@dynval/core";
import type { Val } from "@dynval/core";

export function arityError(name: string, expected: number, got: number): ErrorValue {
  return ErrorValue.of(`${name}: expected ${expected} argument(s), got ${got}`);
}

/** First error or unknown argument, if any. */
export function passThrough(args: readonly Val[]): Val | undefined {
  return args.find(isUnknownOrError);
}

export function unary(name: string, args: readonly Val[], fn: (x: Val) => Val): Val {
  const [x] = args;
  if (args.length !== 1 || x === undefined) {
    return arityError(name, 1, args.length);
  }
  return passThrough(args) ?? fn(x);
}

export function binary(name: string, args: readonly Val[], fn: (a: Val, b: Val) => Val): Val {
  const [a, b] = args;
  if (args.length !== 2 || a === undefined || b === undefined) {
    return arityError(name, 2, args.length);
  }
  return passThrough(args) ?? fn(a, b);
}
