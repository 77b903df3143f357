/**
 * dynval stdlib: equality and comprehensions
 * eq, ne, exists, all
 */
import { BoolValue, ErrorValue, isIterable, isUnknownOrError, valOrErr } from "@dynval/core";
import type { Predicate, StdFn, StdMacro, Val } from "@dynval/core";
import { binary } from "./args.js";

/**
 * eq(a, b) -> bool
 */
export const eqFn: StdFn = {
  name: "eq",
  call(args: readonly Val[]): Val {
    return binary("eq", args, (a, b) => a.equal(b));
  },
};

/**
 * ne(a, b) -> bool
 * Negation of eq; a non-boolean comparison result is returned as is.
 */
export const neFn: StdFn = {
  name: "ne",
  call(args: readonly Val[]): Val {
    return binary("ne", args, (a, b) => {
      const eq = a.equal(b);
      return eq instanceof BoolValue ? eq.negate() : eq;
    });
  },
};

/**
 * Fold `pred` over the target's iterator. `decisive` ends the scan; a
 * non-boolean result is remembered and returned if no element is decisive.
 */
function comprehension(target: Val, pred: Predicate, decisive: BoolValue): Val {
  if (isUnknownOrError(target)) {
    return target;
  }
  if (!isIterable(target)) {
    return ErrorValue.noSuchOverload();
  }
  let err: Val | undefined;
  const iter = target.iterator();
  while (iter.hasNext() === BoolValue.True) {
    const elem = iter.next();
    if (elem === undefined) break;
    const result = pred(elem);
    if (result === decisive) {
      return decisive;
    }
    if (!(result instanceof BoolValue)) {
      err ??= valOrErr(result, "no such overload");
    }
  }
  return err ?? decisive.negate();
}

/**
 * exists(list, pred) -> bool
 * True on the first element satisfying pred, else the first error, else false.
 */
export const existsMacro: StdMacro = {
  name: "exists",
  expand(target: Val, pred: Predicate): Val {
    return comprehension(target, pred, BoolValue.True);
  },
};

/**
 * all(list, pred) -> bool
 * False on the first element failing pred, else the first error, else true.
 */
export const allMacro: StdMacro = {
  name: "all",
  expand(target: Val, pred: Predicate): Val {
    return comprehension(target, pred, BoolValue.False);
  },
};
