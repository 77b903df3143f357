/**
 * @dynval/std - dynval standard functions
 */
import type { StdFn, StdMacro } from "@dynval/core";
export { sizeFn, inFn, indexFn, addFn } from "./list-ops.js";
export { eqFn, neFn, existsMacro, allMacro } from "./predicates.js";
export { arityError } from "./args.js";

import { sizeFn, inFn, indexFn, addFn } from "./list-ops.js";
import { eqFn, neFn, existsMacro, allMacro } from "./predicates.js";

/**
 * Get all stdlib functions as a Map.
 */
export function getStdlibFns(): Map<string, StdFn> {
  const fns = new Map<string, StdFn>();
  for (const fn of [sizeFn, inFn, indexFn, addFn, eqFn, neFn]) {
    fns.set(fn.name, fn);
  }
  return fns;
}

export function getStdlibMacros(): Map<string, StdMacro> {
  const macros = new Map<string, StdMacro>();
  for (const macro of [existsMacro, allMacro]) {
    macros.set(macro.name, macro);
  }
  return macros;
}
