/**
 * dynval stdlib: container operations
 * size, in, index, add
 */
import { ErrorValue, isAdder, isContainer, isIndexer, isSizer } from "@dynval/core";
import type { StdFn, Val } from "@dynval/core";
import { binary, unary } from "./args.js";

/**
 * size(x) -> int
 * Element count of a list or field count of a record.
 */
export const sizeFn: StdFn = {
  name: "size",
  call(args: readonly Val[]): Val {
    return unary("size", args, (x) => (isSizer(x) ? x.size() : ErrorValue.noSuchOverload()));
  },
};

/**
 * in(elem, container) -> bool
 * List membership or record key presence.
 */
export const inFn: StdFn = {
  name: "in",
  call(args: readonly Val[]): Val {
    return binary("in", args, (elem, container) =>
      isContainer(container) ? container.contains(elem) : ErrorValue.noSuchOverload()
    );
  },
};

/**
 * index(x, i) -> value
 * List element by position or record field by key.
 */
export const indexFn: StdFn = {
  name: "index",
  call(args: readonly Val[]): Val {
    return binary("index", args, (x, i) => (isIndexer(x) ? x.get(i) : ErrorValue.noSuchOverload()));
  },
};

/**
 * add(a, b) -> list
 */
export const addFn: StdFn = {
  name: "add",
  call(args: readonly Val[]): Val {
    return binary("add", args, (a, b) => (isAdder(a) ? a.add(b) : ErrorValue.noSuchOverload()));
  },
};
