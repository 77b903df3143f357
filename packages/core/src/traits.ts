/**
 * Value traits: the capabilities a composite value may offer. Generic code
 * dispatches on these rather than on concrete value classes.
 */
import type { Val } from "./ref.js";
import type { BoolValue } from "./bool.js";
import type { IntValue } from "./int.js";
import { NativeTypes } from "./native.js";
import { MapType } from "./types.js";

export interface Adder {
  add(other: Val): Val;
}

export interface Container {
  contains(value: Val): Val;
}

export interface Indexer {
  get(index: Val): Val;
}

export interface Sizer {
  size(): IntValue;
}

export interface Iterable {
  iterator(): Iterator;
}

/**
 * One-pass, forward-only cursor. `next()` returns `undefined` once
 * `hasNext()` is false.
 */
export interface Iterator extends Val {
  hasNext(): BoolValue;
  next(): Val | undefined;
}

export interface Lister extends Val, Adder, Container, Indexer, Iterable, Sizer {}

export interface Mapper extends Val, Container, Indexer, Iterable, Sizer {}

export function isAdder(v: Val): v is Val & Adder {
  return "add" in v && typeof v.add === "function";
}

export function isContainer(v: Val): v is Val & Container {
  return "contains" in v && typeof v.contains === "function";
}

export function isIndexer(v: Val): v is Val & Indexer {
  return "get" in v && typeof v.get === "function";
}

export function isSizer(v: Val): v is Val & Sizer {
  return "size" in v && typeof v.size === "function";
}

export function isIterable(v: Val): v is Val & Iterable {
  return "iterator" in v && typeof v.iterator === "function";
}

export function isLister(v: Val): v is Lister {
  return isAdder(v) && isContainer(v) && isIndexer(v) && isIterable(v) && isSizer(v);
}

export function isMapper(v: Val): v is Mapper {
  return v.type() === MapType && isContainer(v) && isIndexer(v) && isIterable(v) && isSizer(v);
}

export const ListerInterface = NativeTypes.iface("Lister", isLister);
export const MapperInterface = NativeTypes.iface("Mapper", isMapper);
