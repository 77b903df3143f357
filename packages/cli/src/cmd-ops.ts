/**
 * dynval get / contains / concat / equal - list operations on JSON files
 */
import { IntValue, fromJson } from "@dynval/core";
import type { Val } from "@dynval/core";
import { getStdlibFns } from "@dynval/std";
import {
  CliError,
  EXIT_INPUT,
  adapterFor,
  loadList,
  parseJson,
  runCommand,
  type CommonOpts,
} from "./load.js";
import { printResult } from "./render.js";

const stdlib = getStdlibFns();

/** Call a standard function by name. */
function callStd(name: string, ...args: Val[]): Val {
  const fn = stdlib.get(name);
  if (!fn) {
    throw new Error(`standard function '${name}' is not registered`);
  }
  return fn.call(args);
}

function parseIndex(text: string): IntValue {
  if (!/^-?\d+$/.test(text)) {
    throw new CliError("E_ARG", `Index must be an integer, got '${text}'`, EXIT_INPUT);
  }
  return IntValue.of(BigInt(text));
}

export async function runGet(file: string, index: string, opts: CommonOpts): Promise<number> {
  return runCommand(opts, () => {
    const i = parseIndex(index);
    const list = loadList(file, adapterFor(opts));
    return printResult(callStd("index", list, i), opts);
  });
}

export async function runContains(file: string, elem: string, opts: CommonOpts): Promise<number> {
  return runCommand(opts, () => {
    const adapter = adapterFor(opts);
    const value = adapter.nativeToValue(fromJson(parseJson(elem, "element argument")));
    const list = loadList(file, adapter);
    return printResult(callStd("in", value, list), opts);
  });
}

export async function runConcat(a: string, b: string, opts: CommonOpts): Promise<number> {
  return runCommand(opts, () => {
    const adapter = adapterFor(opts);
    return printResult(callStd("add", loadList(a, adapter), loadList(b, adapter)), opts);
  });
}

export async function runEqual(a: string, b: string, opts: CommonOpts): Promise<number> {
  return runCommand(opts, () => {
    const adapter = adapterFor(opts);
    return printResult(callStd("eq", loadList(a, adapter), loadList(b, adapter)), opts);
  });
}
