/**
 * Input loading and failure reporting shared by the commands.
 */
import * as fs from "node:fs";
import {
  ConversionError,
  JsonListValue,
  adapterFromConfig,
  formatDiagnostic,
  isJsonValue,
  loadConfig,
  wireList,
} from "@dynval/core";
import type { JsonValue, TypeAdapter } from "@dynval/core";

export const EXIT_OK = 0;
export const EXIT_INPUT = 2;
export const EXIT_IO = 4;
export const EXIT_ERROR_VALUE = 5;

export interface CommonOpts {
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

/**
 * Failure carrying its diagnostic code and exit code.
 */
export class CliError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly exitCode: number
  ) {
    super(message);
    this.name = "CliError";
  }
}

export function readInput(file: string): string {
  try {
    return fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CliError("E_IO", `Error reading file: ${msg}`, EXIT_IO);
  }
}

export function parseJson(text: string, what: string): JsonValue {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CliError("E_JSON", `Invalid JSON in ${what}: ${msg}`, EXIT_INPUT);
  }
  if (!isJsonValue(data)) {
    throw new CliError("E_JSON", `Invalid JSON in ${what}`, EXIT_INPUT);
  }
  return data;
}

export function parseList(text: string, what: string): JsonValue[] {
  const json = parseJson(text, what);
  if (!Array.isArray(json)) {
    throw new CliError("E_NOT_LIST", `${what} does not hold a JSON array`, EXIT_INPUT);
  }
  return json;
}

export function adapterFor(opts: CommonOpts): TypeAdapter {
  return adapterFromConfig(loadConfig(opts.cwd, opts.homeDir));
}

export function loadList(file: string, adapter: TypeAdapter): JsonListValue {
  const what = file === "-" ? "stdin" : file;
  return new JsonListValue(adapter, wireList(parseList(readInput(file), what)));
}

/**
 * Run a command body, mapping `CliError` and `ConversionError` to a
 * diagnostic on stderr and an exit code. Anything else is rethrown.
 */
export async function runCommand(opts: CommonOpts, body: () => number): Promise<number> {
  try {
    return body();
  } catch (e) {
    if (e instanceof CliError) {
      console.error(formatDiagnostic({ code: e.code, message: e.message }, !!opts.pretty));
      return e.exitCode;
    }
    if (e instanceof ConversionError) {
      console.error(formatDiagnostic({ code: e.code, message: e.message }, !!opts.pretty));
      return EXIT_ERROR_VALUE;
    }
    throw e;
  }
}
