/**
 * Result printing.
 */
import { ErrorValue, UnknownValue, formatDiagnostic, toJson, toWireValue } from "@dynval/core";
import type { JsonValue, Val } from "@dynval/core";
import { EXIT_ERROR_VALUE, EXIT_OK, type CommonOpts } from "./load.js";

export function valueToJson(val: Val): JsonValue {
  return toJson(toWireValue(val));
}

/**
 * Print a result value as JSON, or report it as a diagnostic when the
 * operation produced an error or unknown value.
 */
export function printResult(val: Val, opts: CommonOpts): number {
  if (val instanceof ErrorValue) {
    console.error(formatDiagnostic({ code: "E_EVAL", message: val.getMessage() }, !!opts.pretty));
    return EXIT_ERROR_VALUE;
  }
  if (val instanceof UnknownValue) {
    console.error(formatDiagnostic({ code: "E_UNKNOWN", message: "result is unknown" }, !!opts.pretty));
    return EXIT_ERROR_VALUE;
  }
  console.log(JSON.stringify(valueToJson(val), null, 2));
  return EXIT_OK;
}
