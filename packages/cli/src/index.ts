/**
 * @dynval/cli - CLI entry point re-exports
 */
export { runInspect } from "./cmd-inspect.js";
export { runGet, runContains, runConcat, runEqual } from "./cmd-ops.js";
export { runConvert, convertTargets } from "./cmd-convert.js";
export type { ConvertTarget } from "./cmd-convert.js";
export { runConfig } from "./cmd-config.js";
export { setupLogging } from "./logging.js";
export { CliError, EXIT_OK, EXIT_INPUT, EXIT_IO, EXIT_ERROR_VALUE } from "./load.js";
export type { CommonOpts } from "./load.js";
