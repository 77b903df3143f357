/**
 * @dynval/core - runtime values, traits and the wire-backed list
 */
export type { Val, TypeAdapter, StdFn, StdMacro, Predicate } from "./ref.js";
export * from "./types.js";
export * from "./native.js";
export * from "./traits.js";
export { BoolValue, True, False } from "./bool.js";
export { IntValue } from "./int.js";
export { DoubleValue } from "./double.js";
export { StringValue } from "./string.js";
export { NullValue, Null } from "./null.js";
export { ErrorValue, isError, isUnknownOrError, valOrErr } from "./err.js";
export { UnknownValue } from "./unknown.js";
export { ConversionError, WireDecodeError } from "./errors.js";
export type { WireDecodeErrorCode } from "./errors.js";
export * from "./wire.js";
export { packAny, unpackAny, TYPE_URL_PREFIX } from "./wire-any.js";
export type { WireMessage, WireMessageType } from "./wire-any.js";
export { BaseIterator } from "./base-iterator.js";
export { JsonListValue, JsonListIterator, newJsonList } from "./json-list.js";
export { ConcatListValue } from "./concat-list.js";
export { NativeListValue } from "./native-list.js";
export { JsonStructValue, newJsonStruct } from "./json-struct.js";
export { IndexedIterator, toWireValue } from "./list-support.js";
export { WireAdapter, defaultAdapter } from "./adapter.js";
export type { AdapterOptions } from "./adapter.js";
export {
  resolveConfig,
  loadConfig,
  adapterFromConfig,
  configSchema,
  PROJECT_CONFIG_FILE,
} from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
export { getDynvalLogger, LOG_CATEGORY } from "./logger.js";
export * from "./diagnostics.js";
