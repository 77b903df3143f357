/**
 * Default type adapter: wire values and plain JavaScript values to runtime
 * values.
 */
import type { TypeAdapter, Val } from "./ref.js";
import { BoolValue } from "./bool.js";
import { DoubleValue } from "./double.js";
import { IntValue } from "./int.js";
import { NullValue } from "./null.js";
import { StringValue } from "./string.js";
import { ErrorValue } from "./err.js";
import { UnknownValue } from "./unknown.js";
import { TypeValue } from "./types.js";
import { JsonListValue } from "./json-list.js";
import { JsonStructValue } from "./json-struct.js";
import { NativeListValue } from "./native-list.js";
import { ConcatListValue } from "./concat-list.js";
import { isWireList, isWireStruct, isWireValue, type WireValue } from "./wire.js";
import { getDynvalLogger } from "./logger.js";

const logger = getDynvalLogger("adapter");

export interface AdapterOptions {
  /**
   * Adapt integral numbers (wire or native) to `int` instead of `double`.
   */
  integralNumbersAsInt?: boolean;
}

export class WireAdapter implements TypeAdapter {
  private readonly integralNumbersAsInt: boolean;

  constructor(options: AdapterOptions = {}) {
    this.integralNumbersAsInt = options.integralNumbersAsInt ?? false;
  }

  nativeToValue(value: unknown): Val {
    if (isVal(value)) {
      return value;
    }
    if (value === null || value === undefined) {
      return NullValue.Instance;
    }
    switch (typeof value) {
      case "boolean":
        return BoolValue.of(value);
      case "number":
        return this.numberToValue(value);
      case "bigint":
        return IntValue.checked(value);
      case "string":
        return StringValue.of(value);
    }
    if (Array.isArray(value)) {
      return new NativeListValue(this, value);
    }
    if (isWireValue(value)) {
      return this.wireToValue(value);
    }
    if (isWireList(value)) {
      return new JsonListValue(this, value);
    }
    if (isWireStruct(value)) {
      return new JsonStructValue(this, value);
    }
    const description = describe(value);
    logger.debug("nativeToValue: unsupported input {description}", { description });
    return ErrorValue.unsupportedAdaptation(description);
  }

  private wireToValue(wire: WireValue): Val {
    switch (wire.kind) {
      case "null":
        return NullValue.Instance;
      case "bool":
        return BoolValue.of(wire.value);
      case "number":
        return this.numberToValue(wire.value);
      case "string":
        return StringValue.of(wire.value);
      case "list":
        return new JsonListValue(this, wire.value);
      case "struct":
        return new JsonStructValue(this, wire.value);
    }
  }

  private numberToValue(n: number): Val {
    if (this.integralNumbersAsInt && Number.isSafeInteger(n)) {
      return IntValue.of(n);
    }
    return DoubleValue.of(n);
  }
}

/** Shared adapter with default options. */
export const defaultAdapter = new WireAdapter();

function isVal(value: unknown): value is Val {
  return (
    value instanceof BoolValue ||
    value instanceof IntValue ||
    value instanceof DoubleValue ||
    value instanceof StringValue ||
    value instanceof NullValue ||
    value instanceof ErrorValue ||
    value instanceof UnknownValue ||
    value instanceof TypeValue ||
    value instanceof JsonListValue ||
    value instanceof JsonStructValue ||
    value instanceof NativeListValue ||
    value instanceof ConcatListValue
  );
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return Object.prototype.toString.call(value).slice(8, -1);
  }
  return typeof value;
}
