/**
 * Thrown errors. Evaluation failures are `ErrorValue`s (see err.ts); the
 * classes below cover the native boundary, where a value cannot be returned.
 */
import type { JsonRecord } from "./wire.js";

export class ConversionError extends Error {
  readonly code = "E_CONVERSION";
  details?: JsonRecord;

  constructor(message: string, details?: JsonRecord) {
    super(message);
    this.name = "ConversionError";
    this.details = details;
  }
}

export type WireDecodeErrorCode =
  | "unknown_type_url"
  | "invalid_cbor"
  | "invalid_payload";

/**
 * Thrown when an any-envelope cannot be unpacked.
 */
export class WireDecodeError extends Error {
  override readonly name = "WireDecodeError";

  constructor(
    public readonly code: WireDecodeErrorCode,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
  }
}
