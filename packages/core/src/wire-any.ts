/**
 * Any-envelope codec.
 *
 * A packed message carries its type in the URL and the CBOR encoding of its
 * JSON form in the payload.
 */
import { type CBORType, decodeCBOR, encodeCBOR } from "@levischuck/tiny-cbor";
import { WireDecodeError } from "./errors.js";
import {
  fromJson,
  listToJson,
  structToJson,
  toJson,
  wireList,
  wireStruct,
} from "./wire.js";
import type {
  JsonRecord,
  JsonValue,
  WireAny,
  WireList,
  WireStruct,
  WireValue,
} from "./wire.js";

export const TYPE_URL_PREFIX = "type.dynval.dev/";

export type WireMessage =
  | { type: "wire.Value"; message: WireValue }
  | { type: "wire.ListValue"; message: WireList }
  | { type: "wire.Struct"; message: WireStruct };

export type WireMessageType = WireMessage["type"];

function jsonToCbor(json: JsonValue): CBORType {
  if (Array.isArray(json)) {
    return json.map(jsonToCbor);
  }
  if (json !== null && typeof json === "object") {
    const map = new Map<string | number, CBORType>();
    for (const [key, value] of Object.entries(json)) {
      map.set(key, jsonToCbor(value));
    }
    return map;
  }
  return json;
}

function cborToJson(value: CBORType): JsonValue {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (Array.isArray(value)) {
    return value.map(cborToJson);
  }
  if (value instanceof Map) {
    const obj: JsonRecord = Object.fromEntries(
      [...value.entries()].map(([key, val]): [string, JsonValue] => [String(key), cborToJson(val)])
    );
    return obj;
  }
  throw new WireDecodeError("invalid_payload", "Payload holds a value with no JSON form.");
}

function messageToJson(msg: WireMessage): JsonValue {
  switch (msg.type) {
    case "wire.Value":
      return toJson(msg.message);
    case "wire.ListValue":
      return listToJson(msg.message);
    case "wire.Struct":
      return structToJson(msg.message);
  }
}

/** tiny-cbor accepts only plain `Uint8Array`s, not subclasses such as `Buffer`. */
function normalizeBytes(data: Uint8Array): Uint8Array {
  if (data.constructor === Uint8Array) {
    return data;
  }
  return new Uint8Array(data);
}

export function packAny(msg: WireMessage): WireAny {
  return {
    typeUrl: TYPE_URL_PREFIX + msg.type,
    value: encodeCBOR(jsonToCbor(messageToJson(msg))),
  };
}

/**
 * @throws WireDecodeError if the type URL is not recognised or the payload
 * does not decode to the declared message type
 */
export function unpackAny(any: WireAny): WireMessage {
  if (!any.typeUrl.startsWith(TYPE_URL_PREFIX)) {
    throw new WireDecodeError("unknown_type_url", `Unsupported type URL '${any.typeUrl}'.`);
  }
  const type = any.typeUrl.slice(TYPE_URL_PREFIX.length);
  if (type !== "wire.Value" && type !== "wire.ListValue" && type !== "wire.Struct") {
    throw new WireDecodeError("unknown_type_url", `Unsupported type URL '${any.typeUrl}'.`);
  }

  let json: JsonValue;
  try {
    json = cborToJson(decodeCBOR(normalizeBytes(any.value)));
  } catch (error) {
    if (error instanceof WireDecodeError) {
      throw error;
    }
    throw new WireDecodeError(
      "invalid_cbor",
      `Failed to decode CBOR: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  switch (type) {
    case "wire.Value":
      return { type, message: fromJson(json) };
    case "wire.ListValue":
      if (!Array.isArray(json)) {
        throw new WireDecodeError("invalid_payload", "wire.ListValue payload must be an array.");
      }
      return { type, message: wireList(json) };
    case "wire.Struct":
      if (json === null || typeof json !== "object" || Array.isArray(json)) {
        throw new WireDecodeError("invalid_payload", "wire.Struct payload must be a map.");
      }
      return { type, message: wireStruct(json) };
  }
}
