/**
 * Wire format: the tagged, self-describing values lists and records are
 * stored in before conversion into runtime values.
 */
import { z } from "zod";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | JsonRecord;

export type JsonRecord = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * Validates without copying: zod rebuilds records and skips "__proto__"
 * keys, so callers keep the value they passed in.
 */
export function isJsonValue(x: unknown): x is JsonValue {
  return jsonValueSchema.safeParse(x).success;
}

export interface WireList {
  readonly values: readonly WireValue[];
}

export interface WireStruct {
  readonly fields: Readonly<Record<string, WireValue>>;
}

export type WireValue =
  | { readonly kind: "null" }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "list"; readonly value: WireList }
  | { readonly kind: "struct"; readonly value: WireStruct };

/** Opaque envelope around an encoded wire message. */
export interface WireAny {
  readonly typeUrl: string;
  readonly value: Uint8Array;
}

export const WIRE_NULL: WireValue = { kind: "null" };

export function fromJson(json: JsonValue): WireValue {
  if (json === null) return WIRE_NULL;
  if (typeof json === "boolean") return { kind: "bool", value: json };
  if (typeof json === "number") return { kind: "number", value: json };
  if (typeof json === "string") return { kind: "string", value: json };
  if (Array.isArray(json)) return { kind: "list", value: wireList(json) };
  return { kind: "struct", value: wireStruct(json) };
}

export function wireList(values: readonly JsonValue[]): WireList {
  return { values: values.map(fromJson) };
}

// Records are built with Object.fromEntries so that a "__proto__" key stays
// an own field instead of replacing the prototype.

export function wireStruct(record: JsonRecord): WireStruct {
  const entries = Object.entries(record).map(([key, value]): [string, WireValue] => [key, fromJson(value)]);
  return { fields: Object.fromEntries(entries) };
}

export function toJson(wire: WireValue): JsonValue {
  switch (wire.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return wire.value;
    case "list":
      return listToJson(wire.value);
    case "struct":
      return structToJson(wire.value);
  }
}

export function listToJson(list: WireList): JsonValue[] {
  return list.values.map(toJson);
}

export function structToJson(struct: WireStruct): JsonRecord {
  const entries = Object.entries(struct.fields).map(([key, value]): [string, JsonValue] => [key, toJson(value)]);
  return Object.fromEntries(entries);
}

// --- Guards (shallow: nested values are not walked) ---

export function isWireList(x: unknown): x is WireList {
  return typeof x === "object" && x !== null && "values" in x && Array.isArray(x.values);
}

export function isWireStruct(x: unknown): x is WireStruct {
  return (
    typeof x === "object" &&
    x !== null &&
    "fields" in x &&
    typeof x.fields === "object" &&
    x.fields !== null &&
    !Array.isArray(x.fields)
  );
}

export function isWireValue(x: unknown): x is WireValue {
  if (typeof x !== "object" || x === null || !("kind" in x)) return false;
  switch (x.kind) {
    case "null":
      return true;
    case "bool":
      return "value" in x && typeof x.value === "boolean";
    case "number":
      return "value" in x && typeof x.value === "number";
    case "string":
      return "value" in x && typeof x.value === "string";
    case "list":
      return "value" in x && isWireList(x.value);
    case "struct":
      return "value" in x && isWireStruct(x.value);
    default:
      return false;
  }
}

export function isWireAny(x: unknown): x is WireAny {
  return (
    typeof x === "object" &&
    x !== null &&
    "typeUrl" in x &&
    typeof x.typeUrl === "string" &&
    "value" in x &&
    x.value instanceof Uint8Array
  );
}
