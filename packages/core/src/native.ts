/**
 * Native type descriptors: the targets accepted by `Val.convertToNative`.
 */
import type { Val } from "./ref.js";

export interface NativeInterface {
  readonly kind: "interface";
  readonly name: string;
  implementedBy(value: Val): boolean;
}

export type NativeType =
  | { readonly kind: "boolean" }
  | { readonly kind: "number" }
  | { readonly kind: "bigint" }
  | { readonly kind: "string" }
  | { readonly kind: "null" }
  | { readonly kind: "array"; readonly elem: NativeType }
  | { readonly kind: "record"; readonly elem: NativeType }
  | { readonly kind: "wire.Value" }
  | { readonly kind: "wire.ListValue" }
  | { readonly kind: "wire.Struct" }
  | { readonly kind: "wire.Any" }
  | NativeInterface;

export type ScalarKind = "boolean" | "number" | "bigint" | "string" | "null";

function iface(name: string, implementedBy: (value: Val) => boolean): NativeInterface {
  return { kind: "interface", name, implementedBy };
}

export const NativeTypes = {
  boolean: { kind: "boolean" },
  number: { kind: "number" },
  bigint: { kind: "bigint" },
  string: { kind: "string" },
  null: { kind: "null" },
  wireValue: { kind: "wire.Value" },
  wireList: { kind: "wire.ListValue" },
  wireStruct: { kind: "wire.Struct" },
  wireAny: { kind: "wire.Any" },
  /** Implemented by every value. */
  dynamic: iface("unknown", () => true),
  arrayOf(elem: NativeType): NativeType {
    return { kind: "array", elem };
  },
  recordOf(elem: NativeType): NativeType {
    return { kind: "record", elem };
  },
  iface,
} as const satisfies Record<string, NativeType | ((...args: never[]) => NativeType)>;

export function formatNativeType(t: NativeType): string {
  switch (t.kind) {
    case "array":
      return `${formatNativeType(t.elem)}[]`;
    case "record":
      return `Record<string, ${formatNativeType(t.elem)}>`;
    case "interface":
      return `interface ${t.name}`;
    default:
      return t.kind;
  }
}
