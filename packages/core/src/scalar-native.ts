/**
 * Native conversion shared by the scalar values.
 */
import type { Val } from "./ref.js";
import type { NativeType, ScalarKind } from "./native.js";
import { formatNativeType } from "./native.js";
import type { WireValue } from "./wire.js";
import { packAny } from "./wire-any.js";
import { ConversionError } from "./errors.js";

export type ScalarNatives = Partial<Record<ScalarKind, () => unknown>>;

/**
 * `wire` is the value's wire form, or undefined when a wire number cannot
 * hold it exactly.
 */
export function scalarToNative(
  val: Val,
  typeDesc: NativeType,
  wire: WireValue | undefined,
  natives: ScalarNatives
): unknown {
  switch (typeDesc.kind) {
    case "boolean":
    case "number":
    case "bigint":
    case "string":
    case "null": {
      const convert = natives[typeDesc.kind];
      if (convert) return convert();
      break;
    }
    case "wire.Value":
      if (wire) return wire;
      break;
    case "wire.Any":
      if (wire) return packAny({ type: "wire.Value", message: wire });
      break;
    case "interface":
      if (typeDesc.implementedBy(val)) return val;
      break;
  }
  throw new ConversionError(
    `type conversion error from '${val.type().name}' to '${formatNativeType(typeDesc)}'`,
    { from: val.type().name, to: formatNativeType(typeDesc) }
  );
}
