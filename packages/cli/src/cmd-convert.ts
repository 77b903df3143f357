/**
 * dynval convert - render a list in one of its native forms
 */
import { z } from "zod";
import { NativeTypes, TypeType, isWireAny, isWireList, listToJson } from "@dynval/core";
import {
  CliError,
  EXIT_INPUT,
  EXIT_OK,
  adapterFor,
  loadList,
  runCommand,
  type CommonOpts,
} from "./load.js";
import { printResult } from "./render.js";

export const convertTargets = z.enum(["json", "wire", "any", "type"]);
export type ConvertTarget = z.infer<typeof convertTargets>;

export async function runConvert(file: string, opts: CommonOpts & { to?: string }): Promise<number> {
  return runCommand(opts, () => {
    const target = convertTargets.safeParse(opts.to ?? "json");
    if (!target.success) {
      throw new CliError(
        "E_ARG",
        `Unknown conversion target '${opts.to}'. Expected one of: ${convertTargets.options.join(", ")}`,
        EXIT_INPUT
      );
    }
    const list = loadList(file, adapterFor(opts));

    switch (target.data) {
      case "json":
      case "wire": {
        const wire = list.convertToNative(NativeTypes.wireList);
        if (!isWireList(wire)) {
          throw new Error("wire.ListValue conversion returned an unexpected value");
        }
        const out = target.data === "json" ? listToJson(wire) : wire;
        console.log(JSON.stringify(out, null, 2));
        return EXIT_OK;
      }
      case "any": {
        const packed = list.convertToNative(NativeTypes.wireAny);
        if (!isWireAny(packed)) {
          throw new Error("wire.Any conversion returned an unexpected value");
        }
        const encoded = Buffer.from(packed.value).toString("base64");
        console.log(JSON.stringify({ typeUrl: packed.typeUrl, value: encoded }, null, 2));
        return EXIT_OK;
      }
      case "type":
        return printResult(list.convertToType(TypeType), opts);
    }
  });
}
