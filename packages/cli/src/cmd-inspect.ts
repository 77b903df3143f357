/**
 * dynval inspect - walk a list through its iterator
 */
import { BoolValue } from "@dynval/core";
import type { JsonValue } from "@dynval/core";
import { EXIT_OK, adapterFor, loadList, runCommand, type CommonOpts } from "./load.js";
import { valueToJson } from "./render.js";

interface ElementInfo {
  type: string;
  value: JsonValue;
}

export async function runInspect(file: string, opts: CommonOpts & { json?: boolean }): Promise<number> {
  return runCommand(opts, () => {
    const list = loadList(file, adapterFor(opts));
    const elements: ElementInfo[] = [];
    const iter = list.iterator();
    while (iter.hasNext() === BoolValue.True) {
      const elem = iter.next();
      if (elem === undefined) break;
      elements.push({ type: elem.type().name, value: valueToJson(elem) });
    }
    const size = Number(list.size().value());

    if (opts.json) {
      console.log(JSON.stringify({ type: list.type().name, size, elements }, null, 2));
      return EXIT_OK;
    }

    console.log(`type: ${list.type().name}`);
    console.log(`size: ${size}`);
    elements.forEach((e, i) => {
      console.log(`  [${i}] ${e.type} ${JSON.stringify(e.value)}`);
    });
    return EXIT_OK;
  });
}
