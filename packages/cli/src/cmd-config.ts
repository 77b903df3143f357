/**
 * dynval config - effective configuration summary command
 */
import { resolveConfig } from "@dynval/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
        },
        null,
        2
      )
    );
    return 0;
  }

  console.log("Effective dynval config");
  console.log(`  Source:                  ${resolved.source}`);
  console.log(`  Path:                    ${resolved.path ?? "(none)"}`);
  console.log(`  Log level:               ${resolved.config.logLevel}`);
  console.log(`  Integral numbers as int: ${resolved.config.integralNumbersAsInt}`);
  return 0;
}
