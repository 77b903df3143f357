/**
 * dynval configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { WireAdapter } from "./adapter.js";

export const configSchema = z.object({
  version: z.number().int().default(1),
  logLevel: z
    .enum(["trace", "debug", "info", "warning", "error", "fatal"])
    .default("warning"),
  integralNumbersAsInt: z.boolean().default(false),
});

export type Config = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".dynvalrc.json";

const DEFAULT_CONFIG: Config = configSchema.parse({});

/**
 * Resolve the effective configuration.
 * Precedence: ./.dynvalrc.json > ~/.dynval/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".dynval", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

/**
 * A missing, unreadable or invalid file yields null so that resolution
 * falls through to the next source.
 */
function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch {
    return null;
  }
  const parsed = configSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export function adapterFromConfig(config: Config): WireAdapter {
  return new WireAdapter({ integralNumbersAsInt: config.integralNumbersAsInt });
}
