#!/usr/bin/env -S node --import tsx
/**
 * dynval - inspect and operate on wire-backed lists
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { z } from "zod";
import { loadConfig } from "@dynval/core";
import { runInspect } from "./cmd-inspect.js";
import { runGet, runContains, runConcat, runEqual } from "./cmd-ops.js";
import { runConvert } from "./cmd-convert.js";
import { runConfig } from "./cmd-config.js";
import { setupLogging } from "./logging.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

const program = new Command();

program
  .name("dynval")
  .description("dynval: inspect and operate on JSON lists as runtime values")
  .version(pkg.version)
  .hook("preAction", async () => {
    await setupLogging(loadConfig().logLevel);
  });

program
  .command("inspect")
  .description("Show the type, size and elements of a list")
  .argument("<file>", "JSON array file (or - for stdin)")
  .option("--json", "Output as JSON", false)
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { json?: boolean; pretty?: boolean }) => {
    process.exitCode = await runInspect(file, opts);
  });

program
  .command("get")
  .description("Print the element at an index")
  .argument("<file>", "JSON array file (or - for stdin)")
  .argument("<index>", "Zero-based integer index")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, index: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runGet(file, index, opts);
  });

program
  .command("contains")
  .description("Test whether the list holds an element")
  .argument("<file>", "JSON array file (or - for stdin)")
  .argument("<json>", "Element as JSON, e.g. 2 or '\"a\"'")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, elem: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runContains(file, elem, opts);
  });

program
  .command("concat")
  .description("Concatenate two lists")
  .argument("<a>", "First JSON array file")
  .argument("<b>", "Second JSON array file")
  .option("--pretty", "Human-readable error output", false)
  .action(async (a: string, b: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runConcat(a, b, opts);
  });

program
  .command("equal")
  .description("Compare two lists element by element")
  .argument("<a>", "First JSON array file")
  .argument("<b>", "Second JSON array file")
  .option("--pretty", "Human-readable error output", false)
  .action(async (a: string, b: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runEqual(a, b, opts);
  });

program
  .command("convert")
  .description("Convert a list to json, wire, any or type form")
  .argument("<file>", "JSON array file (or - for stdin)")
  .option("--to <target>", "Target: json, wire, any, type", "json")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { to?: string; pretty?: boolean }) => {
    process.exitCode = await runConvert(file, opts);
  });

program
  .command("config")
  .description("Display effective configuration and resolution source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    process.exitCode = await runConfig(opts);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["inspect", "get", "contains", "concat", "equal", "convert", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
