/**
 * Log sink setup for the command line. Records go to stderr so that stdout
 * carries only command output.
 */
import { Writable } from "node:stream";
import { configure, getStreamSink, type LogLevel } from "@logtape/logtape";
import { LOG_CATEGORY } from "@dynval/core";

export async function setupLogging(lowestLevel: LogLevel): Promise<void> {
  await configure({
    reset: true,
    sinks: {
      stderr: getStreamSink(Writable.toWeb(process.stderr)),
    },
    loggers: [
      {
        category: [LOG_CATEGORY],
        lowestLevel,
        sinks: ["stderr"],
      },
      {
        category: ["logtape", "meta"],
        lowestLevel: "warning",
        sinks: ["stderr"],
      },
    ],
  });
}
