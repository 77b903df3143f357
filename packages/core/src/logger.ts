import { getLogger, type Logger } from "@logtape/logtape";

/** Root log category. Library code never configures sinks. */
export const LOG_CATEGORY = "dynval";

export function getDynvalLogger(...subcategory: string[]): Logger {
  return getLogger([LOG_CATEGORY, ...subcategory]);
}
