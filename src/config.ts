import { z } from "zod";
import type { LogEntry } from "./logger.js";

export type LogHandler = (entry: LogEntry) => void;

const ConfigSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  // Only applies without a handler; the logger is silent otherwise
  logJson: z.boolean().default(false),
  logHandler: z
    .custom<LogHandler>((value) => typeof value === "function", {
      message: "logHandler must be a function",
    })
    .optional(),
  // Validate values against the declared type of relation types on set
  checkTargets: z.boolean().default(true),
});

export type RelationsConfig = z.output<typeof ConfigSchema>;
export type RelationsOptions = z.input<typeof ConfigSchema>;

let current: RelationsConfig = ConfigSchema.parse({});

/**
 * Update the global configuration. Options that are not given keep their
 * current value.
 */
export function configure(options: RelationsOptions): RelationsConfig {
  current = ConfigSchema.parse({ ...current, ...options });
  return current;
}

export function getConfig(): Readonly<RelationsConfig> {
  return current;
}

export function resetConfig(): void {
  current = ConfigSchema.parse({});
}
