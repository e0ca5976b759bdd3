/**
 * Zod schema for the runner's environment configuration.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LogFormatSchema = z.enum(["text", "json"]);

/** Encodings the Node.js file access accepts for reading and writing text. */
export const TextEncodingSchema = z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]);

export const RunnerConfigSchema = z.object({
  logLevel: LogLevelSchema.optional(),
  logFormat: LogFormatSchema.default("text"),
  encoding: TextEncodingSchema.default("utf-8"),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type TextEncoding = z.infer<typeof TextEncodingSchema>;
