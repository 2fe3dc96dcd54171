import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type LoggingConfig = z.infer<typeof LoggingSchema>;
