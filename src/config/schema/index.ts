import { z } from "zod";
import { HistoryConfigSchema } from "./history";
import { LoggingSchema } from "./logging";
import { SlackConfigSchema } from "./slack";

export const RtmbotConfigSchema = z
  .object({
    $schema: z.string().optional(),
    slack: SlackConfigSchema,
    history: HistoryConfigSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict();

export type RtmbotConfig = z.infer<typeof RtmbotConfigSchema>;
export { HistoryConfigSchema, LoggingSchema, SlackConfigSchema };
export type { HistoryConfig } from "./history";
export type { LoggingConfig, LogLevel } from "./logging";
export type { SlackConfig } from "./slack";
