import { z } from "zod";

export const HistoryConfigSchema = z
  .object({
    persist: z.boolean().default(false),
    dbPath: z.string().min(1).optional(),
    loadOnConnect: z.boolean().default(false),
    clearCommands: z.boolean().default(false),
    includeDms: z.boolean().default(true),
    pacingMs: z.number().int().nonnegative().default(1000),
    progressEvery: z.number().int().positive().default(100),
  })
  .strict();

export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;
