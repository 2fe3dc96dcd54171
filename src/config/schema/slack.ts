import { z } from "zod";

export const SlackConfigSchema = z
  .object({
    token: z.string().min(1),
    /** Elevated token used to delete other users' messages. */
    adminToken: z.string().min(1).optional(),
    botName: z.string().min(1),
    alert: z.string().min(1).default("!"),
    /** User names allowed to run admin-only commands. */
    admins: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type SlackConfig = z.infer<typeof SlackConfigSchema>;
