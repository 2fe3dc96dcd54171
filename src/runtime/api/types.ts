import { z } from "zod";

const NamedEntitySchema = z.object({ id: z.string(), name: z.string() }).passthrough();

export const SlackUserSchema = NamedEntitySchema.extend({
  profile: z
    .object({ display_name_normalized: z.string().optional() })
    .passthrough()
    .optional(),
});

export const RtmStartResponseSchema = z
  .object({
    ok: z.literal(true),
    url: z.string().min(1),
    self: z.object({ id: z.string(), name: z.string() }).passthrough().optional(),
    channels: z.array(NamedEntitySchema).default([]),
    groups: z.array(NamedEntitySchema).default([]),
    users: z.array(SlackUserSchema).default([]),
  })
  .passthrough();

export const HistoryPageSchema = z
  .object({
    messages: z.array(z.record(z.string(), z.unknown())),
    has_more: z.boolean(),
  })
  .passthrough();

export type SlackChannel = z.infer<typeof NamedEntitySchema>;
export type SlackUser = z.infer<typeof SlackUserSchema>;
export type RtmStartResponse = z.infer<typeof RtmStartResponseSchema>;
export type HistoryMessage = Record<string, unknown>;
export type HistoryPage = { messages: HistoryMessage[]; hasMore: boolean };

export type OpenImResult =
  | { ok: true; channelId: string }
  | { ok: false; error: string };

export interface DeleteOptions {
  /** Use the elevated admin token; without one configured the delete is skipped. */
  admin: boolean;
}

export interface UploadOptions {
  file: string;
  channel: string;
  title?: string;
}

/** The subset of the Slack Web API the runtime calls. */
export interface SlackApi {
  rtmStart(): Promise<RtmStartResponse>;
  openIm(userId: string): Promise<OpenImResult>;
  history(channelId: string, latest?: string): Promise<HistoryPage>;
  addReaction(name: string, channelId: string, timestamp: string): Promise<void>;
  /** Resolves to false when the delete was skipped for lack of a token. */
  deleteMessage(channelId: string, timestamp: string, options: DeleteOptions): Promise<boolean>;
  uploadFile(options: UploadOptions): Promise<void>;
}
