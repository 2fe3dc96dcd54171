import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { ProtocolError, SlackApiError } from "../../errors";
import { logger } from "../../logger";
import {
  HistoryPageSchema,
  RtmStartResponseSchema,
  type DeleteOptions,
  type HistoryPage,
  type OpenImResult,
  type RtmStartResponse,
  type SlackApi,
  type UploadOptions,
} from "./types";

export const SLACK_API_BASE_URL = "https://slack.com/api/";

const MAX_RATE_LIMIT_RETRIES = 3;
const DEFAULT_RETRY_AFTER_SECONDS = 1;

export interface HttpSlackApiConfig {
  token: string;
  adminToken?: string;
  /** Used as the uploaded file title. */
  botName?: string;
  baseUrl?: string;
}

type SlackBody = Record<string, unknown>;

type RequestOptions = {
  httpMethod?: "GET" | "POST";
  token?: string;
  params?: Record<string, string>;
  form?: FormData;
};

function isRecord(value: unknown): value is SlackBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readError(body: SlackBody): string {
  return typeof body.error === "string" ? body.error : "unknown_error";
}

export function historyMethodFor(channelId: string): string {
  if (channelId.startsWith("C")) {
    return "channels.history";
  }
  if (channelId.startsWith("G")) {
    return "groups.history";
  }
  return "im.history";
}

export class HttpSlackApi implements SlackApi {
  private readonly baseUrl: string;

  constructor(private readonly config: HttpSlackApiConfig) {
    this.baseUrl = config.baseUrl ?? SLACK_API_BASE_URL;
  }

  async rtmStart(): Promise<RtmStartResponse> {
    const body = await this.call("rtm.start");
    if (body.ok !== true) {
      throw new SlackApiError("rtm.start", readError(body));
    }
    const parsed = RtmStartResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError("rtm.start response is malformed", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  async openIm(userId: string): Promise<OpenImResult> {
    const body = await this.call("im.open", { params: { user: userId } });
    if (body.ok !== true) {
      return { ok: false, error: readError(body) };
    }
    const channel = isRecord(body.channel) ? body.channel : undefined;
    if (typeof channel?.id !== "string") {
      throw new ProtocolError("im.open response has no channel id", { userId });
    }
    return { ok: true, channelId: channel.id };
  }

  async history(channelId: string, latest?: string): Promise<HistoryPage> {
    const method = historyMethodFor(channelId);
    const params: Record<string, string> = { channel: channelId, inclusive: "false" };
    if (latest !== undefined) {
      params.latest = latest;
    }
    const body = await this.call(method, { params });
    const parsed = HistoryPageSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError(`${method} response is missing messages or has_more`, {
        channel: channelId,
        ok: body.ok,
        error: body.error,
      });
    }
    return { messages: parsed.data.messages, hasMore: parsed.data.has_more };
  }

  async addReaction(name: string, channelId: string, timestamp: string): Promise<void> {
    await this.call("reactions.add", {
      httpMethod: "POST",
      params: { name, channel: channelId, timestamp },
    });
  }

  async deleteMessage(
    channelId: string,
    timestamp: string,
    options: DeleteOptions,
  ): Promise<boolean> {
    const token = options.admin ? this.config.adminToken : this.config.token;
    if (!token) {
      logger.debug({ channel: channelId, ts: timestamp }, "No admin token; delete skipped");
      return false;
    }
    await this.call("chat.delete", {
      httpMethod: "POST",
      token,
      params: { channel: channelId, ts: timestamp, as_user: "true" },
    });
    return true;
  }

  async uploadFile(options: UploadOptions): Promise<void> {
    const content = await fs.readFile(options.file);
    const filename = path.basename(options.file);
    const form = new FormData();
    form.append("file", new Blob([content]), filename);
    form.append("filetype", path.extname(filename).slice(1) || "auto");
    form.append("channels", options.channel);
    form.append("filename", options.title ?? `${this.config.botName ?? "bot"} upload`);
    await this.call("files.upload", { httpMethod: "POST", form });
  }

  private async call(method: string, options: RequestOptions = {}): Promise<SlackBody> {
    const httpMethod = options.httpMethod ?? "GET";
    const token = options.token ?? this.config.token;
    const url = new URL(method, this.baseUrl);

    let body: URLSearchParams | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (httpMethod === "POST") {
      body = new URLSearchParams(options.params ?? {});
    } else {
      for (const [key, value] of Object.entries(options.params ?? {})) {
        url.searchParams.set(key, value);
      }
    }

    for (let attempt = 0; ; attempt += 1) {
      const response = await fetch(url, {
        method: httpMethod,
        headers: { Authorization: `Bearer ${token}` },
        body,
      });

      if (response.status === 429 && attempt < MAX_RATE_LIMIT_RETRIES) {
        const retryAfter = Number(response.headers.get("retry-after"));
        const delaySeconds =
          Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : DEFAULT_RETRY_AFTER_SECONDS;
        logger.warn({ method, attempt, delaySeconds }, "Slack rate limited request; retrying");
        await sleep(delaySeconds * 1000);
        continue;
      }

      const payload: unknown = await response.json();
      if (!isRecord(payload)) {
        throw new ProtocolError(`${method} returned a non-object body`, {
          status: response.status,
        });
      }
      if (payload.ok !== true) {
        logger.warn({ method, error: payload.error }, "Slack returned bad status");
      }
      return payload;
    }
  }
}
