import type {
  DeleteOptions,
  HistoryPage,
  OpenImResult,
  RtmStartResponse,
  SlackApi,
  UploadOptions,
} from "../../src/runtime/api/types";
import type { RtmEvent } from "../../src/runtime/events";
import type { OutboundFrame, Transport } from "../../src/runtime/transport/types";

type Waiter = (event: RtmEvent | null) => void;

/**
 * In-process RTM socket. Scripted events are delivered in order; once they run
 * out the socket reports itself closed unless `holdOpen` is set.
 */
export class FakeTransport implements Transport {
  readonly sent: OutboundFrame[] = [];
  closed = false;
  private readonly inbound: RtmEvent[];
  private readonly waiters: Waiter[] = [];

  constructor(
    events: RtmEvent[] = [],
    private readonly options: { autoAck?: boolean; holdOpen?: boolean } = {},
  ) {
    this.inbound = [...events];
  }

  push(event: RtmEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }
    this.inbound.push(event);
  }

  async send(frame: OutboundFrame): Promise<void> {
    this.sent.push(frame);
    if (this.options.autoAck) {
      this.push({ ok: true, reply_to: frame.id, ts: `${1000 + frame.id}.0`, text: frame.text });
    }
  }

  receive(signal?: AbortSignal): Promise<RtmEvent | null> {
    const next = this.inbound.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed || signal?.aborted || !this.options.holdOpen) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      const waiter: Waiter = (event) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(event);
      };
      const onAbort = () => {
        this.waiters.splice(this.waiters.indexOf(waiter), 1);
        resolve(null);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}

export interface FakeSlackApiOptions {
  snapshot?: Partial<RtmStartResponse>;
  /** im.open failures by user id; everyone else gets `D` + their id. */
  imErrors?: Record<string, string>;
  /** History pages per channel id, served in order. */
  history?: Record<string, HistoryPage[]>;
  hasAdminToken?: boolean;
}

export class FakeSlackApi implements SlackApi {
  readonly reactions: Array<{ name: string; channel: string; timestamp: string }> = [];
  readonly deletes: Array<{ channel: string; timestamp: string; admin: boolean }> = [];
  readonly uploads: UploadOptions[] = [];
  readonly historyCalls: Array<{ channel: string; latest?: string }> = [];
  rtmStartCalls = 0;
  private readonly pages: Map<string, HistoryPage[]>;

  constructor(private readonly options: FakeSlackApiOptions = {}) {
    this.pages = new Map(
      Object.entries(options.history ?? {}).map(([channel, pages]) => [channel, [...pages]]),
    );
  }

  async rtmStart(): Promise<RtmStartResponse> {
    this.rtmStartCalls += 1;
    return {
      ok: true,
      url: `wss://rtm.test/${this.rtmStartCalls}`,
      channels: [],
      groups: [],
      users: [],
      ...this.options.snapshot,
    };
  }

  async openIm(userId: string): Promise<OpenImResult> {
    const error = this.options.imErrors?.[userId];
    if (error) {
      return { ok: false, error };
    }
    return { ok: true, channelId: `D${userId}` };
  }

  async history(channelId: string, latest?: string): Promise<HistoryPage> {
    this.historyCalls.push({ channel: channelId, latest });
    const page = this.pages.get(channelId)?.shift();
    return page ?? { messages: [], hasMore: false };
  }

  async addReaction(name: string, channelId: string, timestamp: string): Promise<void> {
    this.reactions.push({ name, channel: channelId, timestamp });
  }

  async deleteMessage(
    channelId: string,
    timestamp: string,
    options: DeleteOptions,
  ): Promise<boolean> {
    if (options.admin && this.options.hasAdminToken === false) {
      return false;
    }
    this.deletes.push({ channel: channelId, timestamp, admin: options.admin });
    return true;
  }

  async uploadFile(options: UploadOptions): Promise<void> {
    this.uploads.push(options);
  }
}

export function messageEvent(
  fields: { user: string; channel: string; text: string; ts?: string },
): RtmEvent {
  return { type: "message", ...fields };
}
