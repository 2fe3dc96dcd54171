import type { DeliveryCallback, MessageSender } from "../actions/types";
import { logger } from "../logger";
import { DEFAULT_CHUNK_LIMIT, splitFixed } from "../utils/text-chunk";
import type { Transport } from "./transport/types";

export interface PendingResponse {
  channel: string;
  callback: DeliveryCallback;
}

/**
 * Delivery callbacks keyed by outbound message id. Entries are only created
 * for sends that carry a callback and are removed when taken.
 */
export class PendingResponses {
  private readonly entries = new Map<number, PendingResponse>();

  register(id: number, channel: string, callback: DeliveryCallback): void {
    this.entries.set(id, { channel, callback });
  }

  take(id: number): PendingResponse | undefined {
    const entry = this.entries.get(id);
    if (entry) {
      this.entries.delete(id);
    }
    return entry;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface OutboundSenderOptions {
  chunkLimit?: number;
}

/** Sends RTM message frames for one connection; ids start at 0. */
export class OutboundSender implements MessageSender {
  readonly pending = new PendingResponses();
  private nextId = 0;
  private readonly chunkLimit: number;

  constructor(
    private readonly transport: Transport,
    options: OutboundSenderOptions = {},
  ) {
    this.chunkLimit = options.chunkLimit ?? DEFAULT_CHUNK_LIMIT;
  }

  /** Only the last chunk of a long text registers the delivery callback. */
  async send(text: string, channelId: string, onDelivered?: DeliveryCallback): Promise<void> {
    const chunks = splitFixed(text, this.chunkLimit);
    for (const [index, chunk] of chunks.entries()) {
      const isLast = index === chunks.length - 1;
      const id = this.nextId;
      this.nextId += 1;
      const callback = isLast ? onDelivered : undefined;
      if (callback) {
        this.pending.register(id, channelId, callback);
      }
      logger.info({ channel: channelId, id }, `Sending message: ${chunk}`);
      try {
        await this.transport.send({ id, type: "message", channel: channelId, text: chunk });
      } catch (err) {
        if (callback) {
          this.pending.take(id);
        }
        throw err;
      }
    }
  }
}
