import WebSocket, { type RawData } from "ws";
import { logger } from "../../logger";
import type { RtmEvent } from "../events";
import type { OutboundFrame, Transport } from "./types";

type Waiter = (event: RtmEvent | null) => void;

function decodeFrame(raw: RawData): RtmEvent | undefined {
  const text = Array.isArray(raw)
    ? Buffer.concat(raw).toString("utf-8")
    : Buffer.from(raw instanceof ArrayBuffer ? new Uint8Array(raw) : raw).toString("utf-8");
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (err) {
    logger.warn({ err, frame: text.slice(0, 200) }, "Dropping undecodable RTM frame");
    return undefined;
  }
  logger.warn({ frame: text.slice(0, 200) }, "Dropping RTM frame that is not an object");
  return undefined;
}

/**
 * RTM websocket. Inbound frames are buffered until `receive` asks for them;
 * once the socket closes every pending and future `receive` yields null.
 */
export class WebSocketTransport implements Transport {
  private readonly buffered: RtmEvent[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  private constructor(private readonly socket: WebSocket) {
    socket.on("message", (raw) => {
      const event = decodeFrame(raw);
      if (event) {
        this.push(event);
      }
    });
    socket.on("close", (code, reason) => {
      logger.info({ code, reason: reason.toString() }, "Websocket closed");
      this.markClosed();
    });
    socket.on("error", (err) => {
      logger.warn({ err }, "Websocket error");
      this.markClosed();
    });
  }

  static connect(url: string): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      const onError = (err: Error) => {
        socket.off("open", onOpen);
        reject(err);
      };
      const onOpen = () => {
        socket.off("error", onError);
        resolve(new WebSocketTransport(socket));
      };
      socket.once("open", onOpen);
      socket.once("error", onError);
    });
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (this.closed) {
      throw new Error("Websocket is closed");
    }
    await new Promise<void>((resolve, reject) => {
      this.socket.send(JSON.stringify(frame), (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  receive(signal?: AbortSignal): Promise<RtmEvent | null> {
    const next = this.buffered.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      const waiter: Waiter = (event) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(event);
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve(null);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    const state = this.socket.readyState;
    if (state === WebSocket.OPEN || state === WebSocket.CONNECTING) {
      this.socket.close(1000, "client_close");
    }
    this.markClosed();
  }

  private push(event: RtmEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }
    this.buffered.push(event);
  }

  private markClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
