import type { RtmEvent } from "../events";

export interface OutboundFrame {
  id: number;
  type: "message";
  channel: string;
  text: string;
}

export interface Transport {
  send(frame: OutboundFrame): Promise<void>;
  /** Next decoded event, or null once the connection has closed. */
  receive(signal?: AbortSignal): Promise<RtmEvent | null>;
  close(): Promise<void>;
}

export type TransportFactory = (url: string) => Promise<Transport>;
