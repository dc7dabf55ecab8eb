import type { Transport } from "../transport.js";
import { ConnectionError } from "../types.js";

/** In-memory {@link Transport} that records writes and replays queued replies. */
export class RecordingTransport implements Transport {
  readonly writes: Uint8Array[] = [];
  /** Replies handed out by `receive`, one per call. */
  readonly replies: Uint8Array[] = [];
  opened = 0;
  closed = 0;
  failOpen = false;
  isOpen = false;

  async open(): Promise<void> {
    if (this.failOpen) {
      throw new ConnectionError("connect ECONNREFUSED 127.0.0.1:9100", "CONNECTION_REFUSED");
    }
    this.opened += 1;
    this.isOpen = true;
  }

  async send(data: Uint8Array): Promise<void> {
    this.writes.push(Uint8Array.from(data));
  }

  async receive(maxBytes: number): Promise<Uint8Array> {
    const next = this.replies.shift();
    return next ? next.subarray(0, maxBytes) : new Uint8Array(0);
  }

  async close(): Promise<boolean> {
    this.closed += 1;
    const wasOpen = this.isOpen;
    this.isOpen = false;
    return wasOpen;
  }

  /** All bytes written so far. */
  bytes(): number[] {
    return this.writes.flatMap((w) => [...w]);
  }
}
