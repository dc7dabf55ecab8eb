import net from "node:net";
import logger from "./logger.js";
import type { PrinterErrorCode } from "./types.js";
import { ConnectionError, PrinterError } from "./types.js";

// ─── Error classification ────────────────────────────────────────────────────

export function classifyError(err: unknown): PrinterErrorCode {
  const code =
    err && typeof err === "object" && "code" in err
      ? (err as NodeJS.ErrnoException).code
      : undefined;
  switch (code) {
    case "ECONNREFUSED":
      return "CONNECTION_REFUSED";
    case "ETIMEDOUT":
      return "TIMEOUT";
    case "ENOTFOUND":
    case "EAI_AGAIN":
    case "EHOSTUNREACH":
    case "ENETUNREACH":
      return "HOST_NOT_FOUND";
    case "EPIPE":
      return "BROKEN_PIPE";
    case "ECONNRESET":
      return "CONNECTION_RESET";
    default:
      return "UNKNOWN";
  }
}

export function wrapError(err: unknown): PrinterError {
  if (err instanceof PrinterError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new ConnectionError(msg, classifyError(err), err);
}

// ─── Transport contract ──────────────────────────────────────────────────────

/**
 * A byte stream to one printer. Used one call at a time; callers await each
 * operation before starting the next.
 */
export interface Transport {
  /** Connect. Rejects with {@link ConnectionError} when the printer cannot be reached. */
  open(): Promise<void>;

  /** Write the whole buffer. Rejects with {@link ConnectionError} on failure. */
  send(data: Uint8Array): Promise<void>;

  /**
   * Read at most `maxBytes`. Resolves with an empty buffer when nothing
   * arrives before the timeout or the peer has closed.
   */
  receive(maxBytes: number): Promise<Uint8Array>;

  /**
   * Shut down and release the connection. Never rejects. Resolves `true` when
   * an open connection was shut down, `false` when there was nothing to close.
   */
  close(): Promise<boolean>;
}

export interface TcpTransportOptions {
  host: string;
  port: number;
  /** Milliseconds allowed for connecting and for each `receive`. */
  timeout: number;
}

/** How long `close()` waits for the FIN to flush before destroying the socket. */
const CLOSE_GRACE_MS = 2_000;

const EMPTY = new Uint8Array(0);

// ─── TCP transport ───────────────────────────────────────────────────────────

/**
 * Raw TCP connection to a printer's 9100 port.
 *
 * Data the printer sends is buffered as soon as it arrives and handed out by
 * {@link TcpTransport.receive}.
 *
 * @example
 * ```ts
 * const transport = new TcpTransport({ host: "192.168.1.100", port: 9100, timeout: 5000 });
 * await transport.open();
 * await transport.send(Uint8Array.of(0x10, 0x04, 0x01));
 * const reply = await transport.receive(16);
 * await transport.close();
 * ```
 */
export class TcpTransport implements Transport {
  private readonly options: TcpTransportOptions;
  private socket: net.Socket | null = null;
  private inbox: Buffer = Buffer.alloc(0);
  private ended = false;
  private failure: PrinterError | null = null;
  private notify: (() => void) | null = null;

  constructor(options: TcpTransportOptions) {
    this.options = options;
  }

  get isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  open(): Promise<void> {
    if (this.isOpen) return Promise.resolve();

    const { host, port, timeout } = this.options;
    this.inbox = Buffer.alloc(0);
    this.ended = false;
    this.failure = null;

    return new Promise<void>((resolve, reject) => {
      const sock = net.createConnection({ host, port });

      const onTimeout = () => {
        sock.destroy();
        reject(
          new ConnectionError(
            `Connection to ${host}:${port} timed out after ${timeout}ms`,
            "TIMEOUT"
          )
        );
      };
      const onError = (err: Error) => {
        sock.destroy();
        reject(wrapError(err));
      };
      const onConnect = () => {
        sock.removeListener("timeout", onTimeout);
        sock.removeListener("error", onError);
        // The connect timeout must not turn into an idle timeout.
        sock.setTimeout(0);
        sock.setNoDelay(true);
        this.attach(sock);
        logger.debug(`connected to ${host}:${port}`);
        resolve();
      };

      sock.setTimeout(timeout);
      sock.once("timeout", onTimeout);
      sock.once("error", onError);
      sock.once("connect", onConnect);
    });
  }

  // Events from a socket that close() already released must not touch the
  // state of the connection that replaced it.
  private attach(sock: net.Socket): void {
    this.socket = sock;
    sock.on("data", (chunk: Buffer) => {
      if (this.socket !== sock) return;
      this.inbox = Buffer.concat([this.inbox, chunk]);
      this.wake();
    });
    sock.on("end", () => {
      if (this.socket !== sock) return;
      this.ended = true;
      this.wake();
    });
    sock.on("error", (err) => {
      logger.debug(`socket error: ${err.message}`);
      if (this.socket !== sock) return;
      this.failure = wrapError(err);
    });
    sock.on("close", () => {
      if (this.socket !== sock) return;
      this.ended = true;
      this.socket = null;
      this.wake();
    });
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }

  send(data: Uint8Array): Promise<void> {
    const sock = this.socket;
    if (!sock || sock.destroyed) {
      return Promise.reject(
        this.failure ??
          new ConnectionError(
            `Not connected to ${this.options.host}:${this.options.port}`,
            "NOT_CONNECTED"
          )
      );
    }
    return new Promise<void>((resolve, reject) => {
      sock.write(data, (err) => {
        if (err) {
          reject(wrapError(err));
          return;
        }
        resolve();
      });
    });
  }

  async receive(maxBytes: number): Promise<Uint8Array> {
    if (maxBytes <= 0) return EMPTY;
    if (this.inbox.length === 0 && !this.ended && this.isOpen) {
      await this.waitForData();
    }
    if (this.inbox.length === 0) return EMPTY;
    const out = this.inbox.subarray(0, maxBytes);
    this.inbox = this.inbox.subarray(out.length);
    return out;
  }

  private waitForData(): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        if (this.notify === done) this.notify = null;
        resolve();
      };
      const timer = setTimeout(done, this.options.timeout);
      this.notify = done;
    });
  }

  close(): Promise<boolean> {
    const sock = this.socket;
    this.socket = null;
    this.wake();
    if (!sock || sock.destroyed) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      let settled = false;
      const finish = () => {
        if (settled) return;
        settled = true;
        clearTimeout(forceTimer);
        if (!sock.destroyed) sock.destroy();
        logger.debug(`closed ${this.options.host}:${this.options.port}`);
        resolve(true);
      };
      // Printers often never answer the FIN.
      const forceTimer = setTimeout(finish, CLOSE_GRACE_MS);
      try {
        sock.end(finish);
      } catch (err) {
        logger.debug(`shutdown failed: ${wrapError(err).message}`);
        finish();
      }
    });
  }
}
