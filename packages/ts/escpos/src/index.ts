import { RT_RESPONSE_MAX, RT_STATUS_ONLINE, RT_STATUS_PAPER } from "./commands.js";
import { encodeCut, encodeNewlines, encodeStyle, encodeText, isKnownCodepage } from "./encode.js";
import logger from "./logger.js";
import { decodeOnline, decodePaperStatus } from "./status.js";
import { TcpTransport, type Transport } from "./transport.js";
import type { PaperStatus, PrinterConfig, ResolvedPrinterConfig, StyleOptions } from "./types.js";
import { InvalidArgumentError } from "./types.js";

export * as commands from "./commands.js";
export {
  encodeCut,
  encodeNewlines,
  encodeStyle,
  encodeText,
  parseCustomSize,
  parseCutMode,
  parseDensity,
  parseFont,
  sizeByte,
  sizeMode,
  type CustomSize,
  type CutMode,
  type Density,
} from "./encode.js";
export { decodeOnline, decodePaperStatus } from "./status.js";
export { TcpTransport, type Transport, type TcpTransportOptions } from "./transport.js";
export {
  ConnectionError,
  EncodingError,
  InvalidArgumentError,
  PrinterError,
  PAPER_ADEQUATE,
  PAPER_EMPTY,
  PAPER_LOW,
  type Alignment,
  type FontSelector,
  type PaperStatus,
  type PrinterConfig,
  type PrinterErrorCode,
  type ResolvedPrinterConfig,
  type StyleOptions,
  type UnderlineLevel,
} from "./types.js";

// ─── Defaults ────────────────────────────────────────────────────────────────

const DEFAULT_PORT = 9100;
const DEFAULT_TIMEOUT = 30_000;
const DEFAULT_CODEPAGE = "cp866";
const DEFAULT_STATUS_DELAY = 1_000;

/** Node timers fire after 1 ms for any delay above this. */
const MAX_TIMER_MS = 2_147_483_647;

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function resolveConfig(cfg: PrinterConfig): ResolvedPrinterConfig {
  if (!cfg.host || cfg.host.trim().length === 0) {
    throw new InvalidArgumentError("host is required");
  }
  const port = cfg.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${port} (must be 1–65535)`);
  }
  const timeout = cfg.timeout ?? DEFAULT_TIMEOUT;
  if (!Number.isFinite(timeout) || timeout <= 0 || timeout > MAX_TIMER_MS) {
    throw new InvalidArgumentError(`Invalid timeout: ${timeout} (must be > 0 and <= ${MAX_TIMER_MS} ms)`);
  }
  const statusDelay = cfg.statusDelay ?? DEFAULT_STATUS_DELAY;
  if (!Number.isFinite(statusDelay) || statusDelay < 0 || statusDelay > MAX_TIMER_MS) {
    throw new InvalidArgumentError(
      `Invalid statusDelay: ${statusDelay} (must be 0 to ${MAX_TIMER_MS} ms)`
    );
  }
  const codepage = cfg.codepage ?? DEFAULT_CODEPAGE;
  if (!isKnownCodepage(codepage)) {
    throw new InvalidArgumentError(`Unknown codepage: ${codepage}`);
  }
  return Object.freeze({
    host: cfg.host,
    port,
    timeout,
    autoclose: cfg.autoclose ?? true,
    codepage,
    statusDelay,
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface ConnectOptions {
  /** Use this transport instead of opening a TCP socket to `host:port`. */
  transport?: Transport;
}

// ─── Printer controller ──────────────────────────────────────────────────────

/**
 * An ESC/POS printer reached over a raw TCP socket.
 *
 * Style is held by the printer firmware, not by this object: each `set()`
 * call sends a complete style sequence.
 *
 * @example
 * ```ts
 * import { NetworkPrinter } from "net-escpos";
 *
 * const printer = await NetworkPrinter.connect({ host: "192.168.1.100" });
 * await printer.set({ align: "center", width: 2, height: 2, customSize: true });
 * await printer.textLine("Receipt #42");
 * await printer.cut("PART");
 * await printer.close();
 * ```
 */
export class NetworkPrinter {
  readonly config: ResolvedPrinterConfig;
  private readonly transport: Transport;

  private constructor(config: ResolvedPrinterConfig, transport: Transport) {
    this.config = config;
    this.transport = transport;
  }

  /**
   * Resolve `config` and open the connection. The printer is returned only
   * once the socket is connected.
   *
   * @throws {InvalidArgumentError} for an invalid configuration.
   * @throws {ConnectionError} when the printer cannot be reached within `timeout`.
   */
  static async connect(config: PrinterConfig, opts?: ConnectOptions): Promise<NetworkPrinter> {
    const cfg = resolveConfig(config);
    const transport =
      opts?.transport ?? new TcpTransport({ host: cfg.host, port: cfg.port, timeout: cfg.timeout });
    const printer = new NetworkPrinter(cfg, transport);
    await printer.open();
    return printer;
  }

  /** Open the connection. Also re-opens it after {@link NetworkPrinter.close}. */
  async open(): Promise<void> {
    await this.transport.open();
    logger.info(`printer ${this.config.host}:${this.config.port} open`);
  }

  /**
   * Close the connection. Shutdown errors are ignored.
   *
   * @returns `false` when the connection was already closed.
   */
  async close(): Promise<boolean> {
    const closed = await this.transport.close();
    if (closed) {
      logger.info(`printer ${this.config.host}:${this.config.port} closed`);
    }
    return closed;
  }

  /** Send a raw command sequence. */
  async raw(data: Uint8Array): Promise<void> {
    await this.transport.send(data);
  }

  /**
   * Set text properties.
   *
   * Sends size, flip, smoothing, bold, underline, font, alignment, density
   * (unless left unchanged) and invert, in that order.
   */
  async set(options: StyleOptions = {}): Promise<void> {
    await this.raw(encodeStyle(options));
  }

  /**
   * Print text encoded in the configured code page.
   *
   * @throws {EncodingError} if the code page cannot represent a character.
   */
  async text(value: string): Promise<void> {
    await this.raw(encodeText(value, this.config.codepage));
  }

  /** Print text followed by a newline. */
  async textLine(value: string): Promise<void> {
    await this.text(`${value}\n`);
  }

  /**
   * Feed `count` lines. Nothing is sent for 0.
   *
   * @throws {InvalidArgumentError} if count is negative.
   */
  async newline(count = 1): Promise<void> {
    const feed = encodeNewlines(count);
    if (feed.length > 0) {
      await this.raw(feed);
    }
  }

  /**
   * Feed six lines and cut. `"PART"` (any case) requests a partial cut; any
   * other value cuts fully. Not every model can cut partially.
   */
  async cut(mode = "FULL"): Promise<void> {
    await this.raw(encodeCut(mode));
  }

  /**
   * Send a real-time status request and return the raw reply (at most 16
   * bytes, possibly empty).
   *
   * Waits `statusDelay` before reading since many printers take a moment to
   * prepare the reply.
   */
  async queryStatus(mode: Uint8Array): Promise<Uint8Array> {
    await this.raw(mode);
    await sleep(this.config.statusDelay);
    const status = await this.transport.receive(RT_RESPONSE_MAX);
    logger.debug(`status query answered with ${status.length} byte(s)`);
    return status;
  }

  /** `true` when the printer reports itself online. No reply counts as offline. */
  async isOnline(): Promise<boolean> {
    return decodeOnline(await this.queryStatus(RT_STATUS_ONLINE));
  }

  /**
   * Query the paper sensor.
   *
   * @returns 2 when paper is adequate (or the printer did not reply), 1 when
   *   the roll is near its end, 0 when there is no paper.
   */
  async paperStatus(): Promise<PaperStatus> {
    return decodePaperStatus(await this.queryStatus(RT_STATUS_PAPER));
  }
}

/**
 * Connect to a printer.
 *
 * @see {@link NetworkPrinter.connect}
 */
export function connect(config: PrinterConfig, opts?: ConnectOptions): Promise<NetworkPrinter> {
  return NetworkPrinter.connect(config, opts);
}

// ─── Scoped use ──────────────────────────────────────────────────────────────

/**
 * Connect, run `fn`, then close the connection if `autoclose` is set
 * (the default), whether `fn` resolves or throws.
 *
 * @example
 * ```ts
 * import { withPrinter } from "net-escpos";
 *
 * await withPrinter({ host: "192.168.1.100", timeout: 5000 }, async (printer) => {
 *   await printer.set({ bold: true });
 *   await printer.textLine("Hello");
 *   await printer.cut("FULL");
 * });
 * ```
 */
export async function withPrinter<T>(
  config: PrinterConfig,
  fn: (printer: NetworkPrinter) => Promise<T>,
  opts?: ConnectOptions
): Promise<T> {
  const printer = await NetworkPrinter.connect(config, opts);
  try {
    return await fn(printer);
  } finally {
    if (printer.config.autoclose) {
      await printer.close();
    }
  }
}
