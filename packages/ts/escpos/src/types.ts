// ─── Printer connection configuration ────────────────────────────────────────

/** Configuration for connecting to an ESC/POS printer over TCP/IP. */
export interface PrinterConfig {
  /** Printer IP address or hostname. */
  host: string;

  /** TCP port (default: 9100 — the standard raw printing port). */
  port?: number;

  /** Socket timeout in milliseconds for connect and reads (default: 30000). */
  timeout?: number;

  /** Close the connection when the scope of {@link withPrinter} ends (default: true). */
  autoclose?: boolean;

  /** Code page used to encode text, as named by iconv-lite (default: "cp866"). */
  codepage?: string;

  /** Delay in milliseconds between a status query and reading its response (default: 1000). */
  statusDelay?: number;
}

/** Connection parameters after defaults have been applied. */
export interface ResolvedPrinterConfig {
  readonly host: string;
  readonly port: number;
  readonly timeout: number;
  readonly autoclose: boolean;
  readonly codepage: string;
  readonly statusDelay: number;
}

// ─── Text style ──────────────────────────────────────────────────────────────

export type Alignment = "left" | "center" | "right";

/** Underline level: off, single dot, double dot. */
export type UnderlineLevel = 0 | 1 | 2;

/**
 * Font selector. `"a"` and `"b"` refer to fonts 0 and 1; a number is sent as
 * the font index.
 */
export type FontSelector = "a" | "b" | number;

/**
 * Text properties sent by `set()`. Every call re-sends the complete style,
 * so omitted fields fall back to their defaults rather than keeping the
 * previous value.
 */
export interface StyleOptions {
  /** Horizontal alignment (default: "left"). */
  align?: Alignment;
  /** Font to select. When omitted, font 1 is selected. */
  font?: FontSelector;
  bold?: boolean;
  /** Default: 0. */
  underline?: UnderlineLevel;
  /** Width multiplier 1–8, used only with `customSize` (default: 1). */
  width?: number;
  /** Height multiplier 1–8, used only with `customSize` (default: 1). */
  height?: number;
  /**
   * Print density 0–8 (-50% … +50%). Any other value, including the
   * default 9, leaves the printer's density unchanged.
   */
  density?: number;
  /** White on black printing. */
  invert?: boolean;
  /** Text smoothing; only visible at 4x4 and larger. */
  smooth?: boolean;
  /** Upside-down printing. */
  flip?: boolean;
  doubleWidth?: boolean;
  doubleHeight?: boolean;
  /**
   * Use `width` and `height` instead of the double-width/height toggles.
   * Out-of-range or fractional multipliers skip the size command.
   */
  customSize?: boolean;
}

// ─── Status ──────────────────────────────────────────────────────────────────

/** 0: no paper. 1: paper near end. 2: paper adequate. */
export type PaperStatus = 0 | 1 | 2;

export const PAPER_EMPTY = 0 satisfies PaperStatus;
export const PAPER_LOW = 1 satisfies PaperStatus;
export const PAPER_ADEQUATE = 2 satisfies PaperStatus;

// ─── Error classification ────────────────────────────────────────────────────

/** Well-known error codes surfaced by the printer client. */
export type PrinterErrorCode =
  | "CONNECTION_REFUSED"
  | "TIMEOUT"
  | "HOST_NOT_FOUND"
  | "BROKEN_PIPE"
  | "CONNECTION_RESET"
  | "NOT_CONNECTED"
  | "ENCODING_FAILED"
  | "INVALID_ARGUMENT"
  | "UNKNOWN";

/** An error thrown by the printer client with a classified code. */
export class PrinterError extends Error {
  public readonly code: PrinterErrorCode;

  constructor(message: string, code: PrinterErrorCode, cause?: unknown) {
    super(message);
    this.name = "PrinterError";
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** The socket could not be opened, or a write on it failed. */
export class ConnectionError extends PrinterError {
  constructor(message: string, code: PrinterErrorCode = "UNKNOWN", cause?: unknown) {
    super(message, code, cause);
    this.name = "ConnectionError";
  }
}

/** Text contains characters the configured code page cannot represent. */
export class EncodingError extends PrinterError {
  constructor(message: string, cause?: unknown) {
    super(message, "ENCODING_FAILED", cause);
    this.name = "EncodingError";
  }
}

export class InvalidArgumentError extends PrinterError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}
