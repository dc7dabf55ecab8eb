import type { Alignment, UnderlineLevel } from "./types.js";

// ─── ESC/POS command tables ──────────────────────────────────────────────────
//
// Byte sequences from the Epson ESC/POS command reference. These are a fixed
// hardware contract: printers in the field match on them byte for byte.
//
//   ESC ! n     select print mode (size bits 4–5)
//   GS ! n      select character size (width high nibble, height low nibble)
//   ESC { n     upside-down printing
//   GS b n      smoothing
//   ESC E n     emphasized (bold)
//   ESC - n     underline 0/1/2 dots
//   ESC M n     character font
//   ESC a n     justification
//   GS | n      print density
//   GS B n      white/black reverse
//   GS V m      cut paper
//   DLE EOT n   real-time status transmission
// ─────────────────────────────────────────────────────────────────────────────

export const ESC = 0x1b;
export const GS = 0x1d;
export const DLE = 0x10;
export const EOT = 0x04;
export const LF = 0x0a;

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

// ── Text size ────────────────────────────────────────────────────────────────

export const TXT_NORMAL = bytes(ESC, 0x21, 0x00);
export const TXT_2HEIGHT = bytes(ESC, 0x21, 0x10);
export const TXT_2WIDTH = bytes(ESC, 0x21, 0x20);
export const TXT_4SQUARE = bytes(ESC, 0x21, 0x30);

/** Prefix of the custom size command; followed by one size byte. */
export const TXT_SIZE = bytes(GS, 0x21);

export type SizeMode = "normal" | "2h" | "2w" | "2x";

export const TXT_SIZE_MODE: Readonly<Record<SizeMode, Uint8Array>> = {
  normal: TXT_NORMAL,
  "2h": TXT_2HEIGHT,
  "2w": TXT_2WIDTH,
  "2x": TXT_4SQUARE,
};

/** Width multiplier 1–8 → high nibble of the size byte (index 0 unused). */
export const SIZE_WIDTH = [0, 0x00, 0x10, 0x20, 0x30, 0x40, 0x50, 0x60, 0x70] as const;

/** Height multiplier 1–8 → low nibble of the size byte (index 0 unused). */
export const SIZE_HEIGHT = [0, 0x00, 0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07] as const;

// ── Style toggles ────────────────────────────────────────────────────────────

export const TXT_FLIP_OFF = bytes(ESC, 0x7b, 0x00);
export const TXT_FLIP_ON = bytes(ESC, 0x7b, 0x01);

export const TXT_SMOOTH_OFF = bytes(GS, 0x62, 0x00);
export const TXT_SMOOTH_ON = bytes(GS, 0x62, 0x01);

export const TXT_BOLD_OFF = bytes(ESC, 0x45, 0x00);
export const TXT_BOLD_ON = bytes(ESC, 0x45, 0x01);

export const TXT_INVERT_OFF = bytes(GS, 0x42, 0x00);
export const TXT_INVERT_ON = bytes(GS, 0x42, 0x01);

export const TXT_UNDERLINE: Readonly<Record<UnderlineLevel, Uint8Array>> = {
  0: bytes(ESC, 0x2d, 0x00),
  1: bytes(ESC, 0x2d, 0x01),
  2: bytes(ESC, 0x2d, 0x02),
};

export const TXT_ALIGN: Readonly<Record<Alignment, Uint8Array>> = {
  left: bytes(ESC, 0x61, 0x00),
  center: bytes(ESC, 0x61, 0x01),
  right: bytes(ESC, 0x61, 0x02),
};

/** ESC M n */
export function setFont(index: number): Uint8Array {
  return bytes(ESC, 0x4d, index);
}

/** GS | n — levels 0..8 map to -50%, -37.5%, -25%, -12.5%, 0, +12.5%, +25%, +37.5%, +50%. */
export const DENSITY_LEVELS = 9;

export function setDensity(level: number): Uint8Array {
  return bytes(GS, 0x7c, level);
}

// ── Paper ────────────────────────────────────────────────────────────────────

export const PAPER_FULL_CUT = bytes(GS, 0x56, 0x00);
export const PAPER_PART_CUT = bytes(GS, 0x56, 0x01);

/** Blank lines fed before every cut so the last printed line clears the blade. */
export const CUT_FEED_LINES = 6;

// ── Real-time status ─────────────────────────────────────────────────────────

export const RT_STATUS_ONLINE = bytes(DLE, EOT, 0x01);
export const RT_STATUS_PAPER = bytes(DLE, EOT, 0x04);

/** Set when the printer is offline. */
export const RT_MASK_ONLINE = 8;
export const RT_MASK_PAPER = 18;
export const RT_MASK_LOWPAPER = 30;
export const RT_MASK_NOPAPER = 114;

/** Maximum number of bytes read back for one status query. */
export const RT_RESPONSE_MAX = 16;
