import iconv from "iconv-lite";
import {
  CUT_FEED_LINES,
  DENSITY_LEVELS,
  LF,
  PAPER_FULL_CUT,
  PAPER_PART_CUT,
  SIZE_HEIGHT,
  SIZE_WIDTH,
  TXT_ALIGN,
  TXT_BOLD_OFF,
  TXT_BOLD_ON,
  TXT_FLIP_OFF,
  TXT_FLIP_ON,
  TXT_INVERT_OFF,
  TXT_INVERT_ON,
  TXT_NORMAL,
  TXT_SIZE,
  TXT_SIZE_MODE,
  TXT_SMOOTH_OFF,
  TXT_SMOOTH_ON,
  TXT_UNDERLINE,
  setDensity,
  setFont,
  type SizeMode,
} from "./commands.js";
import type { Alignment, FontSelector, StyleOptions, UnderlineLevel } from "./types.js";
import { EncodingError, InvalidArgumentError } from "./types.js";

// ─── Option parsing ──────────────────────────────────────────────────────────
//
// Loose inputs are normalised into tagged values before any bytes are built.
// Unknown cut modes, out-of-range custom sizes and out-of-range densities fall
// back to a default instead of throwing; unknown alignments and underline
// levels are rejected.
// ─────────────────────────────────────────────────────────────────────────────

export type CustomSize =
  | { kind: "custom"; width: number; height: number }
  | { kind: "skip" };

export type Density = { kind: "set"; level: number } | { kind: "unchanged" };

export type CutMode = "full" | "partial";

const isMultiplier = (n: number): boolean => Number.isInteger(n) && n >= 1 && n <= 8;

/** Both multipliers must be integers in 1–8, otherwise no size command is sent. */
export function parseCustomSize(width: number, height: number): CustomSize {
  if (isMultiplier(width) && isMultiplier(height)) {
    return { kind: "custom", width, height };
  }
  return { kind: "skip" };
}

/** 0–8 selects a level; 9 (the default) and anything else leave density alone. */
export function parseDensity(value: number): Density {
  if (Number.isInteger(value) && value >= 0 && value < DENSITY_LEVELS) {
    return { kind: "set", level: value };
  }
  return { kind: "unchanged" };
}

/** `"PART"` in any case is a partial cut; every other string is a full cut. */
export function parseCutMode(mode: string): CutMode {
  return mode.toUpperCase() === "PART" ? "partial" : "full";
}

/** Font 1 when omitted; `"a"` and `"b"` are fonts 0 and 1. */
export function parseFont(font: FontSelector | undefined): number {
  if (font === undefined) return 1;
  if (font === "a") return 0;
  if (font === "b") return 1;
  if (typeof font === "number" && Number.isInteger(font) && font >= 0 && font <= 0xff) {
    return font;
  }
  throw new InvalidArgumentError(`Invalid font: ${String(font)} (expected "a", "b" or 0–255)`);
}

const ALIGNMENTS: readonly Alignment[] = ["left", "center", "right"];
const UNDERLINE_LEVELS: readonly UnderlineLevel[] = [0, 1, 2];

function parseAlignment(align: string): Alignment {
  const alignment = ALIGNMENTS.find((a) => a === align);
  if (alignment === undefined) {
    throw new InvalidArgumentError(
      `Invalid align: ${JSON.stringify(align)} (expected left, center or right)`
    );
  }
  return alignment;
}

function parseUnderline(level: number): UnderlineLevel {
  const underline = UNDERLINE_LEVELS.find((u) => u === level);
  if (underline === undefined) {
    throw new InvalidArgumentError(`Invalid underline: ${level} (expected 0, 1 or 2)`);
  }
  return underline;
}

/** Precedence: both doubles > double width > double height > normal. */
export function sizeMode(doubleWidth: boolean, doubleHeight: boolean): SizeMode {
  if (doubleWidth && doubleHeight) return "2x";
  if (doubleWidth) return "2w";
  if (doubleHeight) return "2h";
  return "normal";
}

/** The GS ! argument: width in the high nibble, height in the low nibble. */
export function sizeByte(width: number, height: number): number {
  const w = SIZE_WIDTH[width];
  const h = SIZE_HEIGHT[height];
  if (w === undefined || h === undefined || width < 1 || height < 1) {
    throw new InvalidArgumentError(`Size multipliers out of range: ${width}x${height}`);
  }
  return w | h;
}

// ─── Encoders ────────────────────────────────────────────────────────────────

/**
 * Build the complete style sequence for one `set()` call.
 *
 * Order on the wire: size, flip, smoothing, bold, underline, font,
 * alignment, density (when set), invert.
 */
export function encodeStyle(options: StyleOptions = {}): Uint8Array {
  const {
    align = "left",
    font,
    bold = false,
    underline = 0,
    width = 1,
    height = 1,
    density = 9,
    invert = false,
    smooth = false,
    flip = false,
    doubleWidth = false,
    doubleHeight = false,
    customSize = false,
  } = options;

  const alignment = parseAlignment(align);
  const underlineLevel = parseUnderline(underline);
  const fontIndex = parseFont(font);
  const densityLevel = parseDensity(density);

  const parts: Uint8Array[] = [];

  if (customSize) {
    const size = parseCustomSize(width, height);
    if (size.kind === "custom") {
      parts.push(TXT_SIZE, Uint8Array.of(sizeByte(size.width, size.height)));
    }
  } else {
    parts.push(TXT_NORMAL, TXT_SIZE_MODE[sizeMode(doubleWidth, doubleHeight)]);
  }

  parts.push(
    flip ? TXT_FLIP_ON : TXT_FLIP_OFF,
    smooth ? TXT_SMOOTH_ON : TXT_SMOOTH_OFF,
    bold ? TXT_BOLD_ON : TXT_BOLD_OFF,
    TXT_UNDERLINE[underlineLevel],
    setFont(fontIndex),
    TXT_ALIGN[alignment]
  );

  if (densityLevel.kind === "set") {
    parts.push(setDensity(densityLevel.level));
  }

  parts.push(invert ? TXT_INVERT_ON : TXT_INVERT_OFF);

  return Buffer.concat(parts);
}

/** `count` line feeds. */
export function encodeNewlines(count: number): Uint8Array {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError(`Invalid newline count: ${count} (must be a non-negative integer)`);
  }
  return new Uint8Array(count).fill(LF);
}

/** Six line feeds followed by a full or partial cut. */
export function encodeCut(mode: string): Uint8Array {
  const cut = parseCutMode(mode) === "partial" ? PAPER_PART_CUT : PAPER_FULL_CUT;
  return Buffer.concat([encodeNewlines(CUT_FEED_LINES), cut]);
}

/** Whether iconv-lite knows the code page name. */
export function isKnownCodepage(codepage: string): boolean {
  return iconv.encodingExists(codepage);
}

/**
 * Encode `value` into `codepage`.
 *
 * iconv-lite substitutes unmappable characters instead of failing, so the
 * result is decoded again and compared with the input.
 */
export function encodeText(value: string, codepage: string): Uint8Array {
  const encoded = iconv.encode(value, codepage);
  if (iconv.decode(encoded, codepage) === value) {
    return encoded;
  }
  for (const ch of value) {
    if (iconv.decode(iconv.encode(ch, codepage), codepage) !== ch) {
      const codePoint = ch.codePointAt(0) ?? 0;
      throw new EncodingError(
        `Character ${JSON.stringify(ch)} (U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}) cannot be encoded in ${codepage}`
      );
    }
  }
  throw new EncodingError(`Text cannot be encoded in ${codepage}`);
}
