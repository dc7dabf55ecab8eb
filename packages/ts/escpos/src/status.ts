import {
  RT_MASK_LOWPAPER,
  RT_MASK_NOPAPER,
  RT_MASK_ONLINE,
  RT_MASK_PAPER,
} from "./commands.js";
import type { PaperStatus } from "./types.js";
import { PAPER_ADEQUATE, PAPER_EMPTY, PAPER_LOW } from "./types.js";

// ─── DLE EOT response decoding ───────────────────────────────────────────────
//
// A real-time status query is answered with one status byte per request.
// Printers that do not implement DLE EOT stay silent, so an empty response
// is a normal outcome and each decoder picks a default for it.
// ─────────────────────────────────────────────────────────────────────────────

const matches = (byte: number, mask: number): boolean => (byte & mask) === mask;

/**
 * Decode a `DLE EOT 1` (printer status) response.
 *
 * Bit 3 set means offline. No response at all is treated as offline.
 */
export function decodeOnline(response: Uint8Array): boolean {
  const first = response[0];
  if (first === undefined) return false;
  return (first & RT_MASK_ONLINE) === 0;
}

/**
 * Decode a `DLE EOT 4` (roll paper sensor) response.
 *
 * Masks are tested from most to least severe. No response, or a byte that
 * matches none of the masks, reports adequate paper.
 */
export function decodePaperStatus(response: Uint8Array): PaperStatus {
  const first = response[0];
  if (first === undefined) return PAPER_ADEQUATE;
  if (matches(first, RT_MASK_NOPAPER)) return PAPER_EMPTY;
  if (matches(first, RT_MASK_LOWPAPER)) return PAPER_LOW;
  if (matches(first, RT_MASK_PAPER)) return PAPER_ADEQUATE;
  return PAPER_ADEQUATE;
}
