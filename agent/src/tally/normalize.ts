/**
 * Message Normalizer
 *
 * Canonical form used as the equality key for per-sender dedup and the
 * global tally. Pure, no shared state.
 */

// Unicode "Other": control, format, surrogate, private use, unassigned
const OTHER_CATEGORY = /\p{C}+/gu;

export function normalize(raw: string): string {
  return raw.replace(OTHER_CATEGORY, "").toLowerCase().trim();
}
