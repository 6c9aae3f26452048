import { UNSPECIFIED } from "./types";

const MARKER_RUN_REGEX = /\s*\*+\s*/g;
const ALNUM_REGEX = /[\p{L}\p{N}]/u;

// Lowercased spellings that upstream writes instead of leaving a field empty.
const SENTINEL_ALIASES = new Set(["не указан", "не указано", "not specified", "null", "none", "n/a"]);

export function hasMarker(raw: string | null | undefined): boolean {
  return typeof raw === "string" && raw.includes("*");
}

/**
 * Normalizes a raw field to its usable content or {@link UNSPECIFIED}.
 * Marker runs are dropped together with the whitespace around them; a lone `*`
 * between two digits (`4.5*10^9`) is a multiplication sign and stays.
 */
export function cleanValue(raw: string | null | undefined): string {
  if (typeof raw !== "string") return UNSPECIFIED;
  const stripped = raw
    .replace(MARKER_RUN_REGEX, (match: string, offset: number, whole: string) =>
      isMultiplication(match, offset, whole) ? match : " "
    )
    .trim();
  if (!ALNUM_REGEX.test(stripped)) return UNSPECIFIED;
  if (SENTINEL_ALIASES.has(stripped.toLowerCase())) return UNSPECIFIED;
  return stripped;
}

function isMultiplication(match: string, offset: number, whole: string): boolean {
  if (match !== "*") return false;
  return /\d/.test(whole.charAt(offset - 1)) && /\d/.test(whole.charAt(offset + 1));
}
