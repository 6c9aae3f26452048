import { cleanValue, hasMarker } from "./cleaner";
import { extractFromContext, searchByKeywords } from "./context";
import { CleanedValue, FieldKind, RepairOptions, UNSPECIFIED } from "./types";

/**
 * Resolves one field: direct clean, then (for marker-corrupted values only) the
 * surrounding lines, then for results the keyword search. The first stage that
 * yields a real value wins.
 */
export function repairField(
  raw: string | null | undefined,
  lines: readonly string[] | undefined,
  lineIndex: number | undefined,
  kind: FieldKind,
  options: RepairOptions
): CleanedValue {
  const direct = cleanValue(raw);
  if (direct !== UNSPECIFIED) {
    return { value: direct, isUnspecified: false, method: "direct_clean" };
  }

  if (hasMarker(raw)) {
    const found = cleanValue(extractFromContext(lines, lineIndex, kind, options));
    if (found !== UNSPECIFIED) {
      return { value: found, isUnspecified: false, method: "context_extract" };
    }
  }

  if (kind === "result") {
    const found = searchByKeywords(lines, lineIndex, options);
    if (found) {
      return { value: found, isUnspecified: false, method: "keyword_search" };
    }
  }

  return { value: UNSPECIFIED, isUnspecified: true, method: "direct_clean" };
}
