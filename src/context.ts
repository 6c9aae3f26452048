import { cleanValue } from "./cleaner";
import { DEFAULT_CONTEXT_RADIUS, DEFAULT_KEYWORD_RADIUS } from "./config";
import { containsAnyTerm, containsTerm, isValidLineIndex, splitLabelValue } from "./corpus";
import { FieldKind, RepairOptions, UNSPECIFIED, Vocabulary } from "./types";

// A leading number that is not the start of a date like 12.03.2024.
const LAB_NUMBER_REGEX = /^[<>≤≥]?\s*\d+(?:[.,]\d+)?(?!\d|[./]\d)/;

/**
 * Looks for the value of `kind` on the lines around `lineIndex`, nearest line first.
 * At equal distance the following line wins.
 */
export function extractFromContext(
  lines: readonly string[] | undefined,
  lineIndex: number | undefined,
  kind: FieldKind,
  options: RepairOptions
): string | undefined {
  if (!lines || lineIndex === undefined || !isValidLineIndex(lines, lineIndex)) return undefined;
  const radius = options.contextRadius ?? DEFAULT_CONTEXT_RADIUS;

  for (const offset of outwardOffsets(radius)) {
    const idx = lineIndex + offset;
    if (idx < 0 || idx >= lines.length) continue;
    const candidate = candidateFor(lines[idx], kind, options.vocabulary);
    if (candidate) return candidate;
  }
  return undefined;
}

/**
 * Last-resort result lookup: the first line in corpus order within `keywordRadius`
 * whose value carries a clinical-result keyword.
 */
export function searchByKeywords(
  lines: readonly string[] | undefined,
  lineIndex: number | undefined,
  options: RepairOptions
): string | undefined {
  if (!lines || lineIndex === undefined || !isValidLineIndex(lines, lineIndex)) return undefined;
  const radius = options.keywordRadius ?? DEFAULT_KEYWORD_RADIUS;
  const keywords = options.vocabulary.resultKeywords.map((entry) => entry.keyword);
  const { reference, units } = options.vocabulary.fieldLabels;
  const start = Math.max(0, lineIndex - radius);
  const end = Math.min(lines.length - 1, lineIndex + radius);

  for (let i = start; i <= end; i++) {
    const parts = splitLabelValue(lines[i]);
    // Reference ranges quote result words ("норма: отрицательно") without being results.
    if (parts && containsAnyTerm(parts.label, [...reference, ...units])) continue;
    const value = parts ? parts.value : lines[i];
    if (!containsAnyTerm(value, keywords)) continue;
    const cleaned = cleanValue(value);
    if (cleaned !== UNSPECIFIED) return cleaned;
  }
  return undefined;
}

export function outwardOffsets(radius: number): number[] {
  const offsets = [0];
  for (let step = 1; step <= radius; step++) {
    offsets.push(step, -step);
  }
  return offsets;
}

export function looksLikeLabValue(value: string, vocabulary: Vocabulary): boolean {
  if (LAB_NUMBER_REGEX.test(value)) return true;
  return vocabulary.resultKeywords.some((entry) => containsTerm(value, entry.keyword));
}

function candidateFor(line: string, kind: FieldKind, vocabulary: Vocabulary): string | undefined {
  const parts = splitLabelValue(line);
  if (!parts) return undefined;
  const value = cleanValue(parts.value);
  if (value === UNSPECIFIED) return undefined;

  const labels = vocabulary.fieldLabels;
  switch (kind) {
    case "test_system":
      return containsAnyTerm(parts.label, labels.testSystem) ? value : undefined;
    case "equipment":
      return containsAnyTerm(parts.label, labels.equipment) ? value : undefined;
    case "result": {
      if (containsAnyTerm(parts.label, labels.result)) return value;
      const foreign = [
        ...labels.testSystem,
        ...labels.equipment,
        ...labels.date,
        ...labels.reference,
        ...labels.units,
        ...vocabulary.testNameHints,
      ];
      if (containsAnyTerm(parts.label, foreign)) return undefined;
      return looksLikeLabValue(value, vocabulary) ? value : undefined;
    }
  }
}
