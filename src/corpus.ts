export interface LabeledLine {
  rawLabel: string;
  label: string;
  value: string;
}

const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** Splits `"**8. Anti-HEV IgG:** ОТРИЦАТЕЛЬНО"` into its label and raw value at the first colon. */
export function splitLabelValue(line: string): LabeledLine | undefined {
  const idx = line.indexOf(":");
  if (idx === -1) return undefined;
  const rawLabel = stripLabelNoise(line.slice(0, idx));
  return {
    rawLabel,
    label: rawLabel.toLowerCase(),
    value: line.slice(idx + 1),
  };
}

export function stripLabelNoise(label: string): string {
  return label
    .replace(/\*+/g, "")
    .replace(/^\s*(?:[-•|#>]+\s*)*/, "")
    .replace(/^\d+[.)]\s*/, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Case-insensitive search for `term` that only accepts a hit at the start of a word,
 * so "low" matches "lower" but not "below". Stems such as "отрицательн" match whole words.
 */
export function containsTerm(text: string, term: string): boolean {
  const haystack = text.toLowerCase();
  const needle = term.toLowerCase();
  if (!needle) return false;
  let from = 0;
  while (from <= haystack.length - needle.length) {
    const hit = haystack.indexOf(needle, from);
    if (hit === -1) return false;
    if (hit === 0 || !LETTER_OR_DIGIT.test(haystack.charAt(hit - 1))) return true;
    from = hit + 1;
  }
  return false;
}

export function containsAnyTerm(text: string, terms: string[]): boolean {
  return terms.some((term) => containsTerm(text, term));
}

/** Index of the line a stored test was read from, or -1. */
export function locateRecordLine(lines: string[], testName: string): number {
  const needle = stripLabelNoise(testName).toLowerCase();
  if (!needle) return -1;

  const exact = lines.findIndex((line) => splitLabelValue(line)?.label === needle);
  if (exact !== -1) return exact;
  return lines.findIndex((line) => line.toLowerCase().includes(needle));
}

export function isValidLineIndex(lines: readonly string[] | undefined, lineIndex: number | undefined): boolean {
  if (!lines || lineIndex === undefined) return false;
  return Number.isInteger(lineIndex) && lineIndex >= 0 && lineIndex < lines.length;
}
