import { extractFromContext } from "./context";
import { containsAnyTerm, splitLabelValue, splitLines } from "./corpus";
import { repairField } from "./repair";
import { ExtractedTest, RepairOptions, Vocabulary } from "./types";

const UNIT_REGEX =
  /(\d+(?:[.,]\d+)?)\s*(мМЕ\/мл|МЕ\/мл|мЕд\/л|Ед\/л|мкмоль\/л|ммоль\/л|нмоль\/л|пмоль\/л|мкг\/л|нг\/мл|пг\/мл|мг\/л|г\/л|мм\/ч|10\^9\/л|10\^12\/л|IU\/mL|mIU\/mL|U\/L|ng\/mL|pg\/mL|mg\/dL|g\/dL|g\/L|mmol\/L|%)/i;
const REFERENCE_REGEXES = [
  /(?:норма|референс\w*|reference|ref\.)[:\s]*([^,;)\n]+)/i,
  /\(\s*(\d+(?:[.,]\d+)?\s*[-–]\s*\d+(?:[.,]\d+)?)\s*\)/,
];
const DATE_REGEX = /(\d{1,4})[./-](\d{1,2})[./-](\d{2,4})/;
const BIRTH_DATE_REGEX = /рожд|birth/i;

/**
 * Reads `name: value` test lines out of an OCR transcript. Results go through
 * {@link repairField}; test system and equipment come from the neighbouring lines.
 */
export function extractTestsFromText(
  text: string,
  sourceRecordId: number | null,
  options: RepairOptions
): ExtractedTest[] {
  const lines = splitLines(text);
  const testDate = extractAnalysisDate(lines, options.vocabulary);
  const tests: ExtractedTest[] = [];

  lines.forEach((line, idx) => {
    if (!isTestLine(line, options.vocabulary)) return;
    const parts = splitLabelValue(line);
    if (!parts || !parts.rawLabel) return;

    const result = repairField(stripResultNoise(parts.value), lines, idx, "result", options);
    tests.push({
      test_name: parts.rawLabel,
      result: result.value,
      reference_values: extractReferenceValues(parts.value) ?? null,
      units: extractUnits(parts.value) ?? null,
      test_date: testDate ?? null,
      test_system: extractFromContext(lines, idx, "test_system", options) ?? null,
      equipment: extractFromContext(lines, idx, "equipment", options) ?? null,
      notes: null,
      source_record_id: sourceRecordId,
    });
  });

  return dedupeTests(tests);
}

export function isTestLine(line: string, vocabulary: Vocabulary): boolean {
  const parts = splitLabelValue(line);
  if (!parts) return false;
  const labels = vocabulary.fieldLabels;
  const fieldLabels = [
    ...labels.result,
    ...labels.testSystem,
    ...labels.equipment,
    ...labels.date,
    ...labels.reference,
    ...labels.units,
  ];
  if (containsAnyTerm(parts.label, fieldLabels)) return false;
  return containsAnyTerm(parts.label, vocabulary.testNameHints);
}

export function extractUnits(value: string): string | undefined {
  const match = value.match(UNIT_REGEX);
  return match ? match[2] : undefined;
}

export function extractReferenceValues(value: string): string | undefined {
  for (const regex of REFERENCE_REGEXES) {
    const match = value.match(regex);
    if (match) {
      const reference = match[1].replace(/\*+/g, "").trim();
      if (reference) return reference;
    }
  }
  return undefined;
}

function stripResultNoise(value: string): string {
  let cleaned = value;
  for (const regex of REFERENCE_REGEXES) {
    cleaned = cleaned.replace(regex, "");
  }
  return cleaned
    .replace(UNIT_REGEX, "$1")
    .replace(/\(\s*\)/g, "")
    .replace(/\s+/g, " ")
    .replace(/[\s,;]+$/, "")
    .trim();
}

export function extractAnalysisDate(lines: string[], vocabulary: Vocabulary): string | undefined {
  for (const line of lines) {
    const parts = splitLabelValue(line);
    if (!parts || BIRTH_DATE_REGEX.test(parts.label)) continue;
    if (!containsAnyTerm(parts.label, vocabulary.fieldLabels.date)) continue;
    const normalized = normalizeDate(parts.value);
    if (normalized) return normalized;
  }
  return undefined;
}

/** `DD.MM.YYYY`, `DD/MM/YYYY`, `DD-MM-YY` and `YYYY-MM-DD` to ISO `YYYY-MM-DD`. */
export function normalizeDate(value: string): string | undefined {
  const match = value.match(DATE_REGEX);
  if (!match) return undefined;
  const [, first, month, last] = match;

  let year: string;
  let day: string;
  if (first.length === 4) {
    year = first;
    day = last;
  } else {
    year = last.length === 2 ? `20${last}` : last;
    day = first;
  }
  if (year.length !== 4 || day.length > 2) return undefined;

  const monthNum = parseInt(month, 10);
  const dayNum = parseInt(day, 10);
  if (monthNum < 1 || monthNum > 12 || dayNum < 1 || dayNum > 31) return undefined;
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

export function dedupeTests(tests: ExtractedTest[]): ExtractedTest[] {
  const seen = new Set<string>();
  const result: ExtractedTest[] = [];
  for (const test of tests) {
    const key = `${test.test_name.toLowerCase()}|${test.test_date ?? ""}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(test);
  }
  return result;
}
