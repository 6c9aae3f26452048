import fs from "fs/promises";
import { DEFAULT_VOCABULARY_PATH } from "./config";
import { ResultKeyword, TestCategory, Vocabulary, VocabularyError } from "./types";

const vocabularyCache = new Map<string, Vocabulary>();

export async function loadVocabulary(filePath: string = DEFAULT_VOCABULARY_PATH): Promise<Vocabulary> {
  const cached = vocabularyCache.get(filePath);
  if (cached) return cached;

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    throw new VocabularyError(`Unable to read vocabulary from ${filePath}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    throw new VocabularyError(`Vocabulary at ${filePath} is not valid JSON: ${message}`);
  }

  const vocabulary = parseVocabulary(json);
  vocabularyCache.set(filePath, vocabulary);
  return vocabulary;
}

export function parseVocabulary(raw: unknown): Vocabulary {
  if (!isObject(raw)) throw new VocabularyError("Vocabulary must be a JSON object.");
  const labels = raw.fieldLabels;
  if (!isObject(labels)) throw new VocabularyError("fieldLabels must be an object.");

  return {
    resultKeywords: parseKeywords(raw.resultKeywords),
    fieldLabels: {
      result: parseTerms(labels.result, "fieldLabels.result"),
      testSystem: parseTerms(labels.testSystem, "fieldLabels.testSystem"),
      equipment: parseTerms(labels.equipment, "fieldLabels.equipment"),
      date: parseTerms(labels.date, "fieldLabels.date"),
      reference: parseTerms(labels.reference, "fieldLabels.reference"),
      units: parseTerms(labels.units, "fieldLabels.units"),
    },
    testNameHints: parseTerms(raw.testNameHints, "testNameHints"),
    testCategories: parseCategories(raw.testCategories),
  };
}

function parseCategories(value: unknown): TestCategory[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new VocabularyError("testCategories must be an array.");
  return value.map((entry, idx) => {
    if (!isObject(entry) || typeof entry.name !== "string" || !entry.name.trim()) {
      throw new VocabularyError(`testCategories[${idx}] needs a non-empty "name".`);
    }
    return { name: entry.name.trim(), terms: parseTerms(entry.terms, `testCategories[${idx}].terms`) };
  });
}

function parseKeywords(value: unknown): ResultKeyword[] {
  if (!Array.isArray(value)) throw new VocabularyError("resultKeywords must be an array.");
  return value.map((entry, idx) => {
    if (!isObject(entry) || typeof entry.keyword !== "string" || !entry.keyword.trim()) {
      throw new VocabularyError(`resultKeywords[${idx}] needs a non-empty "keyword".`);
    }
    return {
      keyword: entry.keyword.trim().toLowerCase(),
      locale: typeof entry.locale === "string" && entry.locale ? entry.locale : "und",
    };
  });
}

function parseTerms(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) throw new VocabularyError(`${field} must be an array of strings.`);
  const terms: string[] = [];
  for (const term of value) {
    if (typeof term !== "string" || !term.trim()) {
      throw new VocabularyError(`${field} must contain only non-empty strings.`);
    }
    terms.push(term.trim().toLowerCase());
  }
  return terms;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
