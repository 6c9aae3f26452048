import { dedupeTests, extractTestsFromText } from "./extractor";
import { TestRecordStore } from "./store";
import { ExtractedTest, ExtractionSummary, NewTestRecord, RepairOptions } from "./types";

export type FallbackExtractor = (text: string, sourceRecordId: number | null) => Promise<ExtractedTest[]>;

export interface PipelineDeps {
  store: TestRecordStore;
  options: RepairOptions;
  /** Used for records where line parsing finds no tests, e.g. the LLM extractor. */
  fallback?: FallbackExtractor;
}

export async function extractAndStructure(userId: string, deps: PipelineDeps): Promise<ExtractionSummary> {
  const { store, options, fallback } = deps;
  const medicalRecords = await store.listMedicalRecords(userId);
  if (!medicalRecords.length) {
    console.log(`  -> No medical records to process for ${userId}.`);
    return { tests_count: 0, saved_count: 0 };
  }
  console.log(`  -> ${medicalRecords.length} medical records found.`);

  const extracted: ExtractedTest[] = [];
  for (const record of medicalRecords) {
    let tests = extractTestsFromText(record.content, record.id, options);
    if (!tests.length && fallback) {
      try {
        tests = await fallback(record.content, record.id);
      } catch (err) {
        const message = err instanceof Error ? err.message : "Unknown error";
        console.warn(`  -> Fallback extraction failed for record ${record.id}: ${message}`);
      }
    }
    extracted.push(...tests);
  }

  const rows: NewTestRecord[] = dedupeTests(extracted).map((test) => ({ ...test, user_id: userId }));
  const saved = await store.upsertTests(rows);
  console.log(`  -> ${rows.length} tests extracted, ${saved} saved.`);
  return { tests_count: rows.length, saved_count: saved };
}
