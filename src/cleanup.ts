import { locateRecordLine, splitLines } from "./corpus";
import { findDuplicateTests, ReconcileEntry, reconcile } from "./reconcile";
import { TestRecordStore } from "./store";
import { RepairOptions, RepairReport, TestRecord, UpdatedTest } from "./types";

export interface CleanupDeps {
  store: TestRecordStore;
  options: RepairOptions;
  now?: () => Date;
}

export interface CleanupResult extends RepairReport {
  failed_ids: number[];
  /** Duplicate tests deleted before repair. */
  removed_ids: number[];
}

/**
 * Removes duplicate tests, then repairs the rest in place. Each update is written on
 * its own; a failed write is logged and left out of `updated_tests` while the rest go on.
 */
export async function cleanupTestResults(userId: string, deps: CleanupDeps): Promise<CleanupResult> {
  const { store, options } = deps;
  const now = deps.now ?? (() => new Date());

  const records = await store.listTests(userId);
  console.log(`  -> ${records.length} stored tests loaded for ${userId}.`);
  if (!records.length) {
    return { cleaned_count: 0, updated_tests: [], failed_ids: [], removed_ids: [] };
  }

  const removed = await removeDuplicates(store, records);
  const remaining = records.filter((record) => !removed.includes(record.id));

  const corpora = await loadCorpora(store, userId);
  const plan = reconcile(
    remaining.map((record) => buildEntry(record, corpora)),
    options
  );

  const updated: UpdatedTest[] = [];
  const failed: number[] = [];
  for (const update of plan.updates) {
    try {
      await store.updateTest(update.id, { ...update.patch, updated_at: now().toISOString() });
      updated.push(update.change);
      console.log(`  -> Repaired test ${update.id} (${update.change.test_name}).`);
    } catch (err) {
      failed.push(update.id);
      const message = err instanceof Error ? err.message : "Unknown error";
      console.warn(`  -> Could not update test ${update.id}: ${message}`);
    }
  }

  return { cleaned_count: updated.length, updated_tests: updated, failed_ids: failed, removed_ids: removed };
}

async function removeDuplicates(store: TestRecordStore, records: TestRecord[]): Promise<number[]> {
  const duplicates = findDuplicateTests(records);
  if (!duplicates.length) return [];
  try {
    await store.deleteTests(duplicates);
    console.log(`  -> ${duplicates.length} duplicate tests removed.`);
    return duplicates;
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    console.warn(`  -> Could not remove duplicate tests ${duplicates.join(", ")}: ${message}`);
    return [];
  }
}

async function loadCorpora(store: TestRecordStore, userId: string): Promise<Map<number, string[]>> {
  const medicalRecords = await store.listMedicalRecords(userId);
  return new Map(medicalRecords.map((record) => [record.id, splitLines(record.content)]));
}

function buildEntry(record: TestRecord, corpora: Map<number, string[]>): ReconcileEntry {
  const lines = record.source_record_id !== null ? corpora.get(record.source_record_id) : undefined;
  if (!lines) return { record };
  const lineIndex = locateRecordLine(lines, record.test_name);
  return lineIndex === -1 ? { record } : { record, lines, lineIndex };
}
