import { repairField } from "./repair";
import { FieldKind, RepairOptions, RepairReport, TestRecord, TestRecordPatch, UpdatedTest } from "./types";

export interface ReconcileEntry {
  record: TestRecord;
  lines?: readonly string[];
  lineIndex?: number;
}

export type FieldPatch = Omit<TestRecordPatch, "updated_at">;

export interface PlannedUpdate {
  id: number;
  patch: FieldPatch;
  change: UpdatedTest;
}

export interface ReconciliationPlan {
  report: RepairReport;
  updates: PlannedUpdate[];
}

const REPAIRABLE_FIELDS: FieldKind[] = ["result", "test_system", "equipment"];

/**
 * Plans repairs for a batch, in input order. Only `result`, `test_system` and
 * `equipment` are touched; a null column means the value was never captured and is
 * left alone.
 */
export function reconcile(entries: ReconcileEntry[], options: RepairOptions): ReconciliationPlan {
  const updates: PlannedUpdate[] = [];

  for (const entry of entries) {
    const { record } = entry;
    const patch: FieldPatch = {};
    for (const field of REPAIRABLE_FIELDS) {
      const current = record[field];
      if (current === null) continue;
      const repaired = repairField(current, entry.lines, entry.lineIndex, field, options);
      if (repaired.value !== current) {
        patch[field] = repaired.value;
      }
    }
    if (!Object.keys(patch).length) continue;

    updates.push({
      id: record.id,
      patch,
      change: {
        id: record.id,
        test_name: record.test_name,
        old_result: record.result,
        new_result: patch.result ?? record.result,
        old_test_system: record.test_system,
        new_test_system: patch.test_system ?? record.test_system,
        old_equipment: record.equipment,
        new_equipment: patch.equipment ?? record.equipment,
      },
    });
  }

  return {
    report: {
      cleaned_count: updates.length,
      updated_tests: updates.map((update) => update.change),
    },
    updates,
  };
}


/**
 * Ids of stored tests that repeat an earlier test of the same name and date.
 * Names compare case-insensitively, a missing date counts as a value, and the
 * lowest id of each group is the one kept.
 */
export function findDuplicateTests(records: TestRecord[]): number[] {
  const seen = new Set<string>();
  const duplicates: number[] = [];
  for (const record of [...records].sort((a, b) => a.id - b.id)) {
    const key = `${record.test_name.trim().toLowerCase()}|${record.test_date ?? ""}`;
    if (seen.has(key)) {
      duplicates.push(record.id);
    } else {
      seen.add(key);
    }
  }
  return duplicates;
}
