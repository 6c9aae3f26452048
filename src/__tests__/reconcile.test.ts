import { beforeAll, describe, expect, it } from "vitest";
import { findDuplicateTests, ReconcileEntry, reconcile } from "../reconcile";
import { RepairOptions, TestRecord, UNSPECIFIED } from "../types";
import { defaultOptions, makeTest } from "./fakes";

let options: RepairOptions;

beforeAll(async () => {
  options = await defaultOptions();
});

function sectionCorpus(): string[] {
  const lines = Array.from({ length: 30 }, (_, idx) => `Раздел ${idx}`);
  lines[20] = "Anti-HB core total: **";
  lines[21] = "Тест-система: ** Anti-HBc, Abbott";
  lines[22] = "Оборудование: ** Abbott, Alinity i";
  return lines;
}

function corruptedRecord(): TestRecord {
  return makeTest({
    id: 1,
    test_name: "Anti-HB core total",
    result: "**",
    reference_values: "** отрицательно",
    units: "**",
    test_system: "** Anti-HBc, Abbott",
    equipment: "** Abbott, Alinity i",
    notes: "* повтор",
  });
}

function applyPlan(entries: ReconcileEntry[], plan: ReturnType<typeof reconcile>): ReconcileEntry[] {
  return entries.map((entry) => {
    const update = plan.updates.find((candidate) => candidate.id === entry.record.id);
    return update ? { ...entry, record: { ...entry.record, ...update.patch } } : entry;
  });
}

describe("reconcile", () => {
  it("repairs a marker-corrupted record with no nearby result", () => {
    const plan = reconcile([{ record: corruptedRecord(), lines: sectionCorpus(), lineIndex: 20 }], options);

    expect(plan.report).toEqual({
      cleaned_count: 1,
      updated_tests: [
        {
          id: 1,
          test_name: "Anti-HB core total",
          old_result: "**",
          new_result: UNSPECIFIED,
          old_test_system: "** Anti-HBc, Abbott",
          new_test_system: "Anti-HBc, Abbott",
          old_equipment: "** Abbott, Alinity i",
          new_equipment: "Abbott, Alinity i",
        },
      ],
    });
  });

  it("only patches result, test system and equipment", () => {
    const plan = reconcile([{ record: corruptedRecord(), lines: sectionCorpus(), lineIndex: 20 }], options);
    expect(plan.updates).toHaveLength(1);
    expect(Object.keys(plan.updates[0].patch)).toEqual(["result", "test_system", "equipment"]);
  });

  it("reports nothing on a second run", () => {
    const entries: ReconcileEntry[] = [{ record: corruptedRecord(), lines: sectionCorpus(), lineIndex: 20 }];
    const first = reconcile(entries, options);
    const second = reconcile(applyPlan(entries, first), options);

    expect(first.report.cleaned_count).toBe(1);
    expect(second.report).toEqual({ cleaned_count: 0, updated_tests: [] });
    expect(second.updates).toEqual([]);
  });

  it("leaves clean records and null fields alone", () => {
    const clean = makeTest({
      id: 2,
      test_name: "Anti-HCV total",
      result: "ОТРИЦАТЕЛЬНО",
      test_system: "Anti-HCV, Abbott",
      equipment: null,
    });
    const partly = makeTest({ id: 3, test_name: "Anti-HEV IgG", result: " положительно ", equipment: null });

    const plan = reconcile([{ record: clean }, { record: partly }], options);

    expect(plan.report.cleaned_count).toBe(1);
    expect(plan.updates[0].patch).toEqual({ result: "положительно" });
    expect(plan.report.updated_tests[0]).toMatchObject({
      id: 3,
      new_result: "положительно",
      old_equipment: null,
      new_equipment: null,
    });
  });

  it("reports updates in input order", () => {
    const records = [5, 3, 4].map((id) => makeTest({ id, test_name: `Anti-HBs ${id}`, result: `** ${id}` }));
    const plan = reconcile(
      records.map((record) => ({ record })),
      options
    );
    expect(plan.report.updated_tests.map((test) => test.id)).toEqual([5, 3, 4]);
  });

  it("recovers a result from the stored document", () => {
    const record = makeTest({ id: 6, test_name: "Anti-HEV IgG", result: "**" });
    const lines = ["Anti-HEV IgG: **", "Результат: ОТРИЦАТЕЛЬНО"];
    const plan = reconcile([{ record, lines, lineIndex: 0 }], options);
    expect(plan.report.updated_tests[0].new_result).toBe("ОТРИЦАТЕЛЬНО");
  });
});

describe("findDuplicateTests", () => {
  it("keeps the lowest id per name and date", () => {
    const records = [
      makeTest({ id: 7, test_name: "Anti-HBs" }),
      makeTest({ id: 3, test_name: "ANTI-HBS" }),
      makeTest({ id: 5, test_name: "Anti-HBs", test_date: null }),
      makeTest({ id: 6, test_name: "Anti-HBs", test_date: null }),
      makeTest({ id: 8, test_name: "Anti-HCV" }),
    ];
    expect(findDuplicateTests(records)).toEqual([6, 7]);
  });

  it("finds nothing in distinct records", () => {
    expect(findDuplicateTests([makeTest({ id: 1, test_name: "Anti-HBs" })])).toEqual([]);
  });
});
