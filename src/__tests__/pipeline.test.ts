import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { extractAndStructure } from "../pipeline";
import { ExtractedTest, RepairOptions } from "../types";
import { defaultOptions, InMemoryTestStore } from "./fakes";

let options: RepairOptions;

beforeAll(async () => {
  options = await defaultOptions();
});

afterEach(() => {
  vi.restoreAllMocks();
});

const ferritin: ExtractedTest = {
  test_name: "Ферритин",
  result: "85",
  reference_values: null,
  units: "нг/мл",
  test_date: "2025-04-01",
  test_system: null,
  equipment: null,
  notes: null,
  source_record_id: 2,
};

function seededStore(): InMemoryTestStore {
  return new InMemoryTestStore(
    [],
    [
      { id: 1, user_id: "user-1", content: "Дата: 01.04.2025\nAnti-HBs: 12 мМЕ/мл\nAnti-HCV: отрицательно" },
      { id: 2, user_id: "user-1", content: "Заключение терапевта без показателей" },
      { id: 3, user_id: "user-2", content: "Anti-HEV IgG: положительно" },
    ]
  );
}

describe("extractAndStructure", () => {
  it("parses records and uses the fallback where parsing finds nothing", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = seededStore();
    const fallback = vi.fn(async () => [ferritin]);

    const summary = await extractAndStructure("user-1", { store, options, fallback });

    expect(summary).toEqual({ tests_count: 3, saved_count: 3 });
    expect(fallback).toHaveBeenCalledTimes(1);
    expect(fallback).toHaveBeenCalledWith("Заключение терапевта без показателей", 2);
    expect(store.tests.map((test) => [test.user_id, test.test_name, test.result, test.test_date])).toEqual([
      ["user-1", "Anti-HBs", "12", "2025-04-01"],
      ["user-1", "Anti-HCV", "отрицательно", "2025-04-01"],
      ["user-1", "Ферритин", "85", "2025-04-01"],
    ]);
  });

  it("logs and skips a failing fallback", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = seededStore();
    const fallback = vi.fn(async (): Promise<ExtractedTest[]> => {
      throw new Error("rate limited");
    });

    const summary = await extractAndStructure("user-1", { store, options, fallback });

    expect(summary).toEqual({ tests_count: 2, saved_count: 2 });
    expect(warn).toHaveBeenCalledWith("  -> Fallback extraction failed for record 2: rate limited");
  });

  it("overwrites tests already stored under the same name and date", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = seededStore();

    await extractAndStructure("user-1", { store, options });
    await extractAndStructure("user-1", { store, options });

    expect(store.tests).toHaveLength(2);
  });

  it("counts a test repeated across records once", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = new InMemoryTestStore(
      [],
      [
        { id: 1, user_id: "user-1", content: "Дата: 01.04.2025\nAnti-HBs: 12 мМЕ/мл" },
        { id: 2, user_id: "user-1", content: "Дата: 01.04.2025\nAnti-HBs: 12 мМЕ/мл\nAnti-HCV: отрицательно" },
      ]
    );

    const summary = await extractAndStructure("user-1", { store, options });

    expect(summary).toEqual({ tests_count: 2, saved_count: 2 });
    expect(store.tests.map((test) => [test.test_name, test.source_record_id])).toEqual([
      ["Anti-HBs", 1],
      ["Anti-HCV", 2],
    ]);
  });

  it("returns zero counts without medical records", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const summary = await extractAndStructure("nobody", { store: seededStore(), options });
    expect(summary).toEqual({ tests_count: 0, saved_count: 0 });
  });
});
