import { beforeAll, describe, expect, it } from "vitest";
import {
  dedupeTests,
  extractReferenceValues,
  extractTestsFromText,
  extractUnits,
  isTestLine,
  normalizeDate,
} from "../extractor";
import { RepairOptions } from "../types";
import { defaultOptions } from "./fakes";

let options: RepairOptions;

beforeAll(async () => {
  options = await defaultOptions();
});

const transcript = [
  "Дата рождения: 01.02.1980",
  "Дата анализа: 12.03.2024",
  "**1. Anti-HCV total (анти-HCV):** ОТРИЦАТЕЛЬНО",
  "Тест-система: Anti-HCV, Abbott",
  "Оборудование: Abbott, Alinity i",
  "**2. Anti-HEV IgG:** **",
  "Результат: положительно",
  "Глюкоза: 5.2 ммоль/л (3.3-5.5)",
].join("\n");

describe("extractTestsFromText", () => {
  it("extracts tests with context fields and the analysis date", () => {
    expect(extractTestsFromText(transcript, 11, options)).toEqual([
      {
        test_name: "Anti-HCV total (анти-HCV)",
        result: "ОТРИЦАТЕЛЬНО",
        reference_values: null,
        units: null,
        test_date: "2024-03-12",
        test_system: "Anti-HCV, Abbott",
        equipment: "Abbott, Alinity i",
        notes: null,
        source_record_id: 11,
      },
      {
        test_name: "Anti-HEV IgG",
        result: "положительно",
        reference_values: null,
        units: null,
        test_date: "2024-03-12",
        test_system: "Anti-HCV, Abbott",
        equipment: "Abbott, Alinity i",
        notes: null,
        source_record_id: 11,
      },
      {
        test_name: "Глюкоза",
        result: "5.2",
        reference_values: "3.3-5.5",
        units: "ммоль/л",
        test_date: "2024-03-12",
        test_system: null,
        equipment: null,
        notes: null,
        source_record_id: 11,
      },
    ]);
  });

  it("returns an empty list for text without test lines", () => {
    expect(extractTestsFromText("Общий осмотр без замечаний", null, options)).toEqual([]);
  });

  it("keeps the first occurrence of a repeated test", () => {
    const text = ["Anti-HBs: 12 мМЕ/мл", "Anti-HBs: 15 мМЕ/мл"].join("\n");
    const tests = extractTestsFromText(text, null, options);
    expect(tests).toHaveLength(1);
    expect(tests[0].result).toBe("12");
    expect(tests[0].units).toBe("мМЕ/мл");
    expect(tests[0].test_date).toBeNull();
  });
});

describe("extractor helpers", () => {
  it("treats field label lines as non-test lines", () => {
    expect(isTestLine("Тест-система: Anti-HBc, Abbott", options.vocabulary)).toBe(false);
    expect(isTestLine("Anti-HBc: положительно", options.vocabulary)).toBe(true);
    expect(isTestLine("Anti-HBc положительно", options.vocabulary)).toBe(false);
  });

  it("reads units and reference values", () => {
    expect(extractUnits("12 мМЕ/мл")).toBe("мМЕ/мл");
    expect(extractUnits("ОТРИЦАТЕЛЬНО")).toBeUndefined();
    expect(extractReferenceValues("ОТРИЦАТЕЛЬНО, норма: отрицательно")).toBe("отрицательно");
    expect(extractReferenceValues("140 г/л (130 - 170)")).toBe("130 - 170");
  });

  it("normalizes dates to ISO", () => {
    expect(normalizeDate("12.03.2024")).toBe("2024-03-12");
    expect(normalizeDate("2024-03-12")).toBe("2024-03-12");
    expect(normalizeDate("5/3/24")).toBe("2024-03-05");
    expect(normalizeDate("31.13.2024")).toBeUndefined();
    expect(normalizeDate("нет даты")).toBeUndefined();
  });

  it("dedupes on name and date, ignoring case", () => {
    const base = {
      result: "1",
      reference_values: null,
      units: null,
      test_system: null,
      equipment: null,
      notes: null,
      source_record_id: null,
    };
    const tests = dedupeTests([
      { ...base, test_name: "Anti-HBs", test_date: "2024-03-12" },
      { ...base, test_name: "ANTI-HBS", test_date: "2024-03-12" },
      { ...base, test_name: "Anti-HBs", test_date: "2024-04-01" },
    ]);
    expect(tests.map((test) => test.test_date)).toEqual(["2024-03-12", "2024-04-01"]);
  });
});
