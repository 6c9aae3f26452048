import { containsAnyTerm } from "./corpus";
import { TestRecord, Vocabulary } from "./types";

export const OTHER_CATEGORY = "Other tests";

export type MissingField = "test_date" | "reference_values";

export interface MissingData {
  id: number;
  test_name: string;
  missing_fields: MissingField[];
}

export interface CategoryGroup {
  name: string;
  tests: TestRecord[];
}

export function sortByName(tests: TestRecord[]): TestRecord[] {
  return [...tests].sort((a, b) => a.test_name.localeCompare(b.test_name) || a.id - b.id);
}

/** Case-insensitive substring lookup on the test name. */
export function findTests(tests: TestRecord[], query: string): TestRecord[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [];
  return sortByName(tests.filter((test) => test.test_name.toLowerCase().includes(needle)));
}

export function categorizeTest(testName: string, vocabulary: Vocabulary): string {
  const category = vocabulary.testCategories.find((entry) => containsAnyTerm(testName, entry.terms));
  return category ? category.name : OTHER_CATEGORY;
}

/** Groups in order of first appearance, tests sorted by name. */
export function groupByCategory(tests: TestRecord[], vocabulary: Vocabulary): CategoryGroup[] {
  const groups = new Map<string, TestRecord[]>();
  for (const test of sortByName(tests)) {
    const name = categorizeTest(test.test_name, vocabulary);
    const group = groups.get(name);
    if (group) {
      group.push(test);
    } else {
      groups.set(name, [test]);
    }
  }
  return Array.from(groups, ([name, grouped]) => ({ name, tests: grouped }));
}

export function findMissingData(tests: TestRecord[]): MissingData[] {
  const missing: MissingData[] = [];
  for (const test of tests) {
    const fields: MissingField[] = [];
    if (!test.test_date) fields.push("test_date");
    if (!test.reference_values) fields.push("reference_values");
    if (fields.length) {
      missing.push({ id: test.id, test_name: test.test_name, missing_fields: fields });
    }
  }
  return missing;
}
