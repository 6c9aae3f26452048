import { ExtractedTest, RepairReport, ReprocessState, ReprocessSummary, TestRecord } from "./types";
import { CategoryGroup, MissingData, MissingField } from "./viewer";

const MISSING_FIELD_LABELS: Record<MissingField, string> = {
  test_date: "test date",
  reference_values: "reference values",
};

export function renderRepairReport(report: RepairReport & { failed_ids?: number[]; removed_ids?: number[] }): string {
  const lines = [`## Cleanup`, ``];
  if (report.cleaned_count) {
    lines.push(
      `Repaired tests: ${report.cleaned_count}`,
      ``,
      `| ID | Test | Result | Test system | Equipment |`,
      `| --- | --- | --- | --- | --- |`,
      ...report.updated_tests.map(
        (test) =>
          `| ${test.id} | ${test.test_name} | ${diff(test.old_result, test.new_result)} | ${diff(
            test.old_test_system,
            test.new_test_system
          )} | ${diff(test.old_equipment, test.new_equipment)} |`
      )
    );
  } else {
    lines.push(`No tests needed repair.`);
  }
  if (report.removed_ids?.length) {
    lines.push(``, `Removed duplicates: ${report.removed_ids.join(", ")}`);
  }
  if (report.failed_ids?.length) {
    lines.push(``, `Failed updates: ${report.failed_ids.join(", ")}`);
  }
  return lines.join("\n");
}

export function renderReprocessSummary(summary: ReprocessSummary): string {
  const lines = [`## Reprocess`, ``];
  if (summary.resumed) lines.push(`- Resumed an interrupted run`);
  lines.push(
    `- Deleted tests: ${summary.deleted_count}`,
    `- Extracted tests: ${summary.tests_count}`,
    `- Saved tests: ${summary.saved_count}`
  );
  return lines.join("\n");
}

export function renderPendingReprocess(state: ReprocessState): string {
  return `Reprocess for ${state.user_id} started ${state.started_at} is unfinished (phase: ${state.phase}).`;
}

export function renderExtractedTests(file: string, tests: ExtractedTest[]): string {
  const rows = tests
    .map(
      (test) =>
        `| ${test.test_name} | ${test.result} | ${test.reference_values || "-"} | ${test.units || "-"} | ${
          test.test_date || "-"
        } | ${test.test_system || "-"} | ${test.equipment || "-"} |`
    )
    .join("\n");

  return [
    `## ${file}`,
    ``,
    `| Test | Result | Reference | Units | Date | Test system | Equipment |`,
    `| --- | --- | --- | --- | --- | --- | --- |`,
    rows || "| No tests parsed | - | - | - | - | - | - |",
  ].join("\n");
}

export function renderStoredTests(tests: TestRecord[]): string {
  if (!tests.length) return "No stored tests.";
  const rows = tests.map(
    (test) =>
      `| ${cell(test.test_name)} | ${cell(test.result)} | ${cell(test.reference_values)} | ${cell(
        test.units
      )} | ${displayDate(test.test_date)} |`
  );
  return [`| Test | Result | Reference | Units | Date |`, `| --- | --- | --- | --- | --- |`, ...rows].join("\n");
}

export function renderCategorySummary(groups: CategoryGroup[]): string {
  const total = groups.reduce((sum, group) => sum + group.tests.length, 0);
  const lines = [`## Summary`, ``, `Total tests: ${total}`];
  for (const group of groups) {
    lines.push(``, `**${group.name}** (${group.tests.length})`);
    for (const test of group.tests) {
      lines.push(`- ${test.test_name}: ${test.result ?? "-"} (${displayDate(test.test_date)})`);
    }
  }
  return lines.join("\n");
}

export function renderMissingData(missing: MissingData[]): string {
  if (!missing.length) return "## Missing data\n\nEvery test has a date and reference values.";
  const lines = missing.map(
    (entry) =>
      `- ${entry.id} ${entry.test_name}: ${entry.missing_fields.map((field) => MISSING_FIELD_LABELS[field]).join(", ")}`
  );
  return [`## Missing data`, ``, ...lines].join("\n");
}

function cell(value: string | null): string {
  return value ? value.replace(/\|/g, "\\|") : "-";
}

// ISO dates are shown as DD.MM.YYYY, anything else verbatim.
function displayDate(value: string | null): string {
  if (!value) return "no date";
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})/);
  return match ? `${match[3]}.${match[2]}.${match[1]}` : value;
}

function diff(before: string | null, after: string | null): string {
  if (before === after) return before ?? "-";
  return `${before ?? "-"} → ${after ?? "-"}`;
}
