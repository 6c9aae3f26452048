export const UNSPECIFIED = "Не указан";

export type FieldKind = "result" | "test_system" | "equipment";

export type RepairMethod = "direct_clean" | "context_extract" | "keyword_search";

export interface CleanedValue {
  value: string;
  isUnspecified: boolean;
  method: RepairMethod;
}

export interface ResultKeyword {
  keyword: string;
  locale: string;
}

export interface TestCategory {
  name: string;
  terms: string[];
}

export interface Vocabulary {
  resultKeywords: ResultKeyword[];
  fieldLabels: {
    result: string[];
    testSystem: string[];
    equipment: string[];
    date: string[];
    reference: string[];
    units: string[];
  };
  testNameHints: string[];
  testCategories: TestCategory[];
}

export interface RepairOptions {
  vocabulary: Vocabulary;
  contextRadius?: number;
  keywordRadius?: number;
}

export interface TestRecord {
  id: number;
  user_id: string;
  test_name: string;
  result: string | null;
  reference_values: string | null;
  units: string | null;
  test_date: string | null;
  test_system: string | null;
  equipment: string | null;
  notes: string | null;
  source_record_id: number | null;
  created_at: string | null;
  updated_at: string | null;
}

export type NewTestRecord = Omit<TestRecord, "id" | "created_at" | "updated_at">;

export interface TestRecordPatch {
  result?: string;
  test_system?: string;
  equipment?: string;
  updated_at: string;
}

export interface MedicalRecord {
  id: number;
  user_id: string;
  content: string;
}

export interface UpdatedTest {
  id: number;
  test_name: string;
  old_result: string | null;
  new_result: string | null;
  old_test_system: string | null;
  new_test_system: string | null;
  old_equipment: string | null;
  new_equipment: string | null;
}

export interface RepairReport {
  cleaned_count: number;
  updated_tests: UpdatedTest[];
}

export interface ExtractedTest {
  test_name: string;
  result: string;
  reference_values: string | null;
  units: string | null;
  test_date: string | null;
  test_system: string | null;
  equipment: string | null;
  notes: string | null;
  source_record_id: number | null;
}

export interface ExtractionSummary {
  tests_count: number;
  saved_count: number;
}

export type ReprocessPhase = "deleting" | "extraction_pending";

export interface ReprocessState {
  user_id: string;
  phase: ReprocessPhase;
  deleted_count: number;
  started_at: string;
}

export interface ReprocessSummary extends ExtractionSummary {
  deleted_count: number;
  resumed: boolean;
}

export class OCRRequestError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "OCRRequestError";
  }
}

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class VocabularyError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "VocabularyError";
  }
}

export class RecordStoreError extends Error {
  public constructor(
    public readonly operation: string,
    message: string
  ) {
    super(`${operation}: ${message}`);
    this.name = "RecordStoreError";
  }
}

export class ExtractionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}
