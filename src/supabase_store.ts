import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { AppConfig } from "./config";
import { ReprocessJournal, TestRecordStore } from "./store";
import {
  ConfigError,
  MedicalRecord,
  NewTestRecord,
  RecordStoreError,
  ReprocessState,
  TestRecord,
  TestRecordPatch,
} from "./types";

const TESTS_TABLE = "doc_structured_test_results";
const MEDICAL_RECORDS_TABLE = "doc_medical_records";
const REPROCESS_TABLE = "doc_reprocess_runs";

export function createSupabaseClient(appConfig: AppConfig): SupabaseClient {
  if (!appConfig.supabaseUrl || !appConfig.supabaseKey) {
    throw new ConfigError("SUPABASE_URL and SUPABASE_SERVICE_KEY are required for database commands.");
  }
  return createClient(appConfig.supabaseUrl, appConfig.supabaseKey, {
    auth: { persistSession: false },
  });
}

export class SupabaseTestStore implements TestRecordStore {
  public constructor(private readonly client: SupabaseClient) {}

  public async listTests(userId: string): Promise<TestRecord[]> {
    const { data, error } = await this.client
      .from(TESTS_TABLE)
      .select("*")
      .eq("user_id", userId)
      .order("id", { ascending: true });
    if (error) throw new RecordStoreError("listTests", error.message);
    return (data ?? []).map((row: unknown) => toTestRecord(row));
  }

  public async updateTest(id: number, patch: TestRecordPatch): Promise<void> {
    const { error } = await this.client.from(TESTS_TABLE).update(patch).eq("id", id);
    if (error) throw new RecordStoreError("updateTest", `test ${id}: ${error.message}`);
  }

  public async deleteTests(ids: number[]): Promise<number> {
    if (!ids.length) return 0;
    const { error, count } = await this.client.from(TESTS_TABLE).delete({ count: "exact" }).in("id", ids);
    if (error) throw new RecordStoreError("deleteTests", error.message);
    return count ?? 0;
  }

  public async deleteTestsForUser(userId: string): Promise<number> {
    const { error, count } = await this.client
      .from(TESTS_TABLE)
      .delete({ count: "exact" })
      .eq("user_id", userId);
    if (error) throw new RecordStoreError("deleteTestsForUser", error.message);
    return count ?? 0;
  }

  public async upsertTests(rows: NewTestRecord[]): Promise<number> {
    if (!rows.length) return 0;
    const { data, error } = await this.client
      .from(TESTS_TABLE)
      .upsert(rows, { onConflict: "user_id,test_name,test_date" })
      .select("id");
    if (error) throw new RecordStoreError("upsertTests", error.message);
    return data?.length ?? 0;
  }

  public async listMedicalRecords(userId: string): Promise<MedicalRecord[]> {
    const { data, error } = await this.client
      .from(MEDICAL_RECORDS_TABLE)
      .select("id, user_id, content")
      .eq("user_id", userId)
      .order("created_at", { ascending: true });
    if (error) throw new RecordStoreError("listMedicalRecords", error.message);
    return (data ?? []).map((row: unknown) => toMedicalRecord(row));
  }
}

export class SupabaseReprocessJournal implements ReprocessJournal {
  public constructor(private readonly client: SupabaseClient) {}

  public async load(userId: string): Promise<ReprocessState | null> {
    const { data, error } = await this.client
      .from(REPROCESS_TABLE)
      .select("*")
      .eq("user_id", userId)
      .maybeSingle();
    if (error) throw new RecordStoreError("loadReprocessState", error.message);
    return data ? toReprocessState(data) : null;
  }

  public async save(state: ReprocessState): Promise<void> {
    const { error } = await this.client.from(REPROCESS_TABLE).upsert(state, { onConflict: "user_id" });
    if (error) throw new RecordStoreError("saveReprocessState", error.message);
  }

  public async clear(userId: string): Promise<void> {
    const { error } = await this.client.from(REPROCESS_TABLE).delete().eq("user_id", userId);
    if (error) throw new RecordStoreError("clearReprocessState", error.message);
  }
}

function toTestRecord(row: unknown): TestRecord {
  if (!isRow(row) || typeof row.id !== "number" || typeof row.test_name !== "string") {
    throw new RecordStoreError("decodeTestRecord", "row is missing id or test_name");
  }
  return {
    id: row.id,
    user_id: typeof row.user_id === "string" ? row.user_id : "",
    test_name: row.test_name,
    result: optionalString(row.result),
    reference_values: optionalString(row.reference_values),
    units: optionalString(row.units),
    test_date: optionalString(row.test_date),
    test_system: optionalString(row.test_system),
    equipment: optionalString(row.equipment),
    notes: optionalString(row.notes),
    source_record_id: typeof row.source_record_id === "number" ? row.source_record_id : null,
    created_at: optionalString(row.created_at),
    updated_at: optionalString(row.updated_at),
  };
}

function toMedicalRecord(row: unknown): MedicalRecord {
  if (!isRow(row) || typeof row.id !== "number") {
    throw new RecordStoreError("decodeMedicalRecord", "row is missing id");
  }
  return {
    id: row.id,
    user_id: typeof row.user_id === "string" ? row.user_id : "",
    content: typeof row.content === "string" ? row.content : "",
  };
}

function toReprocessState(row: unknown): ReprocessState {
  if (!isRow(row) || typeof row.user_id !== "string") {
    throw new RecordStoreError("decodeReprocessState", "row is missing user_id");
  }
  if (row.phase !== "deleting" && row.phase !== "extraction_pending") {
    throw new RecordStoreError("decodeReprocessState", `unknown phase ${String(row.phase)}`);
  }
  return {
    user_id: row.user_id,
    phase: row.phase,
    deleted_count: typeof row.deleted_count === "number" ? row.deleted_count : 0,
    started_at: typeof row.started_at === "string" ? row.started_at : "",
  };
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
