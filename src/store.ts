import { MedicalRecord, NewTestRecord, ReprocessState, TestRecord, TestRecordPatch } from "./types";

export interface TestRecordStore {
  /** All structured tests of a user, in storage order. */
  listTests(userId: string): Promise<TestRecord[]>;
  updateTest(id: number, patch: TestRecordPatch): Promise<void>;
  /** Returns how many of `ids` were removed. */
  deleteTests(ids: number[]): Promise<number>;
  /** Returns how many rows were removed. */
  deleteTestsForUser(userId: string): Promise<number>;
  /** Inserts or overwrites on `(user_id, test_name, test_date)`; returns rows written. */
  upsertTests(rows: NewTestRecord[]): Promise<number>;
  listMedicalRecords(userId: string): Promise<MedicalRecord[]>;
}

export interface ReprocessJournal {
  load(userId: string): Promise<ReprocessState | null>;
  save(state: ReprocessState): Promise<void>;
  clear(userId: string): Promise<void>;
}
