import { ReprocessJournal, TestRecordStore } from "./store";
import { ExtractionSummary, ReprocessState, ReprocessSummary } from "./types";

export interface ReprocessDeps {
  store: TestRecordStore;
  journal: ReprocessJournal;
  extract: (userId: string) => Promise<ExtractionSummary>;
  now?: () => Date;
}

/**
 * Deletes a user's structured tests and extracts them again. The journal records
 * each phase before it runs, so an interrupted run is picked up where it stopped
 * and the journal entry only disappears once extraction has finished.
 */
export async function reprocessUser(userId: string, deps: ReprocessDeps): Promise<ReprocessSummary> {
  const { store, journal, extract } = deps;
  const now = deps.now ?? (() => new Date());

  const pending = await journal.load(userId);
  const resumed = pending !== null;
  let state: ReprocessState = pending ?? {
    user_id: userId,
    phase: "deleting",
    deleted_count: 0,
    started_at: now().toISOString(),
  };

  if (resumed) {
    console.log(`  -> Resuming reprocess for ${userId} from phase "${state.phase}".`);
  } else {
    await journal.save(state);
  }

  if (state.phase === "deleting") {
    const deleted = await store.deleteTestsForUser(userId);
    console.log(`  -> ${deleted} structured tests deleted.`);
    state = { ...state, phase: "extraction_pending", deleted_count: state.deleted_count + deleted };
    await journal.save(state);
  }

  const extraction = await extract(userId);
  await journal.clear(userId);

  return { ...extraction, deleted_count: state.deleted_count, resumed };
}

export function findPendingReprocess(userId: string, journal: ReprocessJournal): Promise<ReprocessState | null> {
  return journal.load(userId);
}
