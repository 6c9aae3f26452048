#!/usr/bin/env node
import fs from "fs/promises";
import path from "path";
import { cleanupTestResults } from "./cleanup";
import { AppConfig, readConfig } from "./config";
import { isSupportedDocument, loadDocumentText } from "./documents";
import { extractTestsFromText } from "./extractor";
import { extractTestsWithLLM } from "./llm";
import { extractAndStructure, FallbackExtractor } from "./pipeline";
import {
  renderCategorySummary,
  renderExtractedTests,
  renderMissingData,
  renderPendingReprocess,
  renderRepairReport,
  renderReprocessSummary,
  renderStoredTests,
} from "./report";
import { findPendingReprocess, reprocessUser } from "./reprocess";
import { createSupabaseClient, SupabaseReprocessJournal, SupabaseTestStore } from "./supabase_store";
import { ExtractedTest, RepairOptions } from "./types";
import { findMissingData, findTests, groupByCategory, sortByName } from "./viewer";
import { loadVocabulary } from "./vocabulary";

const USAGE = [
  "Usage:",
  "  lab-repair extract <file|dir>   Extract tests from .txt/.md/.pdf/image reports",
  "  lab-repair cleanup <userId>     Repair marker-corrupted fields of stored tests",
  "  lab-repair reprocess <userId>   Delete and re-extract a user's tests",
  "  lab-repair status <userId>      Show an unfinished reprocess, if any",
  "  lab-repair list <userId> [name] Show stored tests, or look one up by name",
].join("\n");

async function main(): Promise<void> {
  const [command, target, query] = process.argv.slice(2);
  if (!command || !target) {
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  const appConfig = readConfig();
  const options: RepairOptions = {
    vocabulary: await loadVocabulary(appConfig.vocabularyPath),
    contextRadius: appConfig.contextRadius,
    keywordRadius: appConfig.keywordRadius,
  };

  switch (command) {
    case "extract":
      await runExtract(target, appConfig, options);
      return;
    case "cleanup":
      await runCleanup(target, appConfig, options);
      return;
    case "reprocess":
      await runReprocess(target, appConfig, options);
      return;
    case "status":
      await runStatus(target, appConfig);
      return;
    case "list":
      await runList(target, query, appConfig, options);
      return;
    default:
      console.log(`Unknown command: ${command}\n\n${USAGE}`);
      process.exitCode = 1;
  }
}

async function runExtract(target: string, appConfig: AppConfig, options: RepairOptions): Promise<void> {
  const resolved = path.resolve(target);
  const files = await listDocuments(resolved);
  if (!files.length) {
    console.log(`No supported documents found: ${resolved}`);
    return;
  }

  const outputsDir = path.resolve("./outputs");
  await fs.mkdir(outputsDir, { recursive: true });
  const fallback = buildFallback(appConfig);
  const extractedByFile: Record<string, ExtractedTest[]> = {};
  const markdownParts: string[] = [];

  for (const filePath of files) {
    const file = path.basename(filePath);
    console.log(`Processing: ${filePath}...`);
    try {
      const text = await loadDocumentText(filePath);
      console.log("  -> Document text loaded.");
      let tests = extractTestsFromText(text, null, options);
      if (!tests.length && fallback) {
        console.log("  -> No test lines found, asking the LLM...");
        tests = await fallback(text, null);
      }
      console.log(`  -> ${tests.length} tests extracted.\n`);
      extractedByFile[file] = tests;
      markdownParts.push(renderExtractedTests(file, tests));
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      console.error(`Failed to process ${file}: ${message}`);
    }
  }

  await fs.writeFile(path.join(outputsDir, "extracted.json"), JSON.stringify(extractedByFile, null, 2), "utf8");
  await fs.writeFile(path.join(outputsDir, "extracted.md"), markdownParts.join("\n\n"), "utf8");
  console.log(`Done. Results written to ${outputsDir}/extracted.md and extracted.json.`);
}

async function runCleanup(userId: string, appConfig: AppConfig, options: RepairOptions): Promise<void> {
  const store = new SupabaseTestStore(createSupabaseClient(appConfig));
  console.log(`Cleaning up tests for ${userId}...`);
  const result = await cleanupTestResults(userId, { store, options });
  console.log(renderRepairReport(result));
}

async function runReprocess(userId: string, appConfig: AppConfig, options: RepairOptions): Promise<void> {
  const client = createSupabaseClient(appConfig);
  const store = new SupabaseTestStore(client);
  const journal = new SupabaseReprocessJournal(client);
  const fallback = buildFallback(appConfig);

  console.log(`Reprocessing tests for ${userId}...`);
  const summary = await reprocessUser(userId, {
    store,
    journal,
    extract: (id) => extractAndStructure(id, { store, options, fallback }),
  });
  console.log(renderReprocessSummary(summary));
}

async function runStatus(userId: string, appConfig: AppConfig): Promise<void> {
  const journal = new SupabaseReprocessJournal(createSupabaseClient(appConfig));
  const pending = await findPendingReprocess(userId, journal);
  console.log(pending ? renderPendingReprocess(pending) : `No unfinished reprocess for ${userId}.`);
}

async function runList(
  userId: string,
  query: string | undefined,
  appConfig: AppConfig,
  options: RepairOptions
): Promise<void> {
  const store = new SupabaseTestStore(createSupabaseClient(appConfig));
  const tests = await store.listTests(userId);
  if (query) {
    const found = findTests(tests, query);
    console.log(found.length ? renderStoredTests(found) : `No test matching "${query}" for ${userId}.`);
    return;
  }
  console.log(renderStoredTests(sortByName(tests)));
  if (!tests.length) return;
  console.log(`\n${renderCategorySummary(groupByCategory(tests, options.vocabulary))}`);
  console.log(`\n${renderMissingData(findMissingData(tests))}`);
}

function buildFallback(appConfig: AppConfig): FallbackExtractor | undefined {
  if (!appConfig.openaiApiKey) return undefined;
  return (text, sourceRecordId) => extractTestsWithLLM(text, sourceRecordId, appConfig);
}

async function listDocuments(resolved: string): Promise<string[]> {
  const stat = await fs.stat(resolved).catch(() => null);
  if (!stat) {
    console.error(`Input not found: ${resolved}`);
    process.exit(1);
  }
  if (stat.isFile()) return isSupportedDocument(resolved) ? [resolved] : [];
  const entries = await fs.readdir(resolved);
  return entries.filter((f) => isSupportedDocument(f)).map((f) => path.join(resolved, f));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
