import OpenAI from "openai";
import { cleanValue } from "./cleaner";
import { AppConfig, readConfig } from "./config";
import { dedupeTests, normalizeDate } from "./extractor";
import { ExtractedTest, ExtractionError, UNSPECIFIED } from "./types";

const EXTRACTION_SCHEMA_PROMPT = `
Return strict JSON with the shape:
{
  "tests": [
    {
      "test_name": "<string>",
      "result": "<string>",
      "reference_values": "<string or null>",
      "units": "<string or null>",
      "test_date": "<YYYY-MM-DD or null>",
      "test_system": "<string or null>",
      "equipment": "<string or null>"
    }
  ]
}
Rules:
1. One entry per laboratory test found in the text. Do not invent tests.
2. Copy values exactly as written. Never put "**", "*" or other markup in place of a value.
3. Use null when a value is not present in the text.
4. If no tests are present, return {"tests": []}.`.trim();

export function createOpenAIClient(appConfig: AppConfig): OpenAI {
  if (!appConfig.openaiApiKey) {
    throw new ExtractionError("OPENAI_API_KEY is missing in environment.");
  }
  return new OpenAI({
    apiKey: appConfig.openaiApiKey,
    baseURL: appConfig.openaiBaseUrl,
  });
}

export async function extractTestsWithLLM(
  text: string,
  sourceRecordId: number | null,
  appConfig: AppConfig = readConfig()
): Promise<ExtractedTest[]> {
  const client = createOpenAIClient(appConfig);
  const system =
    "You extract laboratory test results from OCR transcripts of medical lab reports. Always return valid JSON only. Do not include markdown or commentary.";

  const completion = await client.chat.completions.create({
    model: appConfig.openaiModel,
    messages: [
      { role: "system", content: system },
      { role: "user", content: ["LAB REPORT TEXT:", text, "", EXTRACTION_SCHEMA_PROMPT].join("\n") },
    ],
    temperature: 0,
    response_format: { type: "json_object" },
  });

  const content = completion.choices[0]?.message?.content;
  if (!content) {
    throw new ExtractionError("LLM returned empty response.");
  }
  return parseExtractedTests(content, sourceRecordId);
}

/** Validates the model's JSON; markers left in values are cleaned the same way stored fields are. */
export function parseExtractedTests(content: string, sourceRecordId: number | null): ExtractedTest[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    throw new ExtractionError(`Unable to parse LLM JSON: ${message}\nRaw content:\n${content}`);
  }

  const rawTests = isRecord(parsed) && Array.isArray(parsed.tests) ? parsed.tests : null;
  if (!rawTests) {
    throw new ExtractionError(`LLM JSON has no "tests" array.\nRaw content:\n${content}`);
  }

  const tests: ExtractedTest[] = [];
  for (const item of rawTests) {
    if (!isRecord(item)) continue;
    const testName = cleanValue(asText(item.test_name));
    if (testName === UNSPECIFIED) continue;
    const testDate = asText(item.test_date);

    tests.push({
      test_name: testName,
      result: cleanValue(asText(item.result)),
      reference_values: optionalValue(item.reference_values),
      units: optionalValue(item.units),
      test_date: testDate ? normalizeDate(testDate) ?? null : null,
      test_system: optionalValue(item.test_system),
      equipment: optionalValue(item.equipment),
      notes: null,
      source_record_id: sourceRecordId,
    });
  }
  return dedupeTests(tests);
}

function optionalValue(value: unknown): string | null {
  const cleaned = cleanValue(asText(value));
  return cleaned === UNSPECIFIED ? null : cleaned;
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
