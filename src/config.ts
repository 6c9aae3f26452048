import path from "path";
import { config } from "dotenv";
import { ConfigError } from "./types";

config();

export interface AppConfig {
  supabaseUrl?: string;
  supabaseKey?: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  contextRadius: number;
  keywordRadius: number;
  vocabularyPath: string;
}

export const DEFAULT_CONTEXT_RADIUS = 2;
export const DEFAULT_KEYWORD_RADIUS = 10;
export const DEFAULT_VOCABULARY_PATH = path.resolve(__dirname, "../data/vocabulary.json");

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseKey: env.SUPABASE_SERVICE_KEY || undefined,
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined, // optional
    openaiModel: env.OPENAI_MODEL || "gpt-4o-mini",
    contextRadius: readRadius(env.CONTEXT_RADIUS, "CONTEXT_RADIUS", DEFAULT_CONTEXT_RADIUS),
    keywordRadius: readRadius(env.KEYWORD_RADIUS, "KEYWORD_RADIUS", DEFAULT_KEYWORD_RADIUS),
    vocabularyPath: env.VOCABULARY_PATH ? path.resolve(env.VOCABULARY_PATH) : DEFAULT_VOCABULARY_PATH,
  };
}

function readRadius(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}
