import path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_VOCABULARY_PATH, readConfig } from "../config";
import { ConfigError } from "../types";

describe("readConfig", () => {
  it("falls back to defaults", () => {
    expect(readConfig({})).toEqual({
      supabaseUrl: undefined,
      supabaseKey: undefined,
      openaiApiKey: undefined,
      openaiBaseUrl: undefined,
      openaiModel: "gpt-4o-mini",
      contextRadius: 2,
      keywordRadius: 10,
      vocabularyPath: DEFAULT_VOCABULARY_PATH,
    });
  });

  it("reads radii and the vocabulary path", () => {
    const appConfig = readConfig({ CONTEXT_RADIUS: "3", KEYWORD_RADIUS: " 0 ", VOCABULARY_PATH: "vocab.json" });
    expect(appConfig.contextRadius).toBe(3);
    expect(appConfig.keywordRadius).toBe(0);
    expect(appConfig.vocabularyPath).toBe(path.resolve("vocab.json"));
  });

  it("rejects radii that are not non-negative integers", () => {
    expect(() => readConfig({ CONTEXT_RADIUS: "-1" })).toThrow(ConfigError);
    expect(() => readConfig({ KEYWORD_RADIUS: "abc" })).toThrow('KEYWORD_RADIUS must be a non-negative integer, got "abc"');
  });
});
