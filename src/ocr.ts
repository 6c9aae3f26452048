import fs from "fs/promises";
import path from "path";
import { readConfig } from "./config";
import { createOpenAIClient } from "./llm";
import { OCRRequestError } from "./types";

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
};

export async function runOCR(imagePath: string): Promise<string> {
  const appConfig = readConfig();
  if (!appConfig.openaiApiKey) {
    throw new OCRRequestError("OPENAI_API_KEY missing");
  }
  const absolute = path.resolve(imagePath);
  const mime = IMAGE_MIME_TYPES[path.extname(absolute).toLowerCase()] ?? "image/jpeg";
  const imageB64 = (await fs.readFile(absolute)).toString("base64");

  const completion = await createOpenAIClient(appConfig).chat.completions.create({
    model: appConfig.openaiModel,
    messages: [
      {
        role: "system",
        content:
          "Extract all text from the laboratory report image. Keep one test per line as `Test name: result`, followed by its test system and equipment lines when printed. Return plain text/markdown only.",
      },
      {
        role: "user",
        content: [
          {
            type: "image_url",
            image_url: { url: `data:${mime};base64,${imageB64}` },
          },
        ],
      },
    ],
    temperature: 0,
  });

  const text = completion.choices[0]?.message?.content?.trim();
  if (!text) throw new OCRRequestError("Empty OCR response");
  return text;
}

export function isImageFile(file: string): boolean {
  return path.extname(file).toLowerCase() in IMAGE_MIME_TYPES;
}
