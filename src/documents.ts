import fs from "fs/promises";
import path from "path";
import pdf from "pdf-parse";
import { isImageFile, runOCR } from "./ocr";
import { ExtractionError } from "./types";

const TEXT_EXTENSIONS = new Set([".txt", ".md"]);

export function isSupportedDocument(file: string): boolean {
  const ext = path.extname(file).toLowerCase();
  return TEXT_EXTENSIONS.has(ext) || ext === ".pdf" || isImageFile(file);
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const absolute = path.resolve(filePath);
  const ext = path.extname(absolute).toLowerCase();

  if (TEXT_EXTENSIONS.has(ext)) {
    return fs.readFile(absolute, "utf8");
  }
  if (ext === ".pdf") {
    try {
      const parsed = await pdf(await fs.readFile(absolute));
      return parsed.text || "";
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      throw new ExtractionError(`Unable to read PDF ${absolute}: ${message}`);
    }
  }
  if (isImageFile(absolute)) {
    return runOCR(absolute);
  }
  throw new ExtractionError(`Unsupported document type: ${absolute}`);
}
