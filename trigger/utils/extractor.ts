import { readFile } from "node:fs/promises";
import { PDFParse } from "pdf-parse";
import { errorMessage } from "../errors";

export const EMPTY_DOCUMENT_TEXT =
  "No text content could be extracted from the document.";

export interface ExtractorAdapters {
  readBytes(filePath: string): Promise<Uint8Array>;
  parsePdf(bytes: Uint8Array): Promise<string>;
}

const defaultAdapters: ExtractorAdapters = {
  async readBytes(filePath) {
    return new Uint8Array(await readFile(filePath));
  },
  async parsePdf(bytes) {
    const parser = new PDFParse({ data: bytes });
    try {
      const parsed = await parser.getText();
      return parsed.text ?? "";
    } finally {
      await parser.destroy();
    }
  },
};

export function normalizeDocumentText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\n{2,}/g, "\n").trim();
}

/**
 * Reads a PDF and returns its text. Failures come back as a descriptive
 * string instead of an exception; downstream analysis treats that string as
 * the document content.
 */
export async function extractDocumentText(
  filePath: string,
  adapters: ExtractorAdapters = defaultAdapters
): Promise<string> {
  const taskId = "extract-document";

  try {
    const bytes = await adapters.readBytes(filePath);
    console.log(
      `[${taskId}] Read ${(bytes.length / 1024).toFixed(2)} KB from ${filePath}`
    );

    const text = normalizeDocumentText(await adapters.parsePdf(bytes));
    if (!text) {
      console.log(`[${taskId}] ⚠️  Document contains no text`);
      return EMPTY_DOCUMENT_TEXT;
    }

    console.log(`[${taskId}] ✓ Extracted ${text.length} characters`);
    return text;
  } catch (error) {
    console.error(`[${taskId}] Extraction failed:`, error);
    return `Error reading document at ${filePath}: ${errorMessage(error)}`;
  }
}
