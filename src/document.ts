/**
 * Source document reading.
 *
 * Turns the configured document into the ordered list of trimmed, non-empty
 * paragraphs the chunker consumes. Supported inputs:
 *   - .docx  raw text via mammoth (one paragraph per line of output)
 *   - .pdf   text layer via pdf-parse
 *   - other  UTF-8 text, one paragraph per line
 */
import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { DocumentNotFoundError, InvalidInputError } from "./errors";

/** Reads a document into paragraphs. Injected into the indexer. */
export type ParagraphReader = (docPath: string) => Promise<string[]>;

/** Split extracted text into trimmed, non-empty paragraphs. */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Confirm `docPath` names an existing regular file.
 *
 * @throws {DocumentNotFoundError} If nothing is there.
 * @throws {InvalidInputError} If the path is a directory or other non-file.
 */
export async function assertDocumentExists(docPath: string): Promise<void> {
  let st: Stats;
  try {
    st = await fs.stat(docPath);
  } catch {
    throw new DocumentNotFoundError(docPath);
  }
  if (!st.isFile()) throw new InvalidInputError(`${docPath} is not a regular file`);
}

/** @returns Lower-cased extension including the dot, e.g. ".docx". */
export function documentKind(docPath: string): string {
  return path.extname(docPath).toLowerCase();
}

async function extractDocx(docPath: string): Promise<string> {
  const result = await mammoth.extractRawText({ path: docPath });
  return result.value;
}

async function extractPdf(docPath: string): Promise<string> {
  const data = await fs.readFile(docPath);
  const parser = new PDFParse({ data });
  try {
    const textResult = await parser.getText();
    return textResult.text || "";
  } finally {
    await parser.destroy();
  }
}

/**
 * Read a document from disk into paragraphs.
 *
 * @throws {DocumentNotFoundError} If the file does not exist.
 */
export const readParagraphs: ParagraphReader = async (docPath) => {
  await assertDocumentExists(docPath);
  let text: string;
  switch (documentKind(docPath)) {
    case ".docx":
      text = await extractDocx(docPath);
      break;
    case ".pdf":
      text = await extractPdf(docPath);
      break;
    default:
      text = await fs.readFile(docPath, "utf8");
  }
  return splitParagraphs(text);
};
