import { InvalidInputError } from "./errors";

/** Defaults used when the caller does not pass explicit chunk sizing. */
export const DEFAULT_MAX_CHARS = 1200;
export const DEFAULT_OVERLAP = 150;

/**
 * Merge document paragraphs into chunks of roughly `maxChars` characters.
 *
 * Paragraphs are never split: one longer than `maxChars` becomes a chunk on
 * its own, so the budget is advisory. When a chunk is flushed, its last
 * `overlap` characters (a raw slice, possibly mid-word) seed the next chunk
 * ahead of the paragraph that triggered the flush.
 *
 * @param paragraphs Non-empty, trimmed paragraphs in document order.
 * @returns Chunks in document order.
 * @throws {InvalidInputError} On an empty paragraph list or invalid sizing.
 */
export function chunkParagraphs(
  paragraphs: readonly string[],
  maxChars = DEFAULT_MAX_CHARS,
  overlap = DEFAULT_OVERLAP,
): string[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new InvalidInputError(`maxChars must be a positive integer (got ${maxChars})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidInputError(`overlap must be a non-negative integer (got ${overlap})`);
  }
  if (paragraphs.length === 0) throw new InvalidInputError("Document is empty");

  const chunks: string[] = [];
  let buffer: string[] = [];
  let currentLen = 0;

  for (const para of paragraphs) {
    if (currentLen + para.length + 1 > maxChars && buffer.length > 0) {
      const chunk = buffer.join("\n");
      chunks.push(chunk);
      // slice(-0) would return the whole chunk
      const overlapText = overlap > 0 ? chunk.slice(-overlap) : "";
      buffer = overlapText ? [overlapText, para] : [para];
      // Seeded length omits separators.
      currentLen = overlapText.length + para.length;
    } else {
      buffer.push(para);
      currentLen += para.length + 1;
    }
  }

  if (buffer.length > 0) chunks.push(buffer.join("\n"));
  return chunks;
}
