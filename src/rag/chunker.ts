export const DEFAULT_CHUNK_LENGTH = 512;

/**
 * Sentence-packing chunker. Sentences are split on ". " and appended while
 * the running chunk stays under `maxLength`; a sentence that does not fit
 * starts the next chunk, even if it is longer than `maxLength` on its own.
 */
export function chunkText(text: string, maxLength: number = DEFAULT_CHUNK_LENGTH): string[] {
  if (!text) return [];

  const chunks: string[] = [];
  let current = "";

  for (const sentence of text.split(". ")) {
    if (current.length + sentence.length < maxLength) {
      current += `${sentence}. `;
      continue;
    }
    if (current) {
      chunks.push(current.trim());
    }
    current = `${sentence}. `;
  }

  if (current) {
    chunks.push(current.trim());
  }

  return chunks;
}
