export interface ChunkOptions {
  /** Words per chunk. Default 512. */
  chunkSize?: number;
  /** Words repeated between consecutive windows of one long paragraph. Default 128. */
  overlap?: number;
}

/**
 * Splits on blank lines, then cuts each paragraph into word windows of
 * single-spaced words. Paragraphs shorter than a window stay in one chunk.
 */
export function splitIntoChunks(text: string, opts: ChunkOptions = {}): string[] {
  const size = Math.max(1, opts.chunkSize ?? 512);
  const overlap = Math.min(Math.max(0, opts.overlap ?? 128), size - 1);
  const chunks: string[] = [];

  for (const paragraph of text.split(/\n\s*\n/)) {
    const words = paragraph.split(/\s+/).filter(Boolean);
    if (words.length === 0) continue;
    for (let start = 0; ; start += size - overlap) {
      const end = Math.min(start + size, words.length);
      chunks.push(words.slice(start, end).join(' '));
      if (end === words.length) break;
    }
  }
  return chunks;
}
