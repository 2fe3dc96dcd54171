/**
 * Fixed-width text splitting for outbound messages.
 */

export const DEFAULT_CHUNK_LIMIT = 4000;

/**
 * Split text into consecutive slices of at most `limit` characters.
 * Empty text yields no slices.
 */
export function splitFixed(text: string, limit = DEFAULT_CHUNK_LIMIT): string[] {
  if (!text) {
    return [];
  }
  if (limit <= 0 || text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += limit) {
    chunks.push(text.slice(start, start + limit));
  }
  return chunks;
}
