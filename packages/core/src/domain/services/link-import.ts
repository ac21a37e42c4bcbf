export interface LinkBatchEntry {
  name?: string;
  url: string;
}

/**
 * Splits pasted text into batch entries, one URL per line. Blank lines are
 * dropped; names are left for `addLinks` to derive from the URL.
 */
export function parseLinkLines(text: string): LinkBatchEntry[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((url) => ({ url }));
}
