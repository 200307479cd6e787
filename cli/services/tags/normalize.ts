/**
 * Canonical display form of a tag: trimmed and lowercased.
 */
export function normalizeTagName(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * URL-safe identity of a tag. Folds accents to ASCII, drops anything else
 * outside ASCII, and collapses every run of non-alphanumerics into one `-`.
 * Returns '' when nothing usable remains.
 */
export function slugifyTagName(raw: string): string {
  return normalizeTagName(raw)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Split a comma separated tag field ("sunset, beach") into trimmed, non-empty names.
 */
export function parseTagInput(input: string | string[] | undefined | null): string[] {
  if (!input) return [];
  const parts = Array.isArray(input) ? input : input.split(',');
  return parts.map(part => part.trim()).filter(Boolean);
}
