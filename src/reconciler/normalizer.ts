/**
 * Text normalization for title/author comparison
 */

/**
 * Lowercase, replace anything outside [a-z0-9 ] with a space, collapse whitespace.
 * Accented letters are not folded; they become separators like any other symbol.
 */
export function normalize(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .toLowerCase()
    .replace(/[^a-z0-9 ]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function identityKey(title: string | null | undefined, author: string | null | undefined): string {
  return `${normalize(title)}|${normalize(author)}`;
}

export function isIdentityEquivalent(
  a: { title: string; author: string },
  b: { title: string; author: string },
): boolean {
  return identityKey(a.title, a.author) === identityKey(b.title, b.author);
}

export function wordSet(text: string): Set<string> {
  const normalized = normalize(text);
  return new Set(normalized ? normalized.split(' ') : []);
}
