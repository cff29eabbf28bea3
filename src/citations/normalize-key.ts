const NON_KEY_CHARS = /[^\p{L}\p{M}\p{N}_\s&]/gu;

/**
 * Year-independent part of a citation key. Punctuation is dropped and
 * whitespace collapsed; case is kept, so "smith" and "Smith" stay distinct.
 */
export function normalizeAuthor(author: string): string {
	return author.replace(NON_KEY_CHARS, "").replace(/\s+/g, " ").trim();
}

/** Identity key shared by citations and references: "<author>|<year>". */
export function normalizeKey(author: string, year: string): string {
	return `${normalizeAuthor(author)}|${year}`;
}
