const BARE_INITIALS = /^(?:[A-Z]\.(?:-[A-Z]\.)?\s*)*[A-Z]\.?(?:-[A-Z]\.?)?$/;

/**
 * Count the authors in a printed author block such as
 * "Smith, J., Jones, M., & Brown, K.". Segments before the ampersand are
 * surnames once bare initials are discarded; the ampersand adds the last one.
 * Without an ampersand the block is treated as a single author.
 */
export function countAuthors(fullAuthor: string): number {
	if (!fullAuthor.includes("&")) return 1;
	const [leading] = fullAuthor.split("&");
	const surnames = leading
		.split(",")
		.map((segment) => segment.trim())
		.filter((segment) => segment.length > 0 && !BARE_INITIALS.test(segment));
	return surnames.length + 1;
}

/** First surname of an author string, ignoring any "et al." */
export function extractFirstSurname(author: string): string {
	const cleaned = author.trim().replace(/\s*et\s+al\.?\s*/gi, "");
	if (cleaned.includes(",")) {
		return cleaned.split(",")[0].trim();
	}
	return cleaned.split(/\s+/).filter(Boolean)[0] ?? "";
}
