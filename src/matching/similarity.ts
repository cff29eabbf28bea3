import { distance } from "fuzzball";

/**
 * Normalize text for fuzzy comparison: collapse whitespace, normalize
 * smart quotes, em/en dashes, and non-breaking spaces.
 */
export function normalizeText(text: string): string {
	return (
		text
			// Smart single quotes -> straight
			.replace(/[\u2018\u2019\u201A\u201B]/g, "'")
			// Smart double quotes -> straight
			.replace(/[\u201C\u201D\u201E\u201F]/g, '"')
			// Em-dash and en-dash -> hyphen
			.replace(/[\u2013\u2014]/g, "-")
			// Non-breaking space -> regular space
			.replace(/\u00A0/g, " ")
			// Collapse all whitespace
			.replace(/\s+/g, " ")
			.trim()
	);
}

/**
 * Loose author form used by smart matching and spelling checks:
 * "The Smith and Jones, A." -> "smith & jones a".
 */
export function normalizeAuthorForComparison(author: string): string {
	return author
		.replace(/\band\b/gi, "&")
		.replace(/[.,]/g, "")
		.trim()
		.toLowerCase()
		.replace(/^the\s+/, "");
}

/**
 * Edit similarity on a 0-100 scale, unrounded: (lensum - distance) / lensum
 * with substitutions costing 2. Inputs are compared as given: callers
 * normalize first, so case and punctuation count.
 */
export function similarity(a: string, b: string): number {
	const total = a.length + b.length;
	if (total === 0) return 0;
	const edits = distance(a, b, { full_process: false, subcost: 2 });
	return (100 * (total - edits)) / total;
}

/** Score as reported: one decimal place. */
export function roundScore(score: number): number {
	return Math.round(score * 10) / 10;
}

/**
 * Highest score two strings of these lengths can reach. The edit distance is
 * at least the length difference, which caps the ratio at 2*min/(a+b).
 */
export function similarityUpperBound(lengthA: number, lengthB: number): number {
	const total = lengthA + lengthB;
	return total === 0 ? 0 : (200 * Math.min(lengthA, lengthB)) / total;
}
