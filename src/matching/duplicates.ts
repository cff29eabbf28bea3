import { normalizeText, roundScore, similarity, similarityUpperBound } from "./similarity.js";

export interface DuplicateCandidate<Id> {
	id: Id;
	text: string;
}

export interface DuplicateMatch<Id> {
	/** The later entry. */
	id: Id;
	duplicateOf: Id;
	/** First 100 characters of the later entry. */
	text: string;
	score: number;
}

export const DUPLICATE_SCORE_THRESHOLD = 85;
export const MIN_LENGTH_RATIO = 0.6;

function preview(text: string): string {
	return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}

/**
 * Pairwise near-duplicate search over full entry text. Comparing whole entries
 * keeps two different works by the same author in the same year apart.
 * Each pair is reported once, as the later entry duplicating the earlier one.
 */
export function findDuplicates<Id>(candidates: DuplicateCandidate<Id>[]): DuplicateMatch<Id>[] {
	const entries = candidates.map((c) => ({ id: c.id, raw: c.text, text: normalizeText(c.text) }));
	const duplicates: DuplicateMatch<Id>[] = [];

	for (let i = 0; i < entries.length; i++) {
		const a = entries[i];
		if (a.text.length === 0) continue;

		for (let j = i + 1; j < entries.length; j++) {
			const b = entries[j];
			if (b.text.length === 0) continue;

			const shorter = Math.min(a.text.length, b.text.length);
			const longer = Math.max(a.text.length, b.text.length);
			if (shorter / longer < MIN_LENGTH_RATIO) continue;
			if (similarityUpperBound(a.text.length, b.text.length) <= DUPLICATE_SCORE_THRESHOLD) continue;

			const score = similarity(a.text, b.text);
			if (score > DUPLICATE_SCORE_THRESHOLD) {
				duplicates.push({ id: b.id, duplicateOf: a.id, text: preview(b.raw.trim()), score: roundScore(score) });
			}
		}
	}

	return duplicates;
}
