import { normalizeAuthor } from "../citations/normalize-key.js";
import type { Citation, MatchResult, Reference } from "../citations/types.js";
import type { ExtractedRecords } from "../extraction/extract.js";
import { findDuplicates } from "../matching/duplicates.js";
import { normalizeAuthorForComparison, roundScore, similarity } from "../matching/similarity.js";
import { checkAbbreviationUsage } from "./abbreviations.js";
import { checkEtAl } from "./et-al.js";
import type {
	Diagnostic,
	DuplicateReferenceDiagnostic,
	SpellingMismatchDiagnostic,
	UnusedReferenceDiagnostic,
	YearMismatchDiagnostic,
} from "./types.js";

export const SPELLING_SCORE_THRESHOLD = 80;

export function findYearMismatch(
	citation: Citation,
	references: Map<string, Reference>,
): YearMismatchDiagnostic | null {
	const author = normalizeAuthor(citation.author);
	for (const reference of references.values()) {
		if (normalizeAuthor(reference.author) !== author || reference.year === citation.year) continue;
		return {
			kind: "year-mismatch",
			citation: citation.display,
			citationKey: citation.key,
			citedYear: citation.year,
			referenceYear: reference.year,
			referenceKey: reference.key,
			locations: [...citation.locations],
		};
	}
	return null;
}

/** Closest reference author above the threshold; ties keep the earlier reference. */
export function findSpellingMismatch(
	citation: Citation,
	references: Map<string, Reference>,
): SpellingMismatchDiagnostic | null {
	const cited = normalizeAuthorForComparison(citation.author);
	let best: Reference | null = null;
	let bestScore = 0;

	for (const reference of references.values()) {
		const score = similarity(cited, normalizeAuthorForComparison(reference.author));
		if (score > SPELLING_SCORE_THRESHOLD && score > bestScore) {
			best = reference;
			bestScore = score;
		}
	}

	if (!best) return null;
	return {
		kind: "spelling-mismatch",
		citation: citation.display,
		citationKey: citation.key,
		citedAuthor: citation.author,
		referenceAuthor: best.author,
		referenceKey: best.key,
		score: roundScore(bestScore),
		locations: [...citation.locations],
	};
}

export function findDuplicateReferences(entries: Reference[]): DuplicateReferenceDiagnostic[] {
	const candidates = entries.map((entry, index) => ({ id: index, text: entry.text }));
	return findDuplicates(candidates).map((duplicate): DuplicateReferenceDiagnostic => {
		const entry = entries[duplicate.id];
		const original = entries[duplicate.duplicateOf];
		return {
			kind: "duplicate-reference",
			referenceKey: entry.key,
			paragraph: entry.paragraph,
			duplicateOfKey: original.key,
			duplicateOfParagraph: original.paragraph,
			text: duplicate.text,
			score: duplicate.score,
		};
	});
}

/**
 * Derive every finding for one validation pass. Order is fixed: per-citation
 * findings in citation order, then abbreviation usage, unused references and
 * duplicates, so repeated runs over the same records produce the same list.
 */
export function diagnose(records: ExtractedRecords, match: MatchResult): Diagnostic[] {
	const { citations, references } = records;
	const diagnostics: Diagnostic[] = [];
	const explained = new Set<string>();

	for (const [key, citation] of citations) {
		const pair = match.pairs.get(key);
		const reference = pair ? references.get(pair.referenceKey) : undefined;

		if (reference) {
			const etAl = checkEtAl(citation, reference);
			if (etAl) diagnostics.push(etAl);
		} else {
			const resolution =
				findYearMismatch(citation, references) ?? findSpellingMismatch(citation, references);
			if (resolution) {
				explained.add(resolution.referenceKey);
				diagnostics.push(resolution);
			} else {
				diagnostics.push({
					kind: "missing-reference",
					citation: citation.display,
					citationKey: key,
					locations: [...citation.locations],
				});
			}
		}

		if (citation.warnings.length > 0) {
			diagnostics.push({
				kind: "format-error",
				citation: citation.display,
				citationKey: key,
				warnings: [...citation.warnings],
				locations: [...citation.locations],
			});
		}
	}

	diagnostics.push(...checkAbbreviationUsage(match, citations, references));

	for (const [key, reference] of references) {
		if (match.matchedReferences.has(key) || explained.has(key)) continue;
		const unused: UnusedReferenceDiagnostic = {
			kind: "unused-reference",
			reference: reference.display,
			referenceKey: key,
			paragraph: reference.paragraph,
			text: reference.snippet,
		};
		diagnostics.push(unused);
	}

	diagnostics.push(...findDuplicateReferences(records.entries));
	return diagnostics;
}
