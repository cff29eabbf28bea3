import type {
	Citation,
	CitationMatch,
	MatchResult,
	Reference,
	SmartMatchRule,
} from "../citations/types.js";
import { normalizeAuthorForComparison } from "./similarity.js";

const SUBSET_STOPWORDS = new Set(["and", "the", "et", "al"]);

function significantWords(normalized: string): Set<string> {
	const words = normalized.match(/\p{L}+/gu) ?? [];
	return new Set(words.filter((w) => w.length >= 2 && !SUBSET_STOPWORDS.has(w)));
}

function firstToken(normalized: string): string {
	return normalized.split(/\s+/)[0] ?? "";
}

/**
 * Heuristic match against every reference of the same year, in table order.
 * The first candidate that satisfies any rule wins; candidates are not ranked
 * against each other.
 */
export function smartMatch(
	citation: Citation,
	references: Map<string, Reference>,
): { referenceKey: string; rule: SmartMatchRule } | null {
	const citeNorm = normalizeAuthorForComparison(citation.author);

	// "National Nurses Association [NNA]" introduces an abbreviation.
	const prefix = citation.author.match(/^(.*?)\s*\[.*?\]/);
	const prefixNorm = prefix ? normalizeAuthorForComparison(prefix[1]) : null;

	const isEtAl = citeNorm.includes("et al");
	const citeFirst = firstToken(citeNorm);
	const citeWords = significantWords(citeNorm);

	for (const [key, reference] of references) {
		if (citation.year && reference.year !== citation.year) continue;

		const refNorm = normalizeAuthorForComparison(reference.fullAuthor || reference.author);

		if (citeNorm === refNorm) {
			return { referenceKey: key, rule: "normalized" };
		}
		if (prefixNorm && prefixNorm === refNorm) {
			return { referenceKey: key, rule: "abbreviation-definition" };
		}
		if (isEtAl && citeFirst && citeFirst === firstToken(refNorm)) {
			return { referenceKey: key, rule: "et-al" };
		}
		if (citeWords.size > 0) {
			const refWords = significantWords(refNorm);
			if ([...citeWords].every((w) => refWords.has(w))) {
				return { referenceKey: key, rule: "word-subset" };
			}
		}
	}

	return null;
}

/** Resolve one citation: exact key, then declared abbreviation, then smart match. */
export function matchCitation(
	citation: Citation,
	references: Map<string, Reference>,
	abbreviations: Map<string, string>,
): CitationMatch | null {
	if (references.has(citation.key)) {
		return { referenceKey: citation.key, strategy: "exact" };
	}

	const viaAbbreviation = abbreviations.get(`${citation.author.trim()}|${citation.year}`);
	if (viaAbbreviation !== undefined) {
		return { referenceKey: viaAbbreviation, strategy: "abbreviation" };
	}

	const smart = smartMatch(citation, references);
	return smart ? { referenceKey: smart.referenceKey, strategy: "smart", rule: smart.rule } : null;
}

export function matchCitations(
	citations: Map<string, Citation>,
	references: Map<string, Reference>,
	abbreviations: Map<string, string>,
): MatchResult {
	const result: MatchResult = {
		pairs: new Map(),
		matchedCitations: new Set(),
		matchedReferences: new Set(),
	};

	for (const [key, citation] of citations) {
		const match = matchCitation(citation, references, abbreviations);
		if (!match) continue;
		result.pairs.set(key, match);
		result.matchedCitations.add(key);
		result.matchedReferences.add(match.referenceKey);
	}

	return result;
}
