export type CitationType = "parenthetical" | "narrative";

/** An input paragraph: the caller's index plus its plain text. */
export interface Paragraph {
	index: number;
	text: string;
}

/** A distinct in-text citation, merged across every paragraph that cites it. */
export interface Citation {
	key: string;
	display: string;
	author: string;
	year: string;
	type: CitationType;
	warnings: string[];
	raw: string;
	locations: number[];
}

export interface Reference {
	key: string;
	/** "Smith & Jones (2020)" */
	display: string;
	/** Short display form, e.g. "Smith & Jones". */
	author: string;
	/** Author block as printed in the bibliography. */
	fullAuthor: string;
	year: string;
	abbreviations: string[];
	paragraph: number;
	/** First 150 characters of the entry, with "..." when truncated. */
	snippet: string;
	text: string;
}

export type MatchStrategy = "exact" | "abbreviation" | "smart";
export type SmartMatchRule = "normalized" | "abbreviation-definition" | "et-al" | "word-subset";

export interface CitationMatch {
	referenceKey: string;
	strategy: MatchStrategy;
	rule?: SmartMatchRule;
}

export interface MatchResult {
	pairs: Map<string, CitationMatch>;
	matchedCitations: Set<string>;
	matchedReferences: Set<string>;
}
