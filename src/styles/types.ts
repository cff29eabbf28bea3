import type { CitationType } from "../citations/types.js";

export const CITATION_STYLE_IDS = ["apa", "vancouver", "chicago"] as const;

export type CitationStyleId = (typeof CITATION_STYLE_IDS)[number];

export interface ParsedCitation {
	author: string;
	year: string;
	type: CitationType;
	warnings: string[];
	raw: string;
}

export interface ParsedReference {
	author: string;
	fullAuthor: string;
	year: string;
	abbreviations: string[];
}

/** Grammar of one name-year citation style. */
export interface CitationStyle {
	readonly id: CitationStyleId;
	readonly label: string;
	parseCitations(text: string): ParsedCitation[];
	parseReference(text: string): ParsedReference | null;
}
