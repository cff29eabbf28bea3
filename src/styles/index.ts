import { apaStyle } from "./apa.js";
import { chicagoStyle } from "./chicago.js";
import { CITATION_STYLE_IDS, type CitationStyle, type CitationStyleId } from "./types.js";
import { vancouverStyle } from "./vancouver.js";

export { CITATION_STYLE_IDS };
export type { CitationStyle, CitationStyleId, ParsedCitation, ParsedReference } from "./types.js";

export const CITATION_STYLES = {
	apa: apaStyle,
	vancouver: vancouverStyle,
	chicago: chicagoStyle,
} as const satisfies Record<CitationStyleId, CitationStyle>;

export function isCitationStyleId(value: string): value is CitationStyleId {
	return Object.hasOwn(CITATION_STYLES, value);
}

export function getCitationStyle(id: CitationStyleId): CitationStyle {
	return CITATION_STYLES[id];
}

const APA_SAMPLE = /\([A-Z][a-z]+,\s*\d{4}\)/g;
const AUTHOR_YEAR_SAMPLE = /\([A-Z][a-z]+\s+\d{4}\)/g;

/**
 * Guess the style from a text sample. APA puts a comma before the year;
 * Vancouver and Chicago do not and are indistinguishable here, so the tie
 * goes to Vancouver. Falls back to APA when neither form appears.
 */
export function detectCitationStyle(sample: string): CitationStyleId {
	const apa = sample.match(APA_SAMPLE)?.length ?? 0;
	const authorYear = sample.match(AUTHOR_YEAR_SAMPLE)?.length ?? 0;

	if (apa > authorYear) return "apa";
	if (authorYear > 0) return "vancouver";
	return "apa";
}
