import type { CitationStyle, ParsedReference } from "./types.js";
import { parseAuthorYearGroups } from "./vancouver.js";

const REFERENCE = /^([A-Z][^.]+?)\.\s*(\d{4})\.\s*/;

export const chicagoStyle: CitationStyle = {
	id: "chicago",
	label: "Chicago (Author-Year)",

	parseCitations: parseAuthorYearGroups,

	/** "Smith, John. 2020. Title of Book. Publisher." */
	parseReference(text: string): ParsedReference | null {
		const match = text.match(REFERENCE);
		if (!match) return null;

		const fullAuthor = match[1].trim();
		const parts = fullAuthor.split(",");
		let author = fullAuthor;
		if (parts.length >= 3) {
			author = `${parts[0].trim()} et al.`;
		} else if (parts.length === 2) {
			author = parts[0].trim();
		}

		return { author, fullAuthor, year: match[2], abbreviations: [] };
	},
};
