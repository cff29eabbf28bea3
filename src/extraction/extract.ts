import { normalizeKey } from "../citations/normalize-key.js";
import type { Citation, Paragraph, Reference } from "../citations/types.js";
import type { CitationStyle, ParsedCitation } from "../styles/types.js";

export const BIBLIOGRAPHY_OPEN = "<ref-open>";
export const BIBLIOGRAPHY_CLOSE = "<ref-close>";

const SNIPPET_LENGTH = 150;

export interface ReferenceTable {
	/** One reference per key; a repeated key keeps the first entry. */
	references: Map<string, Reference>;
	/** Every parsed bibliography entry in document order, repeats included. */
	entries: Reference[];
	/** "<abbr>|<year>" -> reference key */
	abbreviations: Map<string, string>;
}

export interface ExtractedRecords extends ReferenceTable {
	citations: Map<string, Citation>;
}

function citationDisplay(parsed: ParsedCitation): string {
	return parsed.type === "parenthetical"
		? `(${parsed.author}, ${parsed.year})`
		: `${parsed.author} (${parsed.year})`;
}

function snippet(text: string): string {
	return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}...` : text;
}

/**
 * Collect in-text citations up to the bibliography marker. Citations that
 * share a key are merged: the first sighting fixes display, type and raw
 * text, later ones add warnings and locations.
 */
export function extractCitations(
	paragraphs: readonly Paragraph[],
	style: CitationStyle,
): Map<string, Citation> {
	const citations = new Map<string, Citation>();

	for (const paragraph of paragraphs) {
		if (paragraph.text.includes(BIBLIOGRAPHY_OPEN)) break;
		if (!paragraph.text.trim()) continue;

		for (const parsed of style.parseCitations(paragraph.text)) {
			const key = normalizeKey(parsed.author, parsed.year);
			const existing = citations.get(key);
			if (existing) {
				for (const warning of parsed.warnings) {
					if (!existing.warnings.includes(warning)) existing.warnings.push(warning);
				}
				existing.locations.push(paragraph.index);
				continue;
			}
			citations.set(key, {
				key,
				display: citationDisplay(parsed),
				author: parsed.author,
				year: parsed.year,
				type: parsed.type,
				warnings: [...parsed.warnings],
				raw: parsed.raw,
				locations: [paragraph.index],
			});
		}
	}

	return citations;
}

/** Parse the entries strictly between the bibliography markers. */
export function extractReferences(
	paragraphs: readonly Paragraph[],
	style: CitationStyle,
): ReferenceTable {
	const table: ReferenceTable = {
		references: new Map(),
		entries: [],
		abbreviations: new Map(),
	};
	let inBibliography = false;

	for (const paragraph of paragraphs) {
		const text = paragraph.text.trim();
		if (text.includes(BIBLIOGRAPHY_OPEN)) {
			inBibliography = true;
			continue;
		}
		if (text.includes(BIBLIOGRAPHY_CLOSE)) {
			inBibliography = false;
			continue;
		}
		if (!inBibliography || !text) continue;

		const parsed = style.parseReference(text);
		if (!parsed) continue;

		const key = normalizeKey(parsed.author, parsed.year);
		const reference: Reference = {
			key,
			display: `${parsed.author} (${parsed.year})`,
			author: parsed.author,
			fullAuthor: parsed.fullAuthor,
			year: parsed.year,
			abbreviations: parsed.abbreviations,
			paragraph: paragraph.index,
			snippet: snippet(text),
			text,
		};
		table.entries.push(reference);

		if (table.references.has(key)) continue;
		table.references.set(key, reference);
		for (const abbreviation of parsed.abbreviations) {
			table.abbreviations.set(`${abbreviation}|${parsed.year}`, key);
		}
	}

	return table;
}

export function extractRecords(
	paragraphs: readonly Paragraph[],
	style: CitationStyle,
): ExtractedRecords {
	return {
		citations: extractCitations(paragraphs, style),
		...extractReferences(paragraphs, style),
	};
}
