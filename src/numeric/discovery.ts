import type { NumericDocument, NumericParagraph, StyledSpan } from "./document.js";
import { orderedParagraphs, paragraphText } from "./document.js";
import { getNumbers } from "./numbers.js";

export interface NumericStyleNames {
	/** Character style of an in-text citation. */
	citation: string;
	/** Paragraph style of a bibliography entry. */
	bibliography: string;
	/** Character style of the number inside a bibliography entry. */
	bibNumber: string;
}

export const DEFAULT_STYLE_NAMES: NumericStyleNames = {
	citation: "cite_bib",
	bibliography: "REF-N",
	bibNumber: "bib_number",
};

/** A character range inside one span. */
export interface SpanRange {
	spanIndex: number;
	start: number;
	end: number;
}

export type OccurrenceSource =
	| { kind: "styled"; spanIndexes: number[] }
	| { kind: "marker"; range: SpanRange };

export interface CitationOccurrence {
	numbers: number[];
	paragraphId: string;
	/** Position of the paragraph in reading order. */
	paragraph: number;
	source: OccurrenceSource;
}

export interface BibEntry {
	id: number;
	paragraphId: string;
	paragraph: number;
	/** Where the id is written; null when it cannot be located in a single span. */
	idSpan: SpanRange | null;
	text: string;
}

export interface Discovery {
	/** Every cited number in reading order, repeats kept. */
	allCited: number[];
	/** Distinct cited numbers in order of first appearance. */
	appearanceOrder: number[];
	bibIds: Set<number>;
	occurrences: CitationOccurrence[];
	entries: BibEntry[];
}

const CITATION_TEXT = /^[\d,\-–—\s]+$/;
const CARET_MARKER = /\^([\d,\-–—\s]+)\^/g;

export function isCitationSpan(span: StyledSpan, names: NumericStyleNames): boolean {
	if (span.style === names.citation) return true;
	if (!span.superscript) return false;
	const text = span.text.trim();
	return text.length > 0 && CITATION_TEXT.test(text);
}

function firstDigitRun(text: string): { start: number; end: number } | null {
	const match = text.match(/\d+/);
	if (!match || match.index === undefined) return null;
	return { start: match.index, end: match.index + match[0].length };
}

/** Locate the id of a bibliography paragraph: a numbered span first, else the leading integer. */
function readBibEntry(
	paragraph: NumericParagraph,
	position: number,
	names: NumericStyleNames,
): BibEntry | null {
	const text = paragraphText(paragraph);

	for (const [spanIndex, span] of paragraph.spans.entries()) {
		if (span.style !== names.bibNumber) continue;
		const numbers = getNumbers(span.text);
		const run = firstDigitRun(span.text);
		if (numbers.length === 0 || !run) continue;
		return {
			id: numbers[0],
			paragraphId: paragraph.id,
			paragraph: position,
			idSpan: { spanIndex, ...run },
			text,
		};
	}

	const leading = text.trim().match(/^(\d+)/);
	if (!leading) return null;

	let idSpan: SpanRange | null = null;
	const spanIndex = paragraph.spans.findIndex((span) => span.text.trim().length > 0);
	if (spanIndex !== -1) {
		const spanText = paragraph.spans[spanIndex].text;
		const run = firstDigitRun(spanText);
		if (run && spanText.slice(0, run.start).trim() === "" && spanText.slice(run.start, run.end) === leading[1]) {
			idSpan = { spanIndex, ...run };
		}
	}

	return {
		id: Number.parseInt(leading[1], 10),
		paragraphId: paragraph.id,
		paragraph: position,
		idSpan,
		text,
	};
}

/**
 * First pass over the document in reading order. Contiguous citation spans
 * are read as one group; other spans are searched for "^1-3^" markers.
 * Bibliography paragraphs are read for entry ids only.
 */
export function discover(
	document: NumericDocument,
	names: NumericStyleNames = DEFAULT_STYLE_NAMES,
): Discovery {
	const discovery: Discovery = {
		allCited: [],
		appearanceOrder: [],
		bibIds: new Set(),
		occurrences: [],
		entries: [],
	};
	const seen = new Set<number>();

	const record = (paragraph: NumericParagraph, position: number, text: string, source: OccurrenceSource) => {
		const numbers = getNumbers(text);
		if (numbers.length === 0) return;
		discovery.occurrences.push({ numbers, paragraphId: paragraph.id, paragraph: position, source });
		for (const n of numbers) {
			discovery.allCited.push(n);
			if (!seen.has(n)) {
				seen.add(n);
				discovery.appearanceOrder.push(n);
			}
		}
	};

	for (const [position, paragraph] of orderedParagraphs(document).entries()) {
		if (paragraph.style === names.bibliography) {
			const entry = readBibEntry(paragraph, position, names);
			if (entry) {
				discovery.entries.push(entry);
				discovery.bibIds.add(entry.id);
			}
			continue;
		}

		let group: number[] = [];
		const flush = () => {
			if (group.length === 0) return;
			const text = group.map((i) => paragraph.spans[i].text).join("");
			record(paragraph, position, text, { kind: "styled", spanIndexes: group });
			group = [];
		};

		for (const [spanIndex, span] of paragraph.spans.entries()) {
			if (isCitationSpan(span, names)) {
				group.push(spanIndex);
				continue;
			}
			flush();
			for (const marker of span.text.matchAll(CARET_MARKER)) {
				const start = (marker.index ?? 0) + 1;
				record(paragraph, position, marker[1], {
					kind: "marker",
					range: { spanIndex, start, end: start + marker[1].length },
				});
			}
		}
		flush();
	}

	return discovery;
}
