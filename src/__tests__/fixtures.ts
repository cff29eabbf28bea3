import type { NumericParagraph } from "../numeric/document.js";

/** Two citations, two references: one match, one missing, one unused. */
export const SCENARIO = [
	"Smith (2019) showed the effect.",
	"Jones (2020) disagreed.",
	"<ref-open>",
	"Smith, J. (2019). Effects of sleep. Journal of Rest, 4(2), 45-51.",
	"Brown, K. (2020). Sleep and memory. Memory Studies, 8(1), 1-10.",
	"<ref-close>",
];

/** Cites 3, then 1 and 3, then 2 in a caret marker; entries 1-3 in numeric order. */
export function outOfOrderParagraphs(): NumericParagraph[] {
	return [
		{ id: "p1", spans: [{ text: "Sleep helps memory." }, { text: "3", style: "cite_bib" }] },
		{
			id: "p2",
			spans: [
				{ text: "It also helps mood." },
				{ text: "1", style: "cite_bib" },
				{ text: ",", style: "cite_bib" },
				{ text: "3", style: "cite_bib" },
			],
		},
		{ id: "p3", spans: [{ text: "See also ^2^ for details." }] },
		{
			id: "b1",
			style: "REF-N",
			spans: [{ text: "1", style: "bib_number" }, { text: ". Brown K. Mood and sleep. 2019." }],
		},
		{ id: "b2", style: "REF-N", spans: [{ text: "2. Lee M. Dreams explained. 2018." }] },
		{
			id: "b3",
			style: "REF-N",
			spans: [{ text: "3", style: "bib_number" }, { text: ". Smith J. Memory consolidation. 2020." }],
		},
	];
}

export function citing(id: string, numbers: string): NumericParagraph {
	return { id, spans: [{ text: "Text." }, { text: numbers, style: "cite_bib" }] };
}

export function entry(id: string, text: string): NumericParagraph {
	return { id, style: "REF-N", spans: [{ text }] };
}
