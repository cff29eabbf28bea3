import { describe, expect, it } from "vitest";
import { apaStyle } from "../../styles/apa.js";
import { toParagraphs } from "../../validate.js";
import { extractCitations, extractRecords, extractReferences } from "../extract.js";

const manuscript = toParagraphs([
	"Smith (2019) showed the effect.",
	"",
	"Later work agreed (Smith, 2019).",
	"<ref-open>",
	"Smith, J. (2019). Effects of sleep. Journal of Rest, 4(2), 45-51.",
	"World Health Organization [WHO]. (2020). Global report.",
	"Smith, J. (2019). Effects of sleep. Journal of Rest, 4(2), 45-52.",
	"<ref-close>",
	"Appendix (Jones, 2020) notes.",
]);

describe("extractCitations", () => {
	it("merges repeated keys and records every paragraph", () => {
		const citations = extractCitations(manuscript, apaStyle);
		expect([...citations.keys()]).toEqual(["Smith|2019"]);

		const smith = citations.get("Smith|2019");
		expect(smith?.display).toBe("Smith (2019)");
		expect(smith?.type).toBe("narrative");
		expect(smith?.locations).toEqual([1, 3]);
	});

	it("stops at the bibliography marker", () => {
		const citations = extractCitations(manuscript, apaStyle);
		expect(citations.has("Jones|2020")).toBe(false);
	});
});

describe("extractReferences", () => {
	it("reads only between the markers and keeps the first of a repeated key", () => {
		const table = extractReferences(manuscript, apaStyle);
		expect([...table.references.keys()]).toEqual(["Smith|2019", "World Health Organization|2020"]);
		expect(table.entries.map((e) => e.paragraph)).toEqual([5, 6, 7]);
		expect(table.references.get("Smith|2019")?.paragraph).toBe(5);
	});

	it("indexes abbreviations by year", () => {
		const table = extractReferences(manuscript, apaStyle);
		expect(table.abbreviations.get("WHO|2020")).toBe("World Health Organization|2020");
	});

	it("builds display and snippet", () => {
		const reference = extractReferences(manuscript, apaStyle).references.get("Smith|2019");
		expect(reference?.display).toBe("Smith (2019)");
		expect(reference?.snippet).toBe("Smith, J. (2019). Effects of sleep. Journal of Rest, 4(2), 45-51.");
	});

	it("truncates long snippets to 150 characters", () => {
		const long = `Smith, J. (2019). ${"A very long title. ".repeat(10)}`;
		const table = extractReferences(toParagraphs(["<ref-open>", long, "<ref-close>"]), apaStyle);
		const snippet = table.entries[0].snippet;
		expect(snippet).toBe(`${long.trim().slice(0, 150)}...`);
	});
});

describe("extractRecords", () => {
	it("returns citations and the reference table together", () => {
		const records = extractRecords(manuscript, apaStyle);
		expect(records.citations.size).toBe(1);
		expect(records.references.size).toBe(2);
		expect(records.entries).toHaveLength(3);
	});
});
