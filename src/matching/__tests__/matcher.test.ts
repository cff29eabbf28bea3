import { describe, expect, it } from "vitest";
import { normalizeKey } from "../../citations/normalize-key.js";
import type { Citation, Reference } from "../../citations/types.js";
import { matchCitation, matchCitations, smartMatch } from "../matcher.js";

function citation(author: string, year: string): Citation {
	return {
		key: normalizeKey(author, year),
		display: `(${author}, ${year})`,
		author,
		year,
		type: "parenthetical",
		warnings: [],
		raw: `(${author}, ${year})`,
		locations: [1],
	};
}

function reference(author: string, fullAuthor: string, year: string, abbreviations: string[] = []): Reference {
	return {
		key: normalizeKey(author, year),
		display: `${author} (${year})`,
		author,
		fullAuthor,
		year,
		abbreviations,
		paragraph: 10,
		snippet: `${fullAuthor} (${year}).`,
		text: `${fullAuthor} (${year}).`,
	};
}

function table(...references: Reference[]): Map<string, Reference> {
	return new Map(references.map((r) => [r.key, r]));
}

describe("matchCitation cascade", () => {
	it("prefers the exact key over any abbreviation or smart rule", () => {
		const who = reference("World Health Organization", "World Health Organization [WHO].", "2020", ["WHO"]);
		const smith = reference("Smith", "Smith, J.", "2020");
		const abbreviations = new Map([["WHO|2020", who.key]]);

		expect(matchCitation(citation("Smith", "2020"), table(who, smith), abbreviations)).toEqual({
			referenceKey: "Smith|2020",
			strategy: "exact",
		});
	});

	it("resolves a declared abbreviation", () => {
		const who = reference("World Health Organization", "World Health Organization [WHO].", "2020", ["WHO"]);
		const abbreviations = new Map([["WHO|2020", who.key]]);

		expect(matchCitation(citation("WHO", "2020"), table(who), abbreviations)).toEqual({
			referenceKey: "World Health Organization|2020",
			strategy: "abbreviation",
		});
	});

	it("falls through to smart matching", () => {
		const cochrane = reference("Cochrane Collaboration", "Cochrane Collaboration.", "2020");
		expect(matchCitation(citation("The Cochrane Collaboration", "2020"), table(cochrane), new Map())).toEqual({
			referenceKey: "Cochrane Collaboration|2020",
			strategy: "smart",
			rule: "normalized",
		});
	});

	it("returns null when nothing matches", () => {
		const smith = reference("Smith", "Smith, J.", "2020");
		expect(matchCitation(citation("Jones", "2020"), table(smith), new Map())).toBeNull();
	});
});

describe("smartMatch rules", () => {
	it("matches an abbreviation definition against the full author", () => {
		const nsf = reference("National Sleep Foundation", "National Sleep Foundation", "2018", ["NSF"]);
		expect(smartMatch(citation("National Sleep Foundation [NSF]", "2018"), table(nsf))).toEqual({
			referenceKey: "National Sleep Foundation|2018",
			rule: "abbreviation-definition",
		});
	});

	it("matches et al. on the first surname", () => {
		const smith = reference("Smith", "Smith, J., Jones, M., & Brown, K.", "2021");
		expect(smartMatch(citation("Smith et al.", "2021"), table(smith))).toEqual({
			referenceKey: "Smith|2021",
			rule: "et-al",
		});
	});

	it("matches when every significant citation word appears in the reference", () => {
		const pair = reference("Smith & Jones", "Smith, J., & Jones, M.", "2020");
		expect(smartMatch(citation("Smith and Jones", "2020"), table(pair))).toEqual({
			referenceKey: "Smith & Jones|2020",
			rule: "word-subset",
		});
	});

	it("requires the same year", () => {
		const smith = reference("Smith", "Smith, J., Jones, M., & Brown, K.", "2021");
		expect(smartMatch(citation("Smith et al.", "2022"), table(smith))).toBeNull();
	});

	it("ignores the year when the citation has none", () => {
		const smith = reference("Smith", "Smith, J., Jones, M., & Brown, K.", "2021");
		expect(smartMatch(citation("Smith et al.", ""), table(smith))?.referenceKey).toBe("Smith|2021");
	});

	it("takes the first candidate that satisfies any rule", () => {
		const first = reference("Smith", "Smith, J., Jones, M., & Lee, K.", "2020");
		const second = reference("Smith et al", "Smith et al.", "2020");
		// The second candidate is an exact normalized match, but table order decides.
		expect(smartMatch(citation("Smith et al.", "2020"), table(first, second))).toEqual({
			referenceKey: "Smith|2020",
			rule: "et-al",
		});
	});
});

describe("matchCitations", () => {
	it("lets several citations resolve to one reference", () => {
		const smith = reference("Smith", "Smith, J., Jones, M., & Brown, K.", "2021");
		const citations = new Map(
			[citation("Smith", "2021"), citation("Smith et al.", "2021"), citation("Jones", "2019")].map(
				(c) => [c.key, c] as const,
			),
		);

		const result = matchCitations(citations, table(smith), new Map());
		expect([...result.pairs.keys()]).toEqual(["Smith|2021", "Smith et al|2021"]);
		expect([...result.matchedCitations]).toEqual(["Smith|2021", "Smith et al|2021"]);
		expect([...result.matchedReferences]).toEqual(["Smith|2021"]);
	});
});
