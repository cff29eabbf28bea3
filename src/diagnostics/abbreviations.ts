import type { Citation, MatchResult, Reference } from "../citations/types.js";
import type { AbbreviationDiagnostic } from "./types.js";

export interface AbbreviationUsage {
	location: number;
	text: string;
	isIntroduction: boolean;
	isAbbreviationForm: boolean;
	isFullForm: boolean;
}

/** Printed author without any "[ABBR]" or "(ABBR)" group. */
function fullName(reference: Reference): string {
	return reference.fullAuthor
		.replace(/\s*[[(][^\])]+[\])]\s*/g, " ")
		.replace(/[.,]+$/, "")
		.trim();
}

function classifyUsage(citation: Citation, reference: Reference) {
	const author = citation.author.trim();
	const isIntroduction = author.includes("[");
	if (isIntroduction) {
		return { isIntroduction, isAbbreviationForm: false, isFullForm: true };
	}
	const name = fullName(reference).toLowerCase();
	return {
		isIntroduction,
		isAbbreviationForm: reference.abbreviations.includes(author),
		isFullForm: name.length > 0 && author.toLowerCase().startsWith(name),
	};
}

/**
 * Usage events per reference that owns abbreviations, ordered by location.
 * A citation cited in several paragraphs contributes one event per paragraph.
 */
export function collectAbbreviationUsage(
	match: MatchResult,
	citations: Map<string, Citation>,
	references: Map<string, Reference>,
): Map<string, AbbreviationUsage[]> {
	const usage = new Map<string, AbbreviationUsage[]>();

	for (const [citationKey, { referenceKey }] of match.pairs) {
		const citation = citations.get(citationKey);
		const reference = references.get(referenceKey);
		if (!citation || !reference || reference.abbreviations.length === 0) continue;

		const form = classifyUsage(citation, reference);
		const events = usage.get(referenceKey) ?? [];
		for (const location of citation.locations) {
			events.push({ location, text: citation.display, ...form });
		}
		usage.set(referenceKey, events);
	}

	for (const events of usage.values()) {
		events.sort((a, b) => a.location - b.location);
	}
	return usage;
}

/**
 * The first mention of an abbreviated source must introduce it as
 * "Full Name [ABBR]". After that, re-introducing it is an error and falling
 * back to the full name is a warning.
 */
export function checkAbbreviationUsage(
	match: MatchResult,
	citations: Map<string, Citation>,
	references: Map<string, Reference>,
): AbbreviationDiagnostic[] {
	const diagnostics: AbbreviationDiagnostic[] = [];

	for (const [referenceKey, events] of collectAbbreviationUsage(match, citations, references)) {
		const reference = references.get(referenceKey);
		if (!reference || events.length === 0) continue;

		const abbreviation = reference.abbreviations[0];
		const [first, ...rest] = events;

		if (!first.isIntroduction) {
			const expected = `${fullName(reference)} [${abbreviation}]`;
			diagnostics.push({
				kind: "abbreviation",
				severity: "error",
				citation: first.text,
				referenceKey,
				abbreviation,
				message: `First mention should define the abbreviation. Use '${expected}' instead of '${first.text}'.`,
				locations: [first.location],
			});
		}

		for (const event of rest) {
			if (event.isIntroduction) {
				diagnostics.push({
					kind: "abbreviation",
					severity: "error",
					citation: event.text,
					referenceKey,
					abbreviation,
					message: `Abbreviation already introduced. Use '${abbreviation}' instead.`,
					locations: [event.location],
				});
			} else if (event.isFullForm && !event.isAbbreviationForm) {
				diagnostics.push({
					kind: "abbreviation",
					severity: "warning",
					citation: event.text,
					referenceKey,
					abbreviation,
					message: `Abbreviation previously introduced. Consider using '${abbreviation}' instead.`,
					locations: [event.location],
				});
			}
		}
	}

	return diagnostics;
}
