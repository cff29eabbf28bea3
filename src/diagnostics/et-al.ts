import { countAuthors, extractFirstSurname } from "../citations/authors.js";
import type { Citation, Reference } from "../citations/types.js";
import type { EtAlDiagnostic } from "./types.js";

/**
 * One- and two-author works must be cited in full; works with three or more
 * authors may be shortened to "First et al.". At most one finding per pair.
 */
export function checkEtAl(citation: Citation, reference: Reference): EtAlDiagnostic | null {
	const usesEtAl = citation.author.toLowerCase().includes("et al");
	const authorCount = countAuthors(reference.fullAuthor || reference.author);
	const base = {
		kind: "et-al" as const,
		citation: citation.display,
		citationKey: citation.key,
		referenceKey: reference.key,
		authorCount,
		locations: [...citation.locations],
	};

	if (usesEtAl && authorCount <= 2) {
		const correctForm = reference.author;
		const noun = authorCount === 1 ? "author" : "authors";
		return {
			...base,
			severity: "error",
			correctForm,
			message: `Change author per reference - use '${correctForm}', not 'et al.' (reference has only ${authorCount} ${noun})`,
		};
	}

	if (!usesEtAl && authorCount >= 3) {
		const correctForm = `${extractFirstSurname(reference.fullAuthor)} et al.`;
		return {
			...base,
			severity: "warning",
			correctForm,
			message: `Consider using 'et al.' - reference has ${authorCount} authors, the style allows '${correctForm}'`,
		};
	}

	return null;
}
