import { BIBLIOGRAPHY_OPEN } from "../extraction/extract.js";
import { CITATION_STYLE_IDS, type CitationStyleId, detectCitationStyle, isCitationStyleId } from "../styles/index.js";

export const AUTO_STYLE = "auto";

export type StyleResolution =
	| { ok: true; style: CitationStyleId; detected: boolean }
	| { ok: false; message: string };

/** Text that precedes the bibliography marker, which is where citations live. */
export function citationSample(paragraphs: readonly string[]): string {
	const end = paragraphs.findIndex((p) => p.includes(BIBLIOGRAPHY_OPEN));
	return (end === -1 ? paragraphs : paragraphs.slice(0, end)).join("\n");
}

export function resolveStyle(requested: string, paragraphs: readonly string[]): StyleResolution {
	const value = requested.trim().toLowerCase();
	if (value === AUTO_STYLE) {
		return { ok: true, style: detectCitationStyle(citationSample(paragraphs)), detected: true };
	}
	if (isCitationStyleId(value)) {
		return { ok: true, style: value, detected: false };
	}
	return {
		ok: false,
		message: `Unknown citation style "${requested}". Expected one of: ${[...CITATION_STYLE_IDS, AUTO_STYLE].join(", ")}`,
	};
}
