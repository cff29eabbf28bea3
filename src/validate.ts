import type { Citation, MatchResult, Paragraph, Reference } from "./citations/types.js";
import { diagnose } from "./diagnostics/engine.js";
import type { Diagnostic, DiagnosticKind } from "./diagnostics/types.js";
import { extractRecords } from "./extraction/extract.js";
import { matchCitations } from "./matching/matcher.js";
import type { CitationStyle, CitationStyleId } from "./styles/types.js";

export type DiagnosticCounts = Record<DiagnosticKind, number>;

export interface ValidationSummary {
	totalCitations: number;
	totalReferences: number;
	validCount: number;
	counts: DiagnosticCounts;
}

export interface ValidationResult {
	style: CitationStyleId;
	styleLabel: string;
	citations: Citation[];
	references: Reference[];
	match: MatchResult;
	/** Displays of matched citations, sorted. */
	validCitations: string[];
	diagnostics: Diagnostic[];
	summary: ValidationSummary;
}

export function countDiagnostics(diagnostics: readonly Diagnostic[]): DiagnosticCounts {
	const counts: DiagnosticCounts = {
		"missing-reference": 0,
		"unused-reference": 0,
		"year-mismatch": 0,
		"spelling-mismatch": 0,
		"format-error": 0,
		"et-al": 0,
		abbreviation: 0,
		"duplicate-reference": 0,
	};
	for (const diagnostic of diagnostics) {
		counts[diagnostic.kind]++;
	}
	return counts;
}

/**
 * Check a name-year manuscript: extract citations and references with the
 * given style, resolve citations, and derive diagnostics. Findings are
 * reported in the result; nothing is thrown for well-formed input.
 */
export function validate(paragraphs: readonly Paragraph[], style: CitationStyle): ValidationResult {
	const records = extractRecords(paragraphs, style);
	const match = matchCitations(records.citations, records.references, records.abbreviations);
	const diagnostics = diagnose(records, match);

	const citations = [...records.citations.values()];
	const validCitations = citations
		.filter((c) => match.matchedCitations.has(c.key))
		.map((c) => c.display)
		.sort();

	return {
		style: style.id,
		styleLabel: style.label,
		citations,
		references: [...records.references.values()],
		match,
		validCitations,
		diagnostics,
		summary: {
			totalCitations: records.citations.size,
			totalReferences: records.references.size,
			validCount: match.matchedCitations.size,
			counts: countDiagnostics(diagnostics),
		},
	};
}

/** Number plain paragraph strings from 1, the way reports refer to them. */
export function toParagraphs(texts: readonly string[]): Paragraph[] {
	return texts.map((text, i) => ({ index: i + 1, text }));
}
