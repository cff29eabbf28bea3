import type { Diagnostic, DiagnosticKind, DiagnosticOf } from "../diagnostics/types.js";
import type { NumericOutcome } from "../numeric/process.js";
import type { NumericValidation } from "../numeric/validation.js";
import type { ValidationResult } from "../validate.js";

const RULE = "=".repeat(60);
const DIVIDER = "-".repeat(60);

function ofKind<K extends DiagnosticKind>(diagnostics: readonly Diagnostic[], kind: K): DiagnosticOf<K>[] {
	return diagnostics.filter((d): d is DiagnosticOf<K> => d.kind === kind);
}

function paragraphs(locations: readonly number[]): string {
	return locations.join(", ");
}

function section<T>(lines: string[], title: string, items: readonly T[], render: (item: T) => string[]): void {
	if (items.length === 0) return;
	lines.push("", DIVIDER, title, DIVIDER);
	for (const item of items) {
		lines.push("", ...render(item));
	}
}

/** Plain-text report of a name-year validation run. */
export function renderValidationReport(result: ValidationResult, documentName: string): string {
	const { diagnostics, summary } = result;
	const lines: string[] = [
		`STATUS: Name/Year: ${diagnostics.length} comments`,
		"",
		RULE,
		"CITATION VALIDATION REPORT",
		RULE,
		`Document: ${documentName}`,
		`Style: ${result.styleLabel}`,
		DIVIDER,
		"",
		"SUMMARY:",
		`  Total in-text citations found: ${summary.totalCitations}`,
		`  Total references in bibliography: ${summary.totalReferences}`,
		`  Valid (matched) citations: ${summary.validCount}`,
		`  Missing references: ${summary.counts["missing-reference"]}`,
		`  Unused references: ${summary.counts["unused-reference"]}`,
		`  Format errors: ${summary.counts["format-error"]}`,
		`  Year mismatches: ${summary.counts["year-mismatch"]}`,
		`  Spelling mismatches: ${summary.counts["spelling-mismatch"]}`,
		`  Et al. issues: ${summary.counts["et-al"]}`,
		`  Abbreviation issues: ${summary.counts.abbreviation}`,
		`  Duplicate references: ${summary.counts["duplicate-reference"]}`,
	];

	section(lines, "MISSING REFERENCES (cited but not in bibliography):", ofKind(diagnostics, "missing-reference"), (d) => [
		`  ${d.citation}`,
		`    Cited in paragraph(s): ${paragraphs(d.locations)}`,
	]);
	section(lines, "YEAR MISMATCHES (author matches but year differs):", ofKind(diagnostics, "year-mismatch"), (d) => [
		`  Citation: ${d.citation}`,
		`  Reference year: ${d.referenceYear}`,
		`  Cited in paragraph(s): ${paragraphs(d.locations)}`,
	]);
	section(lines, "SPELLING MISMATCHES (author spelling differs):", ofKind(diagnostics, "spelling-mismatch"), (d) => [
		`  Citation: ${d.citation}`,
		`  Cited author: ${d.citedAuthor}`,
		`  Reference author: ${d.referenceAuthor}`,
		`  Cited in paragraph(s): ${paragraphs(d.locations)}`,
	]);
	section(lines, "ET AL. ISSUES:", ofKind(diagnostics, "et-al"), (d) => [
		`  Citation: ${d.citation} [${d.severity}]`,
		`  Issue: ${d.message}`,
		`  Correct form: ${d.correctForm}`,
		`  Cited in paragraph(s): ${paragraphs(d.locations)}`,
	]);
	section(lines, "ABBREVIATION ISSUES (first vs subsequent usage):", ofKind(diagnostics, "abbreviation"), (d) => [
		`  Citation: ${d.citation} [${d.severity}]`,
		`  Issue: ${d.message}`,
		`  Cited in paragraph(s): ${paragraphs(d.locations)}`,
	]);
	section(lines, "DUPLICATE REFERENCES:", ofKind(diagnostics, "duplicate-reference"), (d) => [
		`  Original: paragraph ${d.duplicateOfParagraph}`,
		`  Duplicate: paragraph ${d.paragraph}`,
		`  Text: ${d.text}`,
		`  Similarity score: ${d.score}%`,
	]);
	section(lines, "FORMAT ERRORS:", ofKind(diagnostics, "format-error"), (d) => [
		`  Citation: ${d.citation}`,
		...d.warnings.map((w) => `    - ${w}`),
		`    Cited in paragraph(s): ${paragraphs(d.locations)}`,
	]);
	section(lines, "UNUSED REFERENCES (in bibliography but never cited):", ofKind(diagnostics, "unused-reference"), (d) => [
		`  ${d.reference}`,
		`    Paragraph: ${d.paragraph}`,
		`    Text: ${d.text}`,
	]);

	if (result.validCitations.length > 0) {
		lines.push("", DIVIDER, "VALID CITATIONS:", DIVIDER);
		lines.push(...result.validCitations.map((c) => `  ${c}`));
	}

	lines.push("", RULE, "END OF REPORT", RULE);
	return lines.join("\n");
}

function list(values: readonly number[]): string {
	return values.length > 0 ? values.join(", ") : "none";
}

function numericBlock(title: string, validation: NumericValidation): string[] {
	return [
		title,
		`  References: ${validation.totalReferences}`,
		`  Citations: ${validation.totalCitations}`,
		`  Missing: ${list(validation.missing)}`,
		`  Unused: ${list(validation.unused)}`,
		`  Sequence issues: ${validation.sequenceIssues.length}`,
		...validation.sequenceIssues.map(
			(s) => `    position ${s.position}: found ${s.current}, expected ${s.expected}`,
		),
		`  Duplicates: ${validation.duplicates.length}`,
		...validation.duplicates.map((d) => `    ${d.id} duplicates ${d.duplicateOf} (${d.score}%)`),
		`  Perfect: ${validation.isPerfect ? "yes" : "no"}`,
	];
}

/** Plain-text report of a numeric renumbering run. */
export function renderNumericReport(outcome: NumericOutcome, documentName: string): string {
	const lines = [
		`STATUS: ${outcome.message}`,
		`Document: ${documentName}`,
		"",
		...numericBlock("VALIDATION BEFORE", outcome.before),
		"",
		...numericBlock("VALIDATION AFTER", outcome.after),
	];

	if (outcome.mapping.size > 0) {
		lines.push("", "RENUMBERING MAPPING (Old -> New)");
		const byNewId = [...outcome.mapping].sort((a, b) => a[1] - b[1]);
		lines.push(...byNewId.map(([from, to]) => `${from} -> ${to}`));
	}

	return lines.join("\n");
}
