export type Severity = "error" | "warning";

export interface MissingReferenceDiagnostic {
	kind: "missing-reference";
	citation: string;
	citationKey: string;
	locations: number[];
}

export interface UnusedReferenceDiagnostic {
	kind: "unused-reference";
	reference: string;
	referenceKey: string;
	paragraph: number;
	text: string;
}

export interface YearMismatchDiagnostic {
	kind: "year-mismatch";
	citation: string;
	citationKey: string;
	citedYear: string;
	referenceYear: string;
	referenceKey: string;
	locations: number[];
}

export interface SpellingMismatchDiagnostic {
	kind: "spelling-mismatch";
	citation: string;
	citationKey: string;
	citedAuthor: string;
	referenceAuthor: string;
	referenceKey: string;
	score: number;
	locations: number[];
}

export interface FormatErrorDiagnostic {
	kind: "format-error";
	citation: string;
	citationKey: string;
	warnings: string[];
	locations: number[];
}

export interface EtAlDiagnostic {
	kind: "et-al";
	severity: Severity;
	citation: string;
	citationKey: string;
	referenceKey: string;
	message: string;
	correctForm: string;
	authorCount: number;
	locations: number[];
}

export interface AbbreviationDiagnostic {
	kind: "abbreviation";
	severity: Severity;
	citation: string;
	referenceKey: string;
	abbreviation: string;
	message: string;
	locations: number[];
}

export interface DuplicateReferenceDiagnostic {
	kind: "duplicate-reference";
	referenceKey: string;
	paragraph: number;
	duplicateOfKey: string;
	duplicateOfParagraph: number;
	text: string;
	score: number;
}

export type Diagnostic =
	| MissingReferenceDiagnostic
	| UnusedReferenceDiagnostic
	| YearMismatchDiagnostic
	| SpellingMismatchDiagnostic
	| FormatErrorDiagnostic
	| EtAlDiagnostic
	| AbbreviationDiagnostic
	| DuplicateReferenceDiagnostic;

export type DiagnosticKind = Diagnostic["kind"];

export type DiagnosticOf<K extends DiagnosticKind> = Extract<Diagnostic, { kind: K }>;
