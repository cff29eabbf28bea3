import { logger } from "../logger.js";
import { DEFAULT_STYLE_NAMES, type NumericStyleNames, discover } from "./discovery.js";
import { type MutationOperation, type NumericDocument, applyMutationPlan } from "./document.js";
import { type GateStatus, type RenumberMapping, renumber } from "./renumber.js";
import { type NumericValidation, validateNumbering } from "./validation.js";

export const STATUS_ABORTED_UNUSED = "Aborted: Document validation failed due to unused references.";
export const STATUS_ABORTED_MISSING = "Aborted: Missing references detected.";
export const STATUS_VALIDATED = "Validation completed.";
export const STATUS_RENUMBERED = "Renumbering completed successfully.";

export interface NumericOutcome {
	gate: GateStatus;
	/** True when at least one id moved to a different number. */
	changed: boolean;
	message: string;
	mapping: RenumberMapping;
	plan: MutationOperation[];
	before: NumericValidation;
	after: NumericValidation;
	/** The renumbered copy, or the input itself when nothing was applied. */
	document: NumericDocument;
}

function statusMessage(gate: GateStatus, changed: boolean, duplicates: number): string {
	switch (gate) {
		case "aborted-unused":
			return STATUS_ABORTED_UNUSED;
		case "aborted-missing":
			return STATUS_ABORTED_MISSING;
		case "perfect":
			return STATUS_VALIDATED;
		case "ready":
			if (duplicates > 0) {
				const prefix = changed ? "Renumbering" : "Validation";
				return `${prefix} completed with ${duplicates} duplicate${duplicates > 1 ? "s" : ""}.`;
			}
			return changed ? STATUS_RENUMBERED : STATUS_VALIDATED;
	}
}

/**
 * Validate, gate, renumber and re-validate a numeral-style document. The
 * caller's document is never modified; the renumbered version is returned
 * as a new arena.
 */
export function processNumericDocument(
	document: NumericDocument,
	names: NumericStyleNames = DEFAULT_STYLE_NAMES,
): NumericOutcome {
	const result = renumber(document, names);
	const before = result.validation;
	const changed = [...result.mapping].some(([from, to]) => from !== to);

	let applied = document;
	let after = before;
	if (result.status === "ready") {
		applied = applyMutationPlan(document, result.plan);
		after = validateNumbering(discover(applied, names));
	}

	const message = statusMessage(result.status, changed, before.duplicates.length);
	logger.info(message);

	return {
		gate: result.status,
		changed,
		message,
		mapping: result.mapping,
		plan: result.plan,
		before,
		after,
		document: applied,
	};
}
