import { logger } from "../logger.js";
import {
	type BibEntry,
	type Discovery,
	DEFAULT_STYLE_NAMES,
	type NumericStyleNames,
	type SpanRange,
	discover,
} from "./discovery.js";
import { type MutationOperation, type NumericDocument, getParagraph } from "./document.js";
import { formatNumbers } from "./numbers.js";
import { type NumericValidation, validateNumbering } from "./validation.js";

export type GateStatus = "ready" | "perfect" | "aborted-unused" | "aborted-missing";

export type RenumberMapping = Map<number, number>;

export interface RenumberResult {
	status: GateStatus;
	mapping: RenumberMapping;
	plan: MutationOperation[];
	validation: NumericValidation;
}

/**
 * Renumbering is only safe when every cited id has an entry and every entry
 * is cited. Unused entries are checked first: dropping or renumbering them
 * would be a guess.
 */
export function evaluateGate(validation: NumericValidation): GateStatus {
	if (validation.unused.length > 0) return "aborted-unused";
	if (validation.isPerfect) return "perfect";
	if (validation.missing.length > 0) return "aborted-missing";
	return "ready";
}

/** Sequential ids from 1 in order of first appearance; repeats take no new slot. */
export function buildMapping(appearanceOrder: Iterable<number>): RenumberMapping {
	const mapping: RenumberMapping = new Map();
	for (const id of appearanceOrder) {
		if (!mapping.has(id)) mapping.set(id, mapping.size + 1);
	}
	return mapping;
}

/**
 * New reading order with every entry paragraph pulled out and put back where
 * the first one stood: cited entries by new id, then uncited entries in their
 * original relative order.
 */
export function reorderBibliography(
	order: readonly string[],
	entries: readonly BibEntry[],
	mapping: RenumberMapping,
): string[] {
	const entryIds = new Set(entries.map((e) => e.paragraphId));
	const anchor = order.findIndex((id) => entryIds.has(id));
	if (anchor === -1) return [...order];

	const cited = entries
		.flatMap((entry) => {
			const newId = mapping.get(entry.id);
			return newId === undefined ? [] : [{ paragraphId: entry.paragraphId, newId }];
		})
		.sort((a, b) => a.newId - b.newId)
		.map((e) => e.paragraphId);
	const uncited = entries.filter((e) => !mapping.has(e.id)).map((e) => e.paragraphId);

	const rest = order.filter((id) => !entryIds.has(id));
	return [...rest.slice(0, anchor), ...cited, ...uncited, ...rest.slice(anchor)];
}

function spliceText(text: string, edits: { start: number; end: number; text: string }[]): string {
	let result = text;
	for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
		result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
	}
	return result;
}

/** Operations that rewrite citations and entry ids and move entries into new order. */
export function planRenumber(
	document: NumericDocument,
	discovery: Discovery,
	mapping: RenumberMapping,
): MutationOperation[] {
	if (discovery.entries.length === 0 || mapping.size === 0) return [];

	const spanTexts = new Map<string, { paragraphId: string; spanIndex: number; text: string }>();
	const rangeEdits = new Map<string, { paragraphId: string; spanIndex: number; edits: (SpanRange & { text: string })[] }>();
	const setSpan = (paragraphId: string, spanIndex: number, text: string) => {
		spanTexts.set(`${paragraphId}\u0000${spanIndex}`, { paragraphId, spanIndex, text });
	};
	const editRange = (paragraphId: string, range: SpanRange, text: string) => {
		const key = `${paragraphId}\u0000${range.spanIndex}`;
		const entry = rangeEdits.get(key) ?? { paragraphId, spanIndex: range.spanIndex, edits: [] };
		entry.edits.push({ ...range, text });
		rangeEdits.set(key, entry);
	};

	for (const occurrence of discovery.occurrences) {
		const text = formatNumbers(occurrence.numbers.map((n) => mapping.get(n) ?? n));
		if (occurrence.source.kind === "styled") {
			const [first, ...others] = occurrence.source.spanIndexes;
			setSpan(occurrence.paragraphId, first, text);
			for (const spanIndex of others) setSpan(occurrence.paragraphId, spanIndex, "");
		} else {
			editRange(occurrence.paragraphId, occurrence.source.range, text);
		}
	}

	for (const entry of discovery.entries) {
		const newId = mapping.get(entry.id);
		if (newId === undefined || !entry.idSpan) continue;
		editRange(entry.paragraphId, entry.idSpan, String(newId));
	}

	for (const { paragraphId, spanIndex, edits } of rangeEdits.values()) {
		const original = getParagraph(document, paragraphId).spans[spanIndex].text;
		setSpan(paragraphId, spanIndex, spliceText(original, edits));
	}

	const operations: MutationOperation[] = [];
	for (const { paragraphId, spanIndex, text } of spanTexts.values()) {
		if (getParagraph(document, paragraphId).spans[spanIndex].text !== text) {
			operations.push({ type: "set-span-text", paragraphId, spanIndex, text });
		}
	}

	const newOrder = reorderBibliography(document.order, discovery.entries, mapping);
	const moved = newOrder.some((id, i) => id !== document.order[i]);
	if (moved) {
		const anchor = document.order.findIndex((id) => discovery.entries.some((e) => e.paragraphId === id));
		const entryIds = new Set(discovery.entries.map((e) => e.paragraphId));
		for (const id of document.order) {
			if (entryIds.has(id)) operations.push({ type: "remove-paragraph", paragraphId: id });
		}
		const reinserted = newOrder.filter((id) => entryIds.has(id));
		for (const [offset, paragraphId] of reinserted.entries()) {
			operations.push({ type: "insert-paragraph", paragraphId, index: anchor + offset });
		}
	}

	return operations;
}

/**
 * Validate a numeral-style document and, if the safety gate passes, plan the
 * renumbering. On any other gate outcome the mapping and plan are empty and
 * the caller's document is left as it is.
 */
export function renumber(
	document: NumericDocument,
	names: NumericStyleNames = DEFAULT_STYLE_NAMES,
): RenumberResult {
	const discovery = discover(document, names);
	const validation = validateNumbering(discovery);
	const status = evaluateGate(validation);

	if (status !== "ready") {
		logger.debug("Renumbering skipped:", status);
		return { status, mapping: new Map(), plan: [], validation };
	}

	const mapping = buildMapping(discovery.appearanceOrder);
	const plan = planRenumber(document, discovery, mapping);
	logger.debug(`Renumbering planned: ${mapping.size} ids, ${plan.length} operations`);
	return { status, mapping, plan, validation };
}
