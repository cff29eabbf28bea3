import { type DuplicateMatch, findDuplicates } from "../matching/duplicates.js";
import type { Discovery } from "./discovery.js";

export interface SequenceIssue {
	position: number;
	current: number;
	expected: number;
}

export interface NumericValidation {
	totalReferences: number;
	totalCitations: number;
	missing: number[];
	unused: number[];
	duplicates: DuplicateMatch<number>[];
	sequenceIssues: SequenceIssue[];
	isPerfect: boolean;
}

const LEADING_NUMBERING = /^\[?\d+\]?[.\s]*/;

/**
 * Each newly seen id should be one more than the number of distinct ids seen
 * before it. Repeats of an earlier id are never a gap.
 */
export function findSequenceIssues(allCited: readonly number[]): SequenceIssue[] {
	const issues: SequenceIssue[] = [];
	const seen = new Set<number>();

	for (const n of allCited) {
		if (seen.has(n)) continue;
		const expected = seen.size + 1;
		if (n !== expected) {
			issues.push({ position: expected, current: n, expected });
		}
		seen.add(n);
	}

	return issues;
}

export function validateNumbering(discovery: Discovery): NumericValidation {
	const cited = new Set(discovery.allCited);
	const missing = [...cited].filter((n) => !discovery.bibIds.has(n)).sort((a, b) => a - b);
	const unused = [...discovery.bibIds].filter((n) => !cited.has(n)).sort((a, b) => a - b);
	const duplicates = findDuplicates(
		discovery.entries.map((entry) => ({
			id: entry.id,
			text: entry.text.trim().replace(LEADING_NUMBERING, ""),
		})),
	);
	const sequenceIssues = findSequenceIssues(discovery.allCited);

	return {
		totalReferences: discovery.bibIds.size,
		totalCitations: discovery.allCited.length,
		missing,
		unused,
		duplicates,
		sequenceIssues,
		isPerfect:
			missing.length === 0 &&
			unused.length === 0 &&
			duplicates.length === 0 &&
			sequenceIssues.length === 0,
	};
}
