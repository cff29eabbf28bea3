export type NumberToken =
	| { kind: "number"; value: number }
	| { kind: "dash" }
	| { kind: "separator" };

const DASHES = new Set(["-", "–", "—"]);

/** Widest range that is expanded; wider ones are read as their two endpoints. */
export const MAX_RANGE_SPAN = 1000;

/**
 * Split citation text into digit runs, dashes and everything else.
 * Whitespace produces no token, so "1 - 3" and "1-3" tokenize alike.
 */
export function tokenizeNumbers(text: string): NumberToken[] {
	const tokens: NumberToken[] = [];
	let i = 0;

	while (i < text.length) {
		const ch = text[i];
		if (ch >= "0" && ch <= "9") {
			let end = i + 1;
			while (end < text.length && text[end] >= "0" && text[end] <= "9") end++;
			tokens.push({ kind: "number", value: Number.parseInt(text.slice(i, end), 10) });
			i = end;
			continue;
		}
		if (DASHES.has(ch)) {
			tokens.push({ kind: "dash" });
		} else if (!/\s/.test(ch)) {
			tokens.push({ kind: "separator" });
		}
		i++;
	}

	return tokens;
}

/**
 * Cited numbers in reading order. "a-b" expands inclusively and is dropped
 * entirely when a > b; repeats are kept. A range wider than MAX_RANGE_SPAN
 * yields just a and b.
 */
export function getNumbers(text: string): number[] {
	const tokens = tokenizeNumbers(text);
	const numbers: number[] = [];

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i];
		if (token.kind !== "number") continue;

		const dash = tokens[i + 1];
		const end = tokens[i + 2];
		if (dash?.kind === "dash" && end?.kind === "number") {
			if (end.value - token.value >= MAX_RANGE_SPAN) {
				numbers.push(token.value, end.value);
			} else {
				for (let n = token.value; n <= end.value; n++) numbers.push(n);
			}
			i += 2;
			continue;
		}
		numbers.push(token.value);
	}

	return numbers;
}

function formatRun(start: number, end: number): string {
	const length = end - start + 1;
	if (length >= 3) return `${start}-${end}`;
	if (length === 2) return `${start},${end}`;
	return String(start);
}

/**
 * Compact form of a set of ids: runs of three or more become "a-b", pairs
 * "a,b", and runs are joined with ", ". "1, 2, 3, 5" -> "1-3, 5".
 */
export function formatNumbers(ids: Iterable<number>): string {
	const sorted = [...new Set(ids)].sort((a, b) => a - b);
	if (sorted.length === 0) return "";

	const parts: string[] = [];
	let start = sorted[0];
	let prev = sorted[0];

	for (const n of sorted.slice(1)) {
		if (n === prev + 1) {
			prev = n;
			continue;
		}
		parts.push(formatRun(start, prev));
		start = n;
		prev = n;
	}
	parts.push(formatRun(start, prev));

	return parts.join(", ");
}
