export interface StyledSpan {
	text: string;
	/** Character style name, e.g. "cite_bib" or "bib_number". */
	style?: string;
	superscript?: boolean;
}

export interface NumericParagraph {
	id: string;
	/** Paragraph style name, e.g. "REF-N" for bibliography entries. */
	style?: string;
	spans: StyledSpan[];
}

/** Paragraph records by stable id, plus their reading order. */
export interface NumericDocument {
	paragraphs: Record<string, NumericParagraph>;
	order: string[];
}

export type MutationOperation =
	| { type: "set-span-text"; paragraphId: string; spanIndex: number; text: string }
	| { type: "remove-paragraph"; paragraphId: string }
	| { type: "insert-paragraph"; paragraphId: string; index: number };

export class DocumentStructureError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "DocumentStructureError";
	}
}

export function createNumericDocument(paragraphs: readonly NumericParagraph[]): NumericDocument {
	const document: NumericDocument = { paragraphs: {}, order: [] };
	for (const paragraph of paragraphs) {
		if (Object.hasOwn(document.paragraphs, paragraph.id)) {
			throw new DocumentStructureError(`Duplicate paragraph id "${paragraph.id}"`);
		}
		document.paragraphs[paragraph.id] = {
			...paragraph,
			spans: paragraph.spans.map((span) => ({ ...span })),
		};
		document.order.push(paragraph.id);
	}
	return document;
}

export function paragraphText(paragraph: NumericParagraph): string {
	return paragraph.spans.map((span) => span.text).join("");
}

export function getParagraph(document: NumericDocument, id: string): NumericParagraph {
	const paragraph = document.paragraphs[id];
	if (!paragraph) {
		throw new DocumentStructureError(`Unknown paragraph id "${id}"`);
	}
	return paragraph;
}

export function orderedParagraphs(document: NumericDocument): NumericParagraph[] {
	return document.order.map((id) => getParagraph(document, id));
}

/**
 * Apply a plan to a copy of the document. The input document is left as it
 * was; operations run in order against the copy.
 */
export function applyMutationPlan(
	document: NumericDocument,
	operations: readonly MutationOperation[],
): NumericDocument {
	const next = createNumericDocument(orderedParagraphs(document));

	for (const operation of operations) {
		switch (operation.type) {
			case "set-span-text": {
				const span = getParagraph(next, operation.paragraphId).spans[operation.spanIndex];
				if (!span) {
					throw new DocumentStructureError(
						`Paragraph "${operation.paragraphId}" has no span ${operation.spanIndex}`,
					);
				}
				span.text = operation.text;
				break;
			}
			case "remove-paragraph": {
				const at = next.order.indexOf(operation.paragraphId);
				if (at !== -1) next.order.splice(at, 1);
				break;
			}
			case "insert-paragraph": {
				getParagraph(next, operation.paragraphId);
				next.order.splice(operation.index, 0, operation.paragraphId);
				break;
			}
		}
	}

	return next;
}
