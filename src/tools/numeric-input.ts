import { z } from "zod";
import { DEFAULT_STYLE_NAMES, type NumericStyleNames } from "../numeric/discovery.js";
import { type NumericDocument, createNumericDocument } from "../numeric/document.js";

const spanSchema = z.object({
	text: z.string(),
	style: z.string().optional(),
	superscript: z.boolean().optional(),
});

const paragraphSchema = z.object({
	id: z.string().min(1),
	style: z.string().optional(),
	spans: z.array(spanSchema),
});

/** Input shape shared by the numeral-style tools. */
export const numericDocumentInput = {
	paragraphs: z
		.array(paragraphSchema)
		.describe("Paragraphs in reading order, each with a stable id and its styled spans"),
	styleNames: z
		.object({
			citation: z.string().min(1),
			bibliography: z.string().min(1),
			bibNumber: z.string().min(1),
		})
		.partial()
		.optional()
		.describe(
			`Style names to look for; defaults are '${DEFAULT_STYLE_NAMES.citation}', '${DEFAULT_STYLE_NAMES.bibliography}' and '${DEFAULT_STYLE_NAMES.bibNumber}'`,
		),
};

export type NumericDocumentInput = {
	paragraphs: z.infer<typeof paragraphSchema>[];
	styleNames?: Partial<NumericStyleNames>;
};

export function resolveStyleNames(overrides: Partial<NumericStyleNames> = {}): NumericStyleNames {
	return {
		citation: overrides.citation ?? DEFAULT_STYLE_NAMES.citation,
		bibliography: overrides.bibliography ?? DEFAULT_STYLE_NAMES.bibliography,
		bibNumber: overrides.bibNumber ?? DEFAULT_STYLE_NAMES.bibNumber,
	};
}

/** Build the arena; throws DocumentStructureError on repeated paragraph ids. */
export function readNumericInput(input: NumericDocumentInput): {
	document: NumericDocument;
	names: NumericStyleNames;
} {
	return {
		document: createNumericDocument(input.paragraphs),
		names: resolveStyleNames(input.styleNames),
	};
}
