import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../logger.js";
import { discover } from "../numeric/discovery.js";
import { DocumentStructureError } from "../numeric/document.js";
import { evaluateGate } from "../numeric/renumber.js";
import { validateNumbering } from "../numeric/validation.js";
import { createToolError, createToolResponse } from "../types.js";
import { numericDocumentInput, readNumericInput } from "./numeric-input.js";

export function registerCheckNumericCitationsTool(server: McpServer): void {
	server.registerTool(
		"check_numeric_citations",
		{
			description:
				"Validate a numeral-style manuscript without changing it: cited numbers without a bibliography entry, entries never cited, near-duplicate entries and numbers that break first-appearance order. Also reports whether renumbering would be allowed.",
			inputSchema: numericDocumentInput,
		},
		async (input) => {
			try {
				const { document, names } = readNumericInput(input);
				const discovery = discover(document, names);
				const validation = validateNumbering(discovery);

				return createToolResponse({
					valid: validation.isPerfect,
					metadata: {
						...validation,
						gate: evaluateGate(validation),
						appearanceOrder: discovery.appearanceOrder,
					},
					error: null,
				});
			} catch (error) {
				if (error instanceof DocumentStructureError) {
					return createToolError("INVALID_DOCUMENT", error.message);
				}
				logger.error("check_numeric_citations failed:", error);
				return createToolError(
					"VALIDATION_ERROR",
					error instanceof Error ? error.message : String(error),
				);
			}
		},
	);
}
