import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { logger } from "../logger.js";
import { DocumentStructureError, orderedParagraphs } from "../numeric/document.js";
import { processNumericDocument } from "../numeric/process.js";
import { renderNumericReport } from "../report/report.js";
import { createToolError, createToolResponse } from "../types.js";
import { numericDocumentInput, readNumericInput } from "./numeric-input.js";

export function registerRenumberCitationsTool(server: McpServer): void {
	server.registerTool(
		"renumber_citations",
		{
			description:
				"Renumber the citations of a numeral-style manuscript to first-appearance order and reorder its bibliography to match. Refuses to change anything when an entry is never cited or a cited number has no entry. Returns the rewritten paragraphs, the old-to-new mapping and the edit plan.",
			inputSchema: {
				...numericDocumentInput,
				format: z
					.enum(["json", "report"])
					.default("json")
					.describe("'json' for structured output, 'report' to add a plain-text report"),
				documentName: z.string().default("document").describe("Name shown in the report header"),
			},
		},
		async ({ format, documentName, ...input }) => {
			try {
				const { document, names } = readNumericInput(input);
				const outcome = processNumericDocument(document, names);

				return createToolResponse({
					valid: outcome.gate === "ready" || outcome.gate === "perfect",
					metadata: {
						status: outcome.message,
						gate: outcome.gate,
						changed: outcome.changed,
						mapping: Object.fromEntries(outcome.mapping),
						plan: outcome.plan,
						before: outcome.before,
						after: outcome.after,
						paragraphs: orderedParagraphs(outcome.document),
						...(format === "report" ? { report: renderNumericReport(outcome, documentName) } : {}),
					},
					error: null,
				});
			} catch (error) {
				if (error instanceof DocumentStructureError) {
					return createToolError("INVALID_DOCUMENT", error.message);
				}
				logger.error("renumber_citations failed:", error);
				return createToolError(
					"VALIDATION_ERROR",
					error instanceof Error ? error.message : String(error),
				);
			}
		},
	);
}
