import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { type ValidationCache, validationCacheKey } from "../cache/validation-cache.js";
import { logger } from "../logger.js";
import { renderValidationReport } from "../report/report.js";
import { getCitationStyle } from "../styles/index.js";
import { createToolError, createToolResponse } from "../types.js";
import { type ValidationResult, toParagraphs, validate } from "../validate.js";
import { AUTO_STYLE, resolveStyle } from "./style-input.js";

/** JSON-safe view of a result; match pairs become a plain object. */
export function validationMetadata(result: ValidationResult): Record<string, unknown> {
	return {
		style: result.style,
		styleLabel: result.styleLabel,
		summary: result.summary,
		validCitations: result.validCitations,
		diagnostics: result.diagnostics,
		citations: result.citations,
		references: result.references,
		matches: Object.fromEntries(result.match.pairs),
	};
}

export function registerValidateCitationsTool(server: McpServer, cache: ValidationCache): void {
	server.registerTool(
		"validate_citations",
		{
			description:
				"Check in-text citations against the bibliography of a name-year manuscript. Paragraphs after '<ref-open>' and before '<ref-close>' are read as the bibliography. Reports missing and unused references, year and spelling mismatches, et al. and abbreviation usage, format errors and duplicate references.",
			inputSchema: {
				paragraphs: z
					.array(z.string())
					.min(1)
					.describe("Manuscript paragraphs in reading order, bibliography included"),
				style: z
					.string()
					.default(AUTO_STYLE)
					.describe("Citation style: 'apa', 'vancouver', 'chicago' or 'auto' to detect it"),
				format: z
					.enum(["json", "report"])
					.default("json")
					.describe("'json' for structured diagnostics, 'report' for a plain-text report"),
				documentName: z.string().default("document").describe("Name shown in the report header"),
			},
		},
		async ({ paragraphs, style, format, documentName }) => {
			const resolved = resolveStyle(style, paragraphs);
			if (!resolved.ok) {
				return createToolError("INVALID_STYLE", resolved.message);
			}

			try {
				const key = validationCacheKey(resolved.style, paragraphs);
				let result = cache.get(key);
				if (!result) {
					result = validate(toParagraphs(paragraphs), getCitationStyle(resolved.style));
					cache.set(key, result);
				}
				logger.debug(`validate_citations: ${result.diagnostics.length} diagnostics (${result.style})`);

				const metadata =
					format === "report"
						? { style: result.style, detected: resolved.detected, report: renderValidationReport(result, documentName) }
						: { ...validationMetadata(result), detected: resolved.detected };

				return createToolResponse({
					valid: result.diagnostics.length === 0,
					metadata,
					error: null,
				});
			} catch (error) {
				logger.error("validate_citations failed:", error);
				return createToolError(
					"VALIDATION_ERROR",
					error instanceof Error ? error.message : String(error),
				);
			}
		},
	);
}
