import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { detectCitationStyle, getCitationStyle } from "../styles/index.js";
import { createToolResponse } from "../types.js";
import { citationSample } from "./style-input.js";

export function registerDetectCitationStyleTool(server: McpServer): void {
	server.registerTool(
		"detect_citation_style",
		{
			description:
				"Guess the name-year citation style of a manuscript from its in-text citations: APA when '(Smith, 2020)' forms dominate, Vancouver when '(Smith 2020)' forms do.",
			inputSchema: {
				paragraphs: z.array(z.string()).min(1).describe("Manuscript paragraphs in reading order"),
			},
		},
		async ({ paragraphs }) => {
			const style = detectCitationStyle(citationSample(paragraphs));
			return createToolResponse({
				valid: true,
				metadata: { style, label: getCitationStyle(style).label },
				error: null,
			});
		},
	);
}
