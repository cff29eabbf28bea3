import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ValidationCache } from "./cache/validation-cache.js";
import type { Config } from "./config.js";
import { logger } from "./logger.js";
import { registerCheckNumericCitationsTool } from "./tools/check-numeric-citations.js";
import { registerDetectCitationStyleTool } from "./tools/detect-citation-style.js";
import { registerRenumberCitationsTool } from "./tools/renumber-citations.js";
import { registerValidateCitationsTool } from "./tools/validate-citations.js";

/**
 * One cache for the process. The stateless transport builds a server per
 * request, so the cache has to outlive them.
 */
let sharedCache: ValidationCache | null = null;

function getCache(config: Config): ValidationCache {
	if (!sharedCache) {
		sharedCache = new ValidationCache(config.VALIDATION_CACHE_SIZE);
	}
	return sharedCache;
}

/** Drop the shared cache (for testing). */
export function resetCache(): void {
	sharedCache = null;
}

export function registerTools(server: McpServer, config: Config): void {
	registerValidateCitationsTool(server, getCache(config));
	registerDetectCitationStyleTool(server);
	registerCheckNumericCitationsTool(server);
	registerRenumberCitationsTool(server);
	logger.debug(
		"Registered tools: validate_citations, detect_citation_style, check_numeric_citations, renumber_citations",
	);
}

export function createServer(config: Config): McpServer {
	const server = new McpServer(
		{ name: "citecheck", version: "0.1.0" },
		{ capabilities: { logging: {} } },
	);

	registerTools(server, config);

	return server;
}
