import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describe, expect, it } from "vitest";
import { SCENARIO } from "../../__tests__/fixtures.js";
import { ValidationCache } from "../../cache/validation-cache.js";
import { registerValidateCitationsTool } from "../validate-citations.js";

interface ValidateArgs {
	paragraphs: string[];
	style: string;
	format: "json" | "report";
	documentName: string;
}

function captureHandler() {
	let capturedHandler: (args: ValidateArgs) => Promise<unknown>;

	const mockServer = {
		registerTool: (_name: string, _schema: unknown, handler: (args: ValidateArgs) => Promise<unknown>) => {
			capturedHandler = handler;
		},
	} as unknown as McpServer;

	const cache = new ValidationCache();
	registerValidateCitationsTool(mockServer, cache);

	return {
		// biome-ignore lint/style/noNonNullAssertion: handler is set synchronously in registerTool
		handler: capturedHandler!,
		cache,
	};
}

function parseEnvelope(result: unknown) {
	const content = (result as { content: Array<{ text: string }> }).content;
	return JSON.parse(content[0].text);
}

const args = (overrides: Partial<ValidateArgs> = {}): ValidateArgs => ({
	paragraphs: SCENARIO,
	style: "auto",
	format: "json",
	documentName: "document",
	...overrides,
});

describe("validate_citations", () => {
	it("detects the style and returns diagnostics", async () => {
		const { handler } = captureHandler();
		const envelope = parseEnvelope(await handler(args()));

		expect(envelope.valid).toBe(false);
		expect(envelope.error).toBeNull();
		expect(envelope.metadata.style).toBe("apa");
		expect(envelope.metadata.detected).toBe(true);
		expect(envelope.metadata.validCitations).toEqual(["Smith (2019)"]);
		expect(envelope.metadata.matches).toEqual({
			"Smith|2019": { referenceKey: "Smith|2019", strategy: "exact" },
		});
		expect(envelope.metadata.diagnostics.map((d: { kind: string }) => d.kind)).toEqual([
			"missing-reference",
			"unused-reference",
		]);
	});

	it("uses an explicit style as given", async () => {
		const { handler } = captureHandler();
		const envelope = parseEnvelope(await handler(args({ style: " APA " })));
		expect(envelope.metadata.style).toBe("apa");
		expect(envelope.metadata.detected).toBe(false);
	});

	it("serves repeated requests from the cache", async () => {
		const { handler, cache } = captureHandler();
		await handler(args({ style: "apa" }));
		await handler(args({ style: "apa" }));

		expect(cache.stats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
	});

	it("rejects an unknown style", async () => {
		const { handler, cache } = captureHandler();
		const envelope = parseEnvelope(await handler(args({ style: "mla" })));

		expect(envelope).toEqual({
			valid: false,
			metadata: null,
			error: {
				code: "INVALID_STYLE",
				message: 'Unknown citation style "mla". Expected one of: apa, vancouver, chicago, auto',
			},
		});
		expect(cache.stats().misses).toBe(0);
	});

	it("returns a plain-text report on request", async () => {
		const { handler } = captureHandler();
		const envelope = parseEnvelope(await handler(args({ format: "report", documentName: "draft.docx" })));

		expect(Object.keys(envelope.metadata).sort()).toEqual(["detected", "report", "style"]);
		const lines = envelope.metadata.report.split("\n");
		expect(lines[0]).toBe("STATUS: Name/Year: 2 comments");
		expect(lines).toContain("Document: draft.docx");
	});

	it("reports a clean manuscript as valid", async () => {
		const { handler } = captureHandler();
		const envelope = parseEnvelope(
			await handler(args({ paragraphs: SCENARIO.filter((p) => !p.startsWith("Jones") && !p.startsWith("Brown")) })),
		);
		expect(envelope.valid).toBe(true);
		expect(envelope.metadata.diagnostics).toEqual([]);
	});
});
