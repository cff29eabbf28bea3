import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { Config } from "../config.js";
import { resetCache } from "../server.js";
import { createApp } from "../transport.js";

let server: Server;
let baseUrl: string;

const testConfig: Config = {
	PORT: 3000,
	NODE_ENV: "test",
	LOG_LEVEL: "info",
	VALIDATION_CACHE_SIZE: 10,
};

const mcpHeaders = {
	"Content-Type": "application/json",
	Accept: "application/json, text/event-stream",
};

beforeAll(async () => {
	const app = createApp(testConfig);
	await new Promise<void>((resolve) => {
		server = app.listen(0, () => {
			const addr = server.address();
			if (addr && typeof addr === "object") {
				baseUrl = `http://localhost:${addr.port}`;
			}
			resolve();
		});
	});
});

afterAll(async () => {
	resetCache();
	await new Promise<void>((resolve) => {
		server.close(() => resolve());
	});
});

function jsonRpc(method: string, params: unknown, id: number) {
	return { jsonrpc: "2.0", method, params, id };
}

/**
 * Parse SSE response body and extract JSON-RPC messages from `data:` lines.
 * The SDK answers Streamable HTTP POSTs in SSE format.
 */
async function parseSseResponse(res: Response): Promise<unknown[]> {
	const text = await res.text();
	const messages: unknown[] = [];
	for (const line of text.split("\n")) {
		if (line.startsWith("data: ")) {
			messages.push(JSON.parse(line.slice(6)));
		}
	}
	return messages;
}

async function mcpPost(body: unknown): Promise<{ status: number; messages: unknown[] }> {
	const res = await fetch(`${baseUrl}/mcp`, {
		method: "POST",
		headers: mcpHeaders,
		body: JSON.stringify(body),
	});
	if (res.status !== 200) {
		return { status: res.status, messages: [] };
	}
	return { status: res.status, messages: await parseSseResponse(res) };
}

function envelopeOf(message: unknown) {
	const result = (message as { result: { content: Array<{ text: string }> } }).result;
	return JSON.parse(result.content[0].text);
}

function hasError(message: unknown): boolean {
	const body = message as Record<string, unknown>;
	return body.error !== undefined || (body.result as Record<string, unknown>)?.isError === true;
}

const initializeRequest = jsonRpc(
	"initialize",
	{
		protocolVersion: "2025-03-26",
		capabilities: {},
		clientInfo: { name: "test-client", version: "1.0" },
	},
	1,
);

describe("Streamable HTTP", () => {
	it("POST /mcp with initialize returns server info and capabilities", async () => {
		const { status, messages } = await mcpPost(initializeRequest);
		expect(status).toBe(200);
		expect(messages).toHaveLength(1);
		const result = (messages[0] as { result: Record<string, unknown> }).result;
		expect((result.serverInfo as Record<string, unknown>).name).toBe("citecheck");
		expect(result.capabilities).toBeDefined();
	});

	it("tools/list names every citation tool", async () => {
		const { messages } = await mcpPost(jsonRpc("tools/list", {}, 2));
		const tools = (messages[0] as { result: { tools: Array<{ name: string }> } }).result.tools;
		expect(tools.map((t) => t.name).sort()).toEqual([
			"check_numeric_citations",
			"detect_citation_style",
			"renumber_citations",
			"validate_citations",
		]);
	});

	it("detect_citation_style answers with the envelope", async () => {
		const call = jsonRpc(
			"tools/call",
			{
				name: "detect_citation_style",
				arguments: { paragraphs: ["Earlier work (Smith, 2020) disagreed."] },
			},
			3,
		);
		const { status, messages } = await mcpPost(call);
		expect(status).toBe(200);

		const envelope = envelopeOf(messages[0]);
		expect(envelope.valid).toBe(true);
		expect(envelope.metadata.style).toBe("apa");
	});

	it("GET /mcp returns 405", async () => {
		const res = await fetch(`${baseUrl}/mcp`);
		expect(res.status).toBe(405);
	});

	it("DELETE /mcp returns 405", async () => {
		const res = await fetch(`${baseUrl}/mcp`, { method: "DELETE" });
		expect(res.status).toBe(405);
	});
});

describe("Input validation", () => {
	it("validate_citations with no paragraphs is rejected", async () => {
		const call = jsonRpc("tools/call", { name: "validate_citations", arguments: { paragraphs: [] } }, 4);
		const { status, messages } = await mcpPost(call);
		expect(status).toBe(200);
		expect(hasError(messages[0])).toBe(true);
	});

	it("validate_citations with an unknown style returns INVALID_STYLE", async () => {
		const call = jsonRpc(
			"tools/call",
			{ name: "validate_citations", arguments: { paragraphs: ["Text (Smith, 2020)."], style: "mla" } },
			5,
		);
		const { messages } = await mcpPost(call);
		const envelope = envelopeOf(messages[0]);
		expect(envelope.valid).toBe(false);
		expect(envelope.error.code).toBe("INVALID_STYLE");
	});

	it("renumber_citations without paragraphs is rejected", async () => {
		const call = jsonRpc("tools/call", { name: "renumber_citations", arguments: {} }, 6);
		const { messages } = await mcpPost(call);
		expect(hasError(messages[0])).toBe(true);
	});
});

describe("SSE fallback", () => {
	it("GET /sse returns 200 with text/event-stream content type", async () => {
		const controller = new AbortController();
		const res = await fetch(`${baseUrl}/sse`, { signal: controller.signal });

		expect(res.status).toBe(200);
		expect(res.headers.get("content-type")).toContain("text/event-stream");

		const body = res.body;
		if (!body) throw new Error("SSE response has no body");
		const { value } = await body.getReader().read();
		const text = new TextDecoder().decode(value);
		expect(text).toContain("event: endpoint");
		expect(text).toContain("/messages?sessionId=");

		controller.abort();
	});

	it("POST /messages with invalid sessionId returns 400", async () => {
		const res = await fetch(`${baseUrl}/messages?sessionId=nonexistent`, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify({ jsonrpc: "2.0", method: "ping", id: 1 }),
		});
		expect(res.status).toBe(400);
		const body = await res.json();
		expect(body.error).toContain("Unknown or expired session");
	});
});

describe("Health check", () => {
	it("GET /health returns ok", async () => {
		const res = await fetch(`${baseUrl}/health`);
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "ok" });
	});
});
