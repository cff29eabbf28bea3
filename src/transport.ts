import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Request, type Response } from "express";
import type { Config } from "./config.js";
import { loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { createServer } from "./server.js";

const sseTransports = new Map<string, SSEServerTransport>();

function closeQuietly(label: string, close: () => Promise<void>): void {
	close().catch((error: unknown) => {
		logger.warn(`Failed to close ${label}:`, error);
	});
}

function methodNotAllowed(_req: Request, res: Response): void {
	res.writeHead(405).end(
		JSON.stringify({
			jsonrpc: "2.0",
			error: { code: -32000, message: "Method not allowed." },
			id: null,
		}),
	);
}

export function createApp(config?: Config) {
	const resolvedConfig = config ?? loadConfig();
	setLogLevel(resolvedConfig.LOG_LEVEL);
	const app = express();
	app.use(express.json({ limit: "10mb" }));

	// --- Streamable HTTP (primary transport) ---

	app.post("/mcp", async (req: Request, res: Response) => {
		const server = createServer(resolvedConfig);
		try {
			const transport = new StreamableHTTPServerTransport({
				sessionIdGenerator: undefined,
			});
			res.on("close", () => {
				closeQuietly("transport", () => transport.close());
				closeQuietly("server", () => server.close());
			});
			await server.connect(transport);
			await transport.handleRequest(req, res, req.body);
		} catch (error) {
			logger.error("MCP request error:", error);
			if (!res.headersSent) {
				res.status(500).json({
					jsonrpc: "2.0",
					error: { code: -32603, message: "Internal server error" },
					id: null,
				});
			}
		}
	});

	app.get("/mcp", methodNotAllowed);
	app.delete("/mcp", methodNotAllowed);

	// --- SSE fallback (legacy transport) ---

	app.get("/sse", async (_req: Request, res: Response) => {
		const server = createServer(resolvedConfig);
		try {
			const transport = new SSEServerTransport("/messages", res);
			sseTransports.set(transport.sessionId, transport);
			logger.info("SSE client connected, sessionId:", transport.sessionId);

			res.on("close", () => {
				sseTransports.delete(transport.sessionId);
				closeQuietly("server", () => server.close());
				logger.info("SSE client disconnected, sessionId:", transport.sessionId);
			});

			await server.connect(transport);
		} catch (error) {
			logger.error("SSE connection error:", error);
			if (!res.headersSent) {
				res.status(500).end();
			}
		}
	});

	app.post("/messages", async (req: Request, res: Response) => {
		const sessionId = req.query.sessionId;
		const transport = typeof sessionId === "string" ? sseTransports.get(sessionId) : undefined;

		if (!transport) {
			res.status(400).json({ error: "Unknown or expired session" });
			return;
		}

		try {
			await transport.handlePostMessage(req, res, req.body);
		} catch (error) {
			logger.error("SSE message error:", error);
			if (!res.headersSent) {
				res.status(500).json({ error: "Internal server error" });
			}
		}
	});

	// --- Health check ---

	app.get("/health", (_req: Request, res: Response) => {
		res.status(200).json({ status: "ok" });
	});

	return app;
}
