export type ToolErrorCode = "INVALID_STYLE" | "INVALID_DOCUMENT" | "VALIDATION_ERROR";

export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: { code: ToolErrorCode | string; message: string; details?: unknown } | null;
}

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}

/** Failure envelope for a tool call that could not produce a result. */
export function createToolError(code: ToolErrorCode, message: string, details?: unknown) {
	return createToolResponse({
		valid: false,
		metadata: null,
		error: details === undefined ? { code, message } : { code, message, details },
	});
}
