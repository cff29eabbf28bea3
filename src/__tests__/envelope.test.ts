import { describe, expect, it } from "vitest";
import { type ToolResponseEnvelope, createToolError, createToolResponse } from "../types.js";

describe("Response envelope format", () => {
	it("createToolResponse returns content array with one text item", () => {
		const result = createToolResponse({
			valid: true,
			metadata: { style: "apa" },
			error: null,
		});
		expect(result.content).toHaveLength(1);
		expect(result.content[0].type).toBe("text");
	});

	it("text content parses to the original envelope", () => {
		const envelope: ToolResponseEnvelope = {
			valid: false,
			metadata: { summary: { totalCitations: 2 } },
			error: null,
		};
		const parsed = JSON.parse(createToolResponse(envelope).content[0].text);
		expect(parsed).toEqual(envelope);
	});

	it("createToolError builds a failure envelope without details", () => {
		const parsed = JSON.parse(createToolError("INVALID_STYLE", "Unknown style").content[0].text);
		expect(parsed).toEqual({
			valid: false,
			metadata: null,
			error: { code: "INVALID_STYLE", message: "Unknown style" },
		});
	});

	it("createToolError carries details when given", () => {
		const parsed = JSON.parse(
			createToolError("INVALID_DOCUMENT", "Duplicate paragraph id", { id: "p1" }).content[0].text,
		);
		expect(parsed.error).toEqual({
			code: "INVALID_DOCUMENT",
			message: "Duplicate paragraph id",
			details: { id: "p1" },
		});
	});

	it("envelope always has exactly three top-level keys: valid, metadata, error", () => {
		const parsed = JSON.parse(createToolError("VALIDATION_ERROR", "boom").content[0].text);
		expect(Object.keys(parsed).sort()).toEqual(["error", "metadata", "valid"]);
	});
});
