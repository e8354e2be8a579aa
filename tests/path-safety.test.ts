import { describe, expect, it } from "vitest";
import { NetgateError } from "../src/core/errors.js";
import { ensureWithinBase, sanitizePathSegment } from "../src/utils/path-safety.js";

describe("path safety", () => {
	it("blocks traversal outside base", () => {
		expect(() => ensureWithinBase("/tmp/netgate", "../etc/passwd", "run id")).toThrow(
			/Invalid run id "..\/etc\/passwd": path escapes \/tmp\/netgate/,
		);
	});

	it("raises a path error for absolute children", () => {
		let caught: unknown;
		try {
			ensureWithinBase("/tmp/netgate", "/etc", "log dir");
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(NetgateError);
		expect(caught).toMatchObject({ kind: "path" });
	});

	it("resolves nested children", () => {
		expect(ensureWithinBase("/tmp/netgate", ".safe/node", "node dir")).toBe("/tmp/netgate/.safe/node");
	});

	it("normalizes path segments", () => {
		expect(sanitizePathSegment("Job: Build/Release", "fallback")).toBe("Job-Build-Release");
		expect(sanitizePathSegment("   ", "fallback")).toBe("fallback");
		expect(sanitizePathSegment("..", "fallback")).toBe("fallback");
		expect(sanitizePathSegment("ubuntu-latest, self-hosted", "platform")).toBe("ubuntu-latest-self-hosted");
	});
});
