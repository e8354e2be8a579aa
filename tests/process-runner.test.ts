import { describe, expect, it } from "vitest";
import { ProcessRunner, appendTail } from "../src/process/runner.js";

describe("ProcessRunner", () => {
	it("captures output and the exit code", async () => {
		const chunks: string[] = [];
		const result = await new ProcessRunner().run({
			command: "printf 'hello\\n'; printf 'oops' >&2; exit 4",
			shell: true,
			onOutput: (chunk) => chunks.push(chunk),
		});

		expect(result).toEqual({ exitCode: 4, stdout: "hello\n", stderr: "oops", timedOut: false, cancelled: false });
		expect(chunks[0]).toBe("$ printf 'hello\\n'; printf 'oops' >&2; exit 4\n");
	});

	it("passes the environment through", async () => {
		const result = await new ProcessRunner().run({
			command: "printf '%s' \"$NETGATE_SAMPLE\"",
			shell: true,
			env: { NETGATE_SAMPLE: "sample-value" },
		});
		expect(result.stdout).toBe("sample-value");
	});

	it("keeps only the tail of long output", async () => {
		const chunks: string[] = [];
		const result = await new ProcessRunner().run({
			command: "printf 'abcdefghij'; printf 'KLMNOPQRST' >&2",
			shell: true,
			captureLimit: 4,
			onOutput: (chunk) => chunks.push(chunk),
		});
		expect(result.stdout).toBe("ghij");
		expect(result.stderr).toBe("QRST");
		expect(chunks.join("")).toContain("abcdefghij");
	});

	it("trims a tail buffer across appends", () => {
		expect(appendTail("abc", "def", 4)).toBe("cdef");
		expect(appendTail("", "xy", 4)).toBe("xy");
	});

	it("stops a command that exceeds its timeout", async () => {
		const result = await new ProcessRunner().run({ command: "exec sleep 5", shell: true, timeoutMs: 50 });
		expect(result.timedOut).toBe(true);
		expect(result.exitCode).not.toBe(0);
	});

	it("reports cancellation without starting an aborted command", async () => {
		const controller = new AbortController();
		controller.abort();
		const result = await new ProcessRunner().run({ command: "true", shell: true, signal: controller.signal });
		expect(result).toMatchObject({ exitCode: 130, cancelled: true });
	});

	it("maps a missing binary to exit code 127", async () => {
		const result = await new ProcessRunner().run({ command: "netgate-no-such-binary", args: ["--version"] });
		expect(result.exitCode).toBe(127);
		expect(result.stderr).toContain("netgate-no-such-binary:");
	});
});
