import fs from "node:fs/promises";
import path from "node:path";
import { DiagnosticsError, errorMessage } from "../core/errors.js";
import type { LogSource, MembershipEvent } from "../network/log-source.js";
import type { CommandRunner } from "../process/runner.js";
import { type ArtifactRef, type ArtifactStore, diagnosticsKeyFor } from "../store/artifact-store.js";

const LANE_HEIGHT = 24;
const LABEL_WIDTH = 160;
const PLOT_WIDTH = 800;
const MARGIN = 16;

/**
 * Renders membership events as an SVG timeline: one lane per node, a green
 * mark where it joined and a red mark where it left. Events without a
 * timestamp are spaced by their order in the logs.
 */
export function renderTimeline(events: MembershipEvent[]): string {
	const positioned = events.map((event, index) => ({ event, x: event.at ?? index }));
	const nodes: string[] = [];
	for (const { event } of [...positioned].sort((a, b) => a.x - b.x)) {
		if (!nodes.includes(event.nodeId)) {
			nodes.push(event.nodeId);
		}
	}

	const xs = positioned.map((item) => item.x);
	const min = xs.length > 0 ? Math.min(...xs) : 0;
	const span = xs.length > 0 ? Math.max(Math.max(...xs) - min, 1) : 1;
	const scale = (x: number): number => LABEL_WIDTH + Math.round(((x - min) / span) * PLOT_WIDTH);

	const width = LABEL_WIDTH + PLOT_WIDTH + MARGIN * 2;
	const height = Math.max(nodes.length, 1) * LANE_HEIGHT + MARGIN * 2;
	const lines: string[] = [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
		`<rect width="${width}" height="${height}" fill="#ffffff"/>`,
	];

	nodes.forEach((nodeId, lane) => {
		const y = MARGIN + lane * LANE_HEIGHT + LANE_HEIGHT / 2;
		lines.push(
			`<text x="${MARGIN}" y="${y + 4}" font-family="monospace" font-size="12">${escapeXml(nodeId)}</text>`,
			`<line x1="${LABEL_WIDTH}" y1="${y}" x2="${LABEL_WIDTH + PLOT_WIDTH}" y2="${y}" stroke="#dddddd"/>`,
		);
		for (const { event, x } of positioned) {
			if (event.nodeId !== nodeId) {
				continue;
			}
			const color = event.kind === "joined" ? "#2e7d32" : "#c62828";
			lines.push(
				`<circle cx="${scale(x)}" cy="${y}" r="5" fill="${color}"><title>${escapeXml(`${nodeId} ${event.kind}`)}</title></circle>`,
			);
		}
	});

	lines.push("</svg>");
	return `${lines.join("\n")}\n`;
}

/** Archives every log file of the instance into `outFile` with `tar -czf`. */
export async function bundleLogs(
	source: LogSource,
	outFile: string,
	runner: CommandRunner,
	signal?: AbortSignal,
): Promise<number> {
	const files = await source.listLogFiles();
	if (files.length === 0) {
		throw new DiagnosticsError(`No log files found under ${source.root}`);
	}
	await fs.mkdir(path.dirname(outFile), { recursive: true });
	const relative = files.map((file) => path.relative(source.root, file));
	const result = await runner.run({
		command: "tar",
		args: ["-czf", outFile, "-C", source.root, ...relative],
		signal,
	});
	if (result.exitCode !== 0) {
		throw new DiagnosticsError(`tar exited with code ${result.exitCode}: ${result.stderr.trim()}`);
	}
	return files.length;
}

export type DiagnosticsTarget = {
	store: ArtifactStore;
	runId: string;
	suite: string;
	platform: string;
};

export async function uploadDiagnostic(
	target: DiagnosticsTarget,
	file: string,
	blob: Uint8Array,
): Promise<ArtifactRef> {
	const key = diagnosticsKeyFor(target.runId, target.suite, target.platform, file);
	try {
		return await target.store.put(key, blob);
	} catch (error) {
		throw new DiagnosticsError(`Could not upload ${key}: ${errorMessage(error)}`, { cause: error });
	}
}

export async function captureTimeline(source: LogSource, target: DiagnosticsTarget): Promise<ArtifactRef> {
	let events: MembershipEvent[];
	try {
		events = await source.readEvents();
	} catch (error) {
		throw new DiagnosticsError(`Could not read network logs: ${errorMessage(error)}`, { cause: error });
	}
	return uploadDiagnostic(target, "timeline.svg", new TextEncoder().encode(renderTimeline(events)));
}

export async function captureLogs(
	source: LogSource,
	target: DiagnosticsTarget,
	workDir: string,
	runner: CommandRunner,
	signal?: AbortSignal,
): Promise<ArtifactRef> {
	const outFile = path.join(workDir, "logs.tar.gz");
	await bundleLogs(source, outFile, runner, signal);
	return uploadDiagnostic(target, "logs.tar.gz", new Uint8Array(await fs.readFile(outFile)));
}

function escapeXml(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}
