import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export type MembershipEventKind = "joined" | "left";

export type MembershipEvent = {
	nodeId: string;
	kind: MembershipEventKind;
	/** Epoch milliseconds, when the line carried a timestamp. */
	at?: number;
	file: string;
	line: string;
};

/**
 * Read-only view of one network instance's log tree. Pollers and harness
 * steps consume logs through this handle instead of a fixed path.
 */
export interface LogSource {
	readonly root: string;
	readEvents(): Promise<MembershipEvent[]>;
	listLogFiles(): Promise<string[]>;
}

const MEMBERSHIP_MARKER = "Membership - decided";
const LOG_FILE_PATTERN = /\.log/i;
const TIMESTAMP_PATTERN = /^\[?\s*(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)/;
const NODE_NAME_PATTERN = /name:\s*([A-Za-z0-9_.:-]+)/;

export class DirectoryLogSource implements LogSource {
	constructor(readonly root: string) {}

	async listLogFiles(): Promise<string[]> {
		const files: string[] = [];
		const walk = async (dir: string): Promise<void> => {
			let entries: Dirent[];
			try {
				entries = await fs.readdir(dir, { withFileTypes: true });
			} catch (error) {
				if (error instanceof Error && "code" in error && error.code === "ENOENT") {
					return;
				}
				throw error;
			}
			for (const entry of entries) {
				const full = path.join(dir, entry.name);
				if (entry.isDirectory()) {
					await walk(full);
				} else if (entry.isFile() && LOG_FILE_PATTERN.test(entry.name)) {
					files.push(full);
				}
			}
		};
		await walk(this.root);
		return files.sort();
	}

	async readEvents(): Promise<MembershipEvent[]> {
		const events: MembershipEvent[] = [];
		for (const file of await this.listLogFiles()) {
			let content: string;
			try {
				content = await fs.readFile(file, "utf-8");
			} catch (error) {
				// Log files may be rotated away between listing and reading.
				if (error instanceof Error && "code" in error && error.code === "ENOENT") {
					continue;
				}
				throw error;
			}
			const relative = path.relative(this.root, file);
			events.push(...parseMembershipLines(content, relative));
		}
		return events;
	}
}

export function parseMembershipLines(content: string, file: string): MembershipEvent[] {
	const fallbackNode = nodeIdFromPath(file);
	const events: MembershipEvent[] = [];
	for (const line of content.split(/\r?\n/)) {
		if (!line.includes(MEMBERSHIP_MARKER)) {
			continue;
		}
		const decision = line.slice(line.indexOf(MEMBERSHIP_MARKER) + MEMBERSHIP_MARKER.length);
		const kind: MembershipEventKind | undefined = /\bJoined\b/.test(decision)
			? "joined"
			: /\bLeft\b/.test(decision)
				? "left"
				: undefined;
		if (!kind) {
			continue;
		}
		const timestamp = line.match(TIMESTAMP_PATTERN)?.[1];
		const parsedAt = timestamp ? Date.parse(timestamp) : Number.NaN;
		events.push({
			nodeId: decision.match(NODE_NAME_PATTERN)?.[1] ?? fallbackNode,
			kind,
			at: Number.isNaN(parsedAt) ? undefined : parsedAt,
			file,
			line,
		});
	}
	return events;
}

export function joinedNodes(events: MembershipEvent[]): Set<string> {
	return new Set(events.filter((event) => event.kind === "joined").map((event) => event.nodeId));
}

export function departedNodes(events: MembershipEvent[]): string[] {
	return [...new Set(events.filter((event) => event.kind === "left").map((event) => event.nodeId))];
}

function nodeIdFromPath(file: string): string {
	const segments = file.split(/[\\/]/).filter(Boolean);
	return segments.length > 1 ? segments[0] : path.basename(file).replace(/\.log.*$/i, "");
}
