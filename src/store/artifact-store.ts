import crypto from "node:crypto";
import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { ArtifactExistsError, NetgateError } from "../core/errors.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export type ArtifactRef = {
	key: string;
	size: number;
	sha256: string;
};

/**
 * Write-once blob storage. A key can be published exactly once; readers may
 * fetch it concurrently any number of times.
 */
export interface ArtifactStore {
	put(key: string, blob: Uint8Array): Promise<ArtifactRef>;
	get(key: string): Promise<Uint8Array | null>;
	has(key: string): Promise<boolean>;
	list(prefix?: string): Promise<string[]>;
}

export function artifactKeyFor(runId: string): string {
	return `artifacts-${sanitizePathSegment(runId, "run")}.tar.gz`;
}

export function diagnosticsKeyFor(
	runId: string,
	suite: string,
	platform: string,
	file: string,
): string {
	return [
		"diagnostics",
		sanitizePathSegment(runId, "run"),
		`${sanitizePathSegment(suite, "suite")}-${sanitizePathSegment(platform, "platform")}`,
		sanitizePathSegment(file, "artifact"),
	].join("/");
}

export function validateArtifactKey(key: string): string[] {
	const segments = key.split("/");
	const valid =
		segments.length > 0 &&
		segments.every(
			(segment) => segment.length > 0 && segment !== "." && segment !== ".." && sanitizePathSegment(segment, "") === segment,
		);
	if (!valid) {
		throw new NetgateError("artifact", `Invalid artifact key: ${key}`);
	}
	return segments;
}

export class FileArtifactStore implements ArtifactStore {
	constructor(private readonly baseDir: string) {}

	async put(key: string, blob: Uint8Array): Promise<ArtifactRef> {
		const target = this.pathFor(key);
		await fs.mkdir(path.dirname(target), { recursive: true });

		const temp = `${target}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
		await fs.writeFile(temp, blob);
		try {
			// link() fails with EEXIST rather than replacing a published artifact.
			await fs.link(temp, target);
		} catch (error) {
			if (isErrno(error, "EEXIST")) {
				throw new ArtifactExistsError(key);
			}
			throw error;
		} finally {
			await fs.rm(temp, { force: true });
		}

		return {
			key,
			size: blob.byteLength,
			sha256: crypto.createHash("sha256").update(blob).digest("hex"),
		};
	}

	async get(key: string): Promise<Uint8Array | null> {
		try {
			return new Uint8Array(await fs.readFile(this.pathFor(key)));
		} catch (error) {
			if (isErrno(error, "ENOENT")) {
				return null;
			}
			throw error;
		}
	}

	async has(key: string): Promise<boolean> {
		try {
			await fs.access(this.pathFor(key));
			return true;
		} catch {
			return false;
		}
	}

	async list(prefix = ""): Promise<string[]> {
		const keys: string[] = [];
		const walk = async (dir: string, relative: string[]): Promise<void> => {
			let entries: Dirent[];
			try {
				entries = await fs.readdir(dir, { withFileTypes: true });
			} catch (error) {
				if (isErrno(error, "ENOENT")) {
					return;
				}
				throw error;
			}
			for (const entry of entries) {
				if (entry.isDirectory()) {
					await walk(path.join(dir, entry.name), [...relative, entry.name]);
				} else if (entry.isFile() && !entry.name.endsWith(".tmp")) {
					keys.push([...relative, entry.name].join("/"));
				}
			}
		};
		await walk(this.baseDir, []);
		return keys.filter((key) => key.startsWith(prefix)).sort();
	}

	private pathFor(key: string): string {
		const segments = validateArtifactKey(key);
		return ensureWithinBase(this.baseDir, path.join(...segments), "artifact key");
	}
}

function isErrno(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}
