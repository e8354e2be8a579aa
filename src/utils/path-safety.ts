import path from "node:path";
import { NetgateError } from "../core/errors.js";

/** Resolves `childPath` under `baseDir`, refusing anything that lands outside it. */
export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	const rel = path.relative(base, resolved);
	if (rel.startsWith("..") || path.isAbsolute(rel)) {
		throw new NetgateError("path", `Invalid ${label} "${childPath}": path escapes ${base}`);
	}
	return resolved;
}

/** Run ids, job ids and platform labels become file names through this. */
export function sanitizePathSegment(value: string, fallback: string): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, 64);
	return normalized.length > 0 && normalized !== "." && normalized !== ".." ? normalized : fallback;
}
