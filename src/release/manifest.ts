import fs from "node:fs";
import { ReleaseError } from "../core/errors.js";
import type { ManifestConfig } from "../config/schema.js";

const TOML_SECTION = /^\s*\[([^\]]+)\]\s*(?:#.*)?$/;
const TOML_VERSION = /^(\s*version\s*=\s*)"([^"]*)"(.*)$/;

export function readManifestVersion(file: string, kind: ManifestConfig["kind"]): string | null {
	const content = readManifest(file);
	if (kind === "json") {
		const version = parseJsonManifest(file, content).version;
		return typeof version === "string" ? version : null;
	}
	let section = "";
	for (const line of content.split("\n")) {
		const header = line.match(TOML_SECTION);
		if (header) {
			section = header[1].trim();
			continue;
		}
		const version = section === "package" ? line.match(TOML_VERSION) : null;
		if (version) {
			return version[2];
		}
	}
	return null;
}

/** Rewrites only the version; the rest of the file keeps its formatting. */
export function writeManifestVersion(file: string, kind: ManifestConfig["kind"], version: string): void {
	const content = readManifest(file);
	fs.writeFileSync(file, kind === "json" ? setJsonVersion(file, content, version) : setTomlVersion(file, content, version));
}

function setJsonVersion(file: string, content: string, version: string): string {
	const manifest = parseJsonManifest(file, content);
	const indent = content.match(/^[ \t]+(?=")/m)?.[0] ?? "  ";
	const trailing = content.endsWith("\n") ? "\n" : "";
	return `${JSON.stringify({ ...manifest, version }, null, indent)}${trailing}`;
}

function setTomlVersion(file: string, content: string, version: string): string {
	let section = "";
	let replaced = false;
	const lines = content.split("\n").map((line) => {
		const header = line.match(TOML_SECTION);
		if (header) {
			section = header[1].trim();
			return line;
		}
		const match = !replaced && section === "package" ? line.match(TOML_VERSION) : null;
		if (!match) {
			return line;
		}
		replaced = true;
		return `${match[1]}"${version}"${match[3]}`;
	});
	if (!replaced) {
		throw new ReleaseError(`${file} has no [package] version`);
	}
	return lines.join("\n");
}

function readManifest(file: string): string {
	try {
		return fs.readFileSync(file, "utf-8");
	} catch (error) {
		throw new ReleaseError(`Cannot read manifest ${file}`, { cause: error });
	}
}

function parseJsonManifest(file: string, content: string): Record<string, unknown> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw new ReleaseError(`${file} is not valid JSON`, { cause: error });
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new ReleaseError(`${file} must contain a JSON object`);
	}
	return { ...parsed };
}
