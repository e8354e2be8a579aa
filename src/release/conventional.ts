export type ConventionalCommit = {
	sha: string;
	type: string;
	scope?: string;
	breaking: boolean;
	subject: string;
};

export type Bump = "major" | "minor" | "patch";

export type SemVer = {
	major: number;
	minor: number;
	patch: number;
};

const HEADER_PATTERN = /^(\w+)(?:\(([^)]*)\))?(!)?:\s+(.+)$/;
const BREAKING_FOOTER = /^BREAKING[ -]CHANGE:/m;
const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

/** Returns null for messages that do not follow the conventional commit header. */
export function parseCommit(sha: string, message: string): ConventionalCommit | null {
	const [header = "", ...body] = message.split("\n");
	const match = header.trim().match(HEADER_PATTERN);
	if (!match) {
		return null;
	}
	const [, type, scope, bang, subject] = match;
	return {
		sha,
		type: type.toLowerCase(),
		scope: scope || undefined,
		breaking: bang === "!" || BREAKING_FOOTER.test(body.join("\n")),
		subject,
	};
}

export function bumpFor(commits: ConventionalCommit[]): Bump | null {
	if (commits.some((commit) => commit.breaking)) {
		return "major";
	}
	if (commits.some((commit) => commit.type === "feat")) {
		return "minor";
	}
	if (commits.some((commit) => commit.type === "fix" || commit.type === "perf")) {
		return "patch";
	}
	return null;
}

export function parseVersion(value: string, prefix = ""): SemVer | null {
	const raw = prefix && value.startsWith(prefix) ? value.slice(prefix.length) : value;
	const match = raw.match(VERSION_PATTERN);
	if (!match) {
		return null;
	}
	return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

export function formatVersion(version: SemVer): string {
	return `${version.major}.${version.minor}.${version.patch}`;
}

/** Below 1.0.0 every bump is one level smaller: breaking → minor, feat → patch. */
export function nextVersion(current: SemVer, bump: Bump): SemVer {
	const effective: Bump =
		current.major === 0 ? (bump === "major" ? "minor" : "patch") : bump;
	switch (effective) {
		case "major":
			return { major: current.major + 1, minor: 0, patch: 0 };
		case "minor":
			return { major: current.major, minor: current.minor + 1, patch: 0 };
		case "patch":
			return { major: current.major, minor: current.minor, patch: current.patch + 1 };
	}
}
