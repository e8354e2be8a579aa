import path from "node:path";
import type { NetgateConfig } from "../config/schema.js";
import { ReleaseError } from "../core/errors.js";
import { isReleaseCommit } from "../core/plan.js";
import type { Trigger } from "../core/types.js";
import type { Clock } from "../core/wait-until.js";
import { acquireLock } from "../store/file-lock.js";
import { type ConventionalCommit, type SemVer, bumpFor, formatVersion, nextVersion, parseCommit, parseVersion } from "./conventional.js";
import type { GitClient } from "./git.js";
import { readManifestVersion, writeManifestVersion } from "./manifest.js";

export type ReleaseConfig = NetgateConfig["release"];

export type ReleaseDecision = { allowed: true } | { allowed: false; reason: string };

export function evaluateReleaseTrigger(trigger: Trigger, config: ReleaseConfig): ReleaseDecision {
	if (trigger.event !== "push") {
		return { allowed: false, reason: `releases run on push, not ${trigger.event}` };
	}
	if (trigger.ref !== `refs/heads/${config.trunk}`) {
		return { allowed: false, reason: `${trigger.ref} is not the trunk (${config.trunk})` };
	}
	if (config.owner && trigger.owner !== config.owner) {
		return { allowed: false, reason: `repository owner ${trigger.owner ?? "(unknown)"} is not ${config.owner}` };
	}
	if (isReleaseCommit(trigger, config.marker)) {
		return { allowed: false, reason: "head commit is a release commit" };
	}
	return { allowed: true };
}

export type ReleaseResult =
	| { status: "released"; tag: string; version: string; commits: number }
	| { status: "planned"; tag: string; version: string; commits: number }
	| { status: "noop"; reason: string };

export type AdvanceReleaseOptions = {
	repoRoot: string;
	stateDir: string;
	config: ReleaseConfig;
	git: GitClient;
	token?: string;
	dryRun?: boolean;
	clock?: Clock;
	log?: (line: string) => void;
};

/**
 * Cuts the next release from the conventional commits since the last tag.
 * Serialized by a file lock under the state directory; running it again
 * after a release finds nothing new and returns `noop`.
 */
export async function advanceRelease(options: AdvanceReleaseOptions): Promise<ReleaseResult> {
	const { config, git } = options;
	const lock = await acquireLock({
		lockPath: path.join(options.stateDir, "release.lock"),
		timeoutMs: config.lockTimeoutMs,
		clock: options.clock,
		onWarning: options.log,
	});

	try {
		const lastTag = await git.lastTag(config.tagPrefix);
		const current = lastTag ? parseVersion(lastTag, config.tagPrefix) : baseVersion(options);
		if (!current) {
			throw new ReleaseError(`Last tag ${lastTag ?? ""} is not a ${config.tagPrefix}MAJOR.MINOR.PATCH version`);
		}

		const commits = (await git.commitsSince(lastTag))
			.filter((commit) => !commit.message.startsWith(config.marker))
			.map((commit) => parseCommit(commit.sha, commit.message))
			.filter((commit): commit is ConventionalCommit => commit !== null);
		const bump = bumpFor(commits);
		if (!bump) {
			return { status: "noop", reason: `no releasable commits since ${lastTag ?? "the first commit"}` };
		}

		const version = formatVersion(nextVersion(current, bump));
		const tag = `${config.tagPrefix}${version}`;
		if (await git.tagExists(tag)) {
			return { status: "noop", reason: `tag ${tag} already exists` };
		}
		options.log?.(`${bump} bump from ${commits.length} commit(s): ${lastTag ?? formatVersion(current)} → ${tag}`);
		if (options.dryRun) {
			return { status: "planned", tag, version, commits: commits.length };
		}

		const manifests = config.manifests.map((manifest) => {
			const file = path.resolve(options.repoRoot, manifest.path);
			writeManifestVersion(file, manifest.kind, version);
			return manifest.path;
		});
		const author = { name: config.authorName, email: config.authorEmail };
		const message = `${config.marker} ${tag}`;
		await git.commit(message, manifests, author);
		let tagged = false;
		try {
			await git.createTag(tag, message, author);
			tagged = true;
			await git.push(config.remote, config.trunk, tag, options.token);
		} catch (error) {
			// Nothing reached the remote; undo locally so the next run cuts the same release.
			options.log?.(`Release ${tag} failed; removing the local release commit${tagged ? " and tag" : ""}`);
			try {
				if (tagged) {
					await git.deleteTag(tag);
				}
				await git.dropLastCommit();
			} catch (rollbackError) {
				throw new ReleaseError(`Release ${tag} failed and its local commit could not be removed`, {
					cause: rollbackError,
				});
			}
			throw error;
		}
		options.log?.(`Released ${tag}`);
		return { status: "released", tag, version, commits: commits.length };
	} finally {
		lock.release();
	}
}

/** Without a tag, the first manifest's version is the starting point. */
function baseVersion(options: AdvanceReleaseOptions): SemVer | null {
	const [manifest] = options.config.manifests;
	if (!manifest) {
		return { major: 0, minor: 0, patch: 0 };
	}
	const version = readManifestVersion(path.resolve(options.repoRoot, manifest.path), manifest.kind);
	return version ? parseVersion(version) : { major: 0, minor: 0, patch: 0 };
}
