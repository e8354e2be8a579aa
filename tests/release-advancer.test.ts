import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { LockHeldError } from "../src/core/errors.js";
import type { Trigger } from "../src/core/types.js";
import { advanceRelease, evaluateReleaseTrigger } from "../src/release/advancer.js";
import { acquireLock } from "../src/store/file-lock.js";
import { FakeGit, VirtualClock, testConfig, tmpDir } from "./helpers/fakes.js";

function repo(version: string): { root: string; stateDir: string } {
	const root = tmpDir("release");
	fs.writeFileSync(path.join(root, "package.json"), `${JSON.stringify({ name: "harness", version }, null, 2)}\n`);
	return { root, stateDir: path.join(root, ".netgate") };
}

function readVersion(root: string): unknown {
	return JSON.parse(fs.readFileSync(path.join(root, "package.json"), "utf-8")).version;
}

describe("evaluateReleaseTrigger", () => {
	const config = testConfig({ release: { owner: "acme" } }).release;
	const push: Trigger = { event: "push", ref: "refs/heads/main", message: "feat: churn", owner: "acme" };

	it("allows pushes to the trunk of the owning repository", () => {
		expect(evaluateReleaseTrigger(push, config)).toEqual({ allowed: true });
	});

	it("explains every refusal", () => {
		expect(evaluateReleaseTrigger({ ...push, event: "pull_request" }, config)).toEqual({
			allowed: false,
			reason: "releases run on push, not pull_request",
		});
		expect(evaluateReleaseTrigger({ ...push, ref: "refs/heads/churn" }, config)).toEqual({
			allowed: false,
			reason: "refs/heads/churn is not the trunk (main)",
		});
		expect(evaluateReleaseTrigger({ ...push, owner: "someone-else" }, config)).toEqual({
			allowed: false,
			reason: "repository owner someone-else is not acme",
		});
		expect(evaluateReleaseTrigger({ ...push, message: "chore(release): v0.4.0" }, config)).toEqual({
			allowed: false,
			reason: "head commit is a release commit",
		});
	});
});

describe("advanceRelease", () => {
	it("releases once and finds nothing to do on the next run", async () => {
		const { root, stateDir } = repo("0.3.0");
		const git = new FakeGit();
		git.addCommit("chore: initial import");
		git.tags.set("v0.3.0", 0);
		git.addCommit("feat(client): retry on churn");
		git.addCommit("fix: typo in log line");
		const config = testConfig().release;
		const lines: string[] = [];

		const first = await advanceRelease({
			repoRoot: root,
			stateDir,
			config,
			git,
			token: "test-secret",
			log: (line) => lines.push(line),
		});

		expect(first).toEqual({ status: "released", tag: "v0.3.1", version: "0.3.1", commits: 2 });
		expect(readVersion(root)).toBe("0.3.1");
		expect(git.commits.at(-1)?.message).toBe("chore(release): v0.3.1");
		expect(git.pushes).toEqual([{ remote: "origin", branch: "main", tag: "v0.3.1", token: "test-secret" }]);
		expect(lines).toEqual(["minor bump from 2 commit(s): v0.3.0 → v0.3.1", "Released v0.3.1"]);
		expect(fs.existsSync(path.join(stateDir, "release.lock"))).toBe(false);

		const second = await advanceRelease({ repoRoot: root, stateDir, config, git });
		expect(second).toEqual({ status: "noop", reason: "no releasable commits since v0.3.1" });
		expect(git.pushes).toHaveLength(1);
	});

	it("undoes the local release when the push fails so a rerun can release", async () => {
		const { root, stateDir } = repo("0.3.0");
		const git = new FakeGit();
		git.addCommit("chore: initial import");
		git.tags.set("v0.3.0", 0);
		git.addCommit("fix: join timeout");
		git.failingPushes = 1;
		const config = testConfig().release;
		const lines: string[] = [];

		await expect(
			advanceRelease({ repoRoot: root, stateDir, config, git, log: (line) => lines.push(line) }),
		).rejects.toThrow("remote rejected push");

		expect(lines.at(-1)).toBe("Release v0.3.1 failed; removing the local release commit and tag");
		expect(git.tags.has("v0.3.1")).toBe(false);
		expect(git.commits.map((commit) => commit.message)).toEqual(["chore: initial import", "fix: join timeout"]);
		expect(fs.existsSync(path.join(stateDir, "release.lock"))).toBe(false);

		const retry = await advanceRelease({ repoRoot: root, stateDir, config, git });
		expect(retry).toEqual({ status: "released", tag: "v0.3.1", version: "0.3.1", commits: 1 });
		expect(git.pushes).toEqual([{ remote: "origin", branch: "main", tag: "v0.3.1", token: undefined }]);
	});

	it("starts from the manifest version when nothing is tagged", async () => {
		const { root, stateDir } = repo("1.4.2");
		const git = new FakeGit();
		git.addCommit("feat!: new wire format");

		const result = await advanceRelease({ repoRoot: root, stateDir, config: testConfig().release, git, dryRun: true });

		expect(result).toEqual({ status: "planned", tag: "v2.0.0", version: "2.0.0", commits: 1 });
		expect(readVersion(root)).toBe("1.4.2");
		expect(git.pushes).toEqual([]);
		expect(git.tags.size).toBe(0);
	});

	it("ignores release commits and non-releasable types", async () => {
		const { root, stateDir } = repo("0.3.0");
		const git = new FakeGit();
		git.addCommit("chore(release): v0.3.0");
		git.tags.set("v0.3.0", 0);
		git.addCommit("docs: explain churn");
		git.addCommit("Merge pull request #12");

		expect(await advanceRelease({ repoRoot: root, stateDir, config: testConfig().release, git })).toEqual({
			status: "noop",
			reason: "no releasable commits since v0.3.0",
		});
	});

	it("does not recreate an existing tag", async () => {
		const { root, stateDir } = repo("0.3.0");
		const git = new FakeGit();
		git.addCommit("chore: base");
		git.tags.set("v0.3.1", 0);
		git.addCommit("chore: more");
		git.tags.set("v0.3.0", 1);
		git.addCommit("fix: race in join");

		expect(await advanceRelease({ repoRoot: root, stateDir, config: testConfig().release, git })).toEqual({
			status: "noop",
			reason: "tag v0.3.1 already exists",
		});
	});

	it("waits for the release lock and gives up at its timeout", async () => {
		const { root, stateDir } = repo("0.3.0");
		const held = await acquireLock({
			lockPath: path.join(stateDir, "release.lock"),
			timeoutMs: 1_000,
			clock: new VirtualClock(),
		});

		await expect(
			advanceRelease({
				repoRoot: root,
				stateDir,
				config: testConfig({ release: { lockTimeoutMs: 2_000 } }).release,
				git: new FakeGit(),
				clock: new VirtualClock(),
			}),
		).rejects.toBeInstanceOf(LockHeldError);
		held.release();
	});
});
