import { CommandError, ReleaseError } from "../core/errors.js";
import type { CommandResult, CommandRunner, OutputSource } from "../process/runner.js";

export type CommitInfo = {
	sha: string;
	message: string;
};

export type Author = {
	name: string;
	email: string;
};

export interface GitClient {
	lastTag(prefix: string): Promise<string | null>;
	/** Commits reachable from HEAD but not from `since`, oldest first. */
	commitsSince(since: string | null): Promise<CommitInfo[]>;
	tagExists(tag: string): Promise<boolean>;
	commit(message: string, paths: string[], author: Author): Promise<void>;
	createTag(tag: string, message: string, author: Author): Promise<void>;
	push(remote: string, branch: string, tag: string, token?: string): Promise<void>;
	deleteTag(tag: string): Promise<void>;
	/** Drops the last commit and restores the files it changed. */
	dropLastCommit(): Promise<void>;
}

const FIELD_SEPARATOR = "\x1f";
const RECORD_SEPARATOR = "\x1e";

export class CliGitClient implements GitClient {
	constructor(
		private readonly runner: CommandRunner,
		private readonly cwd: string,
		private readonly onOutput?: (chunk: string, source: OutputSource) => void,
	) {}

	async lastTag(prefix: string): Promise<string | null> {
		const result = await this.git(["describe", "--tags", "--abbrev=0", "--match", `${prefix}*`], false);
		return result.exitCode === 0 ? result.stdout.trim() || null : null;
	}

	async commitsSince(since: string | null): Promise<CommitInfo[]> {
		const range = since ? [`${since}..HEAD`] : ["HEAD"];
		const result = await this.git([
			"log",
			"--reverse",
			`--format=%H${FIELD_SEPARATOR}%B${RECORD_SEPARATOR}`,
			...range,
		]);
		return result.stdout
			.split(RECORD_SEPARATOR)
			.map((record) => record.trim())
			.filter((record) => record.length > 0)
			.map((record) => {
				const [sha = "", message = ""] = record.split(FIELD_SEPARATOR);
				return { sha: sha.trim(), message: message.trim() };
			});
	}

	async tagExists(tag: string): Promise<boolean> {
		const result = await this.git(["rev-parse", "--verify", "--quiet", `refs/tags/${tag}`], false);
		return result.exitCode === 0;
	}

	async commit(message: string, paths: string[], author: Author): Promise<void> {
		await this.git(["add", "--", ...paths]);
		await this.git([...identity(author), "commit", "-m", message]);
	}

	async createTag(tag: string, message: string, author: Author): Promise<void> {
		await this.git([...identity(author), "tag", "-a", tag, "-m", message]);
	}

	async push(remote: string, branch: string, tag: string, token?: string): Promise<void> {
		const auth = token ? ["-c", `http.extraheader=AUTHORIZATION: bearer ${token}`] : [];
		await this.git([...auth, "push", "--atomic", remote, `HEAD:refs/heads/${branch}`, `refs/tags/${tag}`]);
	}

	async deleteTag(tag: string): Promise<void> {
		await this.git(["tag", "-d", tag]);
	}

	async dropLastCommit(): Promise<void> {
		await this.git(["reset", "--keep", "HEAD~1"]);
	}

	private async git(args: string[], check = true): Promise<CommandResult> {
		const result = await this.runner.run({ command: "git", args, cwd: this.cwd, onOutput: this.onOutput });
		if (check && result.exitCode !== 0) {
			const subcommand = args.find((arg) => !arg.startsWith("-") && !arg.includes("=")) ?? "";
			throw new ReleaseError(`git ${subcommand} failed`, {
				cause: new CommandError("git", result.exitCode, result.stderr.trim()),
			});
		}
		return result;
	}
}

function identity(author: Author): string[] {
	return ["-c", `user.name=${author.name}`, "-c", `user.email=${author.email}`];
}
