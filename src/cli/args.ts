import fs from "node:fs";

export type CliCommand = "run" | "release" | "status";

export type CliOptions = {
	command: CliCommand;
	workflow?: string;
	jobs?: string[];
	event?: string;
	eventPath?: string;
	ref?: string;
	message?: string;
	title?: string;
	actor?: string;
	owner?: string;
	pr?: number;
	platform?: string;
	run?: string;
	dryRun?: boolean;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

const COMMANDS: readonly CliCommand[] = ["run", "release", "status"];

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args.shift() ?? "";
		const known = COMMANDS.find((item) => item === command);
		if (known) {
			options.command = known;
		} else {
			options.errors?.push(`Unknown command: ${command}`);
		}
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--workflow":
				options.workflow = takeValue("--workflow", args, options);
				break;
			case "--job":
				{
					const value = takeValue("--job", args, options);
					if (value) {
						options.jobs = [...(options.jobs ?? []), ...value.split(",").filter(Boolean)];
					}
				}
				break;
			case "--event":
				options.event = takeValue("--event", args, options);
				break;
			case "--event-path":
				options.eventPath = takeValue("--event-path", args, options);
				break;
			case "--ref":
				options.ref = takeValue("--ref", args, options);
				break;
			case "--message":
				options.message = takeValue("--message", args, options);
				break;
			case "--title":
				options.title = takeValue("--title", args, options);
				break;
			case "--actor":
				options.actor = takeValue("--actor", args, options);
				break;
			case "--owner":
				options.owner = takeValue("--owner", args, options);
				break;
			case "--pr":
				{
					const value = takeValue("--pr", args, options);
					if (value) {
						const pr = Number(value);
						if (Number.isInteger(pr) && pr > 0) {
							options.pr = pr;
						} else {
							options.errors?.push(`Invalid value for --pr: ${value} (expected a positive integer)`);
						}
					}
				}
				break;
			case "--platform":
				options.platform = takeValue("--platform", args, options);
				break;
			case "--run":
				options.run = takeValue("--run", args, options);
				break;
			case "--dry-run":
				options.dryRun = true;
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`netgate <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                  Run a workflow and report its gate (default)\n`);
	process.stdout.write(`  release              Cut the next release from conventional commits\n`);
	process.stdout.write(`  status               Show the gate of a stored run\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --workflow <file>     Workflow file name or id\n`);
	process.stdout.write(`  --job <ids>           Comma-separated job ids (their needs are added)\n`);
	process.stdout.write(`  --event <name>        Event name (push, pull_request)\n`);
	process.stdout.write(`  --event-path <file>   Event payload JSON\n`);
	process.stdout.write(`  --ref <ref>           Git ref, e.g. refs/heads/main\n`);
	process.stdout.write(`  --message <text>      Head commit message\n`);
	process.stdout.write(`  --title <text>        Pull request title\n`);
	process.stdout.write(`  --actor <login>       User that triggered the run\n`);
	process.stdout.write(`  --owner <login>       Repository owner\n`);
	process.stdout.write(`  --pr <number>         Pull request number\n`);
	process.stdout.write(`  --platform <label>    Platform for jobs without runs-on\n`);
	process.stdout.write(`  --run <id>            Run id (status)\n`);
	process.stdout.write(`  --dry-run             Plan only; nothing is executed or pushed\n`);
	process.stdout.write(`  --json                Print JSON summary\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
