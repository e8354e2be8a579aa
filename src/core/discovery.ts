import fs from "node:fs";
import path from "node:path";
import { parseWorkflow } from "./parser.js";
import type { Workflow } from "./types.js";

export function findWorkflowFiles(repoRoot: string, workflowsDir: string): string[] {
	const dir = path.resolve(repoRoot, workflowsDir);
	if (!fs.existsSync(dir)) {
		return [];
	}

	return fs
		.readdirSync(dir)
		.filter((file) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file) => path.join(dir, file));
}

export function discoverWorkflows(repoRoot: string, workflowsDir: string): Workflow[] {
	return findWorkflowFiles(repoRoot, workflowsDir).map((workflowPath) => parseWorkflow(workflowPath));
}

export function resolveWorkflow(workflows: Workflow[], selector?: string): Workflow | undefined {
	if (!selector) {
		return workflows.length === 1 ? workflows[0] : undefined;
	}
	return workflows.find(
		(wf) => wf.id.endsWith(selector) || path.basename(wf.path) === selector || wf.name === selector,
	);
}
