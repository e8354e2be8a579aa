import fs from "node:fs";
import { z } from "zod";
import { NetgateError } from "../core/errors.js";
import type { Trigger } from "../core/types.js";
import type { CliOptions } from "./args.js";

const EventPayloadSchema = z.object({
	ref: z.string().optional(),
	after: z.string().optional(),
	head_commit: z
		.object({
			id: z.string().optional(),
			message: z.string().optional(),
		})
		.nullish(),
	pull_request: z
		.object({
			number: z.number().int().optional(),
			title: z.string().optional(),
			head: z.object({ sha: z.string().optional() }).optional(),
		})
		.optional(),
	repository: z.object({ owner: z.object({ login: z.string().optional() }).optional() }).optional(),
	sender: z.object({ login: z.string().optional() }).optional(),
});

export type EventPayload = z.infer<typeof EventPayloadSchema>;

export function readEventPayload(file: string): EventPayload {
	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(file, "utf-8"));
	} catch (error) {
		throw new NetgateError("config", `Cannot read event payload ${file}`, { cause: error });
	}
	const result = EventPayloadSchema.safeParse(raw);
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new NetgateError(
			"config",
			`Invalid event payload ${file} at ${issue?.path.join(".") || "(root)"}: ${issue?.message ?? "unknown"}`,
		);
	}
	return result.data;
}

/** Flags win over payload fields; the payload wins over defaults. */
export function resolveTrigger(options: CliOptions, payload: EventPayload = {}, defaultRef = "refs/heads/main"): Trigger {
	const pr = payload.pull_request;
	const prNumber = options.pr ?? pr?.number;
	const event = options.event ?? (pr ? "pull_request" : "push");
	const prRef = event === "pull_request" && prNumber !== undefined ? `refs/pull/${prNumber}/merge` : undefined;
	return {
		event,
		ref: options.ref ?? payload.ref ?? prRef ?? defaultRef,
		message: options.message ?? payload.head_commit?.message ?? "",
		title: options.title ?? pr?.title,
		actor: options.actor ?? payload.sender?.login,
		owner: options.owner ?? payload.repository?.owner?.login,
		prNumber,
		sha: payload.head_commit?.id ?? pr?.head?.sha ?? payload.after,
	};
}
