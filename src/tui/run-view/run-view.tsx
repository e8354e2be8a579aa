import { Box, Text, useApp } from "ink";
import { useEffect, useReducer, useState } from "react";
import type { RuntimeEvent } from "../../core/engine.js";
import { formatDuration } from "./format.js";
import { applyRuntimeEvent, initialRunViewState } from "./state.js";
import { colorForStatus, renderStatusGlyph, STATUS_LABELS } from "./status.js";

export type RunViewProps = {
	title: string;
	/** Registers a listener for runtime events and returns its unsubscribe. */
	subscribe: (listener: (event: RuntimeEvent) => void) => () => void;
};

const SPINNER_INTERVAL_MS = 80;

export function RunView({ title, subscribe }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const [state, dispatch] = useReducer(applyRuntimeEvent, initialRunViewState);
	const [spinnerIndex, setSpinnerIndex] = useState(0);

	useEffect(() => subscribe(dispatch), [subscribe]);

	useEffect(() => {
		if (state.status !== "running") {
			exit();
			return;
		}
		const timer = setInterval(() => setSpinnerIndex((prev) => prev + 1), SPINNER_INTERVAL_MS);
		return () => clearInterval(timer);
	}, [state.status, exit]);

	const runningJobs = state.jobs.filter((job) => job.status === "running");

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{title} · {state.runId ?? "starting"}
				</Text>
				<Text color={colorForStatus(state.status)}>
					{renderStatusGlyph(state.status, spinnerIndex)} {state.status}
				</Text>
			</Box>

			<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
				{state.jobs.map((job) => (
					<Text key={job.jobId} color={colorForStatus(job.status)}>
						{renderStatusGlyph(job.status, spinnerIndex)} {job.gate ? "◆ " : ""}
						{job.jobId}
						<Text dimColor>
							{" "}
							{STATUS_LABELS[job.status]}
							{job.platform ? ` · ${job.platform}` : ""}
							{job.durationMs ? ` · ${formatDuration(job.durationMs)}` : ""}
							{job.reason ? ` · ${job.reason}` : ""}
							{job.error ? ` · ${job.error}` : ""}
						</Text>
					</Text>
				))}
			</Box>

			{runningJobs.map((job) => (
				<Box key={job.jobId} flexDirection="column" marginTop={1}>
					<Text dimColor>{job.jobId}</Text>
					{job.tail.map((line, index) => (
						<Text key={`${job.jobId}-${index}`} dimColor wrap="truncate-end">
							{line}
						</Text>
					))}
				</Box>
			))}

			{state.gate ? (
				<Box marginTop={1}>
					<Text color={colorForStatus(state.gate.status)}>
						Gate {state.gate.jobId}: {STATUS_LABELS[state.gate.status]}
					</Text>
				</Box>
			) : null}
		</Box>
	);
}
