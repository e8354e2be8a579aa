import { CancelledError } from "./errors.js";

export type RunTicket = {
	runId: string;
	key: string;
	signal: AbortSignal;
	/** Marks the run as finished so a newer run waiting on this key may start. */
	release(): void;
};

export interface ConcurrencyGate {
	enter(key: string, runId: string): Promise<RunTicket>;
}

type ActiveRun = {
	runId: string;
	controller: AbortController;
	done: Promise<void>;
};

/**
 * One active run per key. Entering a key aborts the run that holds it and
 * resolves only once that run has released its ticket.
 */
export class InProcessConcurrency implements ConcurrencyGate {
	private readonly active = new Map<string, ActiveRun>();

	async enter(key: string, runId: string): Promise<RunTicket> {
		const previous = this.active.get(key);
		const controller = new AbortController();
		let markDone: () => void = () => undefined;
		const done = new Promise<void>((resolve) => {
			markDone = resolve;
		});
		this.active.set(key, { runId, controller, done });

		if (previous) {
			previous.controller.abort(new CancelledError(`Superseded by run ${runId}`));
			await previous.done;
		}

		let released = false;
		return {
			runId,
			key,
			signal: controller.signal,
			release: () => {
				if (released) {
					return;
				}
				released = true;
				if (this.active.get(key)?.runId === runId) {
					this.active.delete(key);
				}
				markDone();
			},
		};
	}

	activeRun(key: string): string | undefined {
		return this.active.get(key)?.runId;
	}
}
