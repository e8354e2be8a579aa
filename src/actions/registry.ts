import type { ActionDefinition, ActionRegistry } from "../core/engine.js";
import {
	awaitConvergenceAction,
	buildAction,
	checkDeparturesAction,
	churnAction,
	livenessAction,
	logBundleAction,
	startNetworkAction,
	stopNetworkAction,
	suiteAction,
	timelineAction,
} from "./builtin.js";

const ACTION_REGISTRY: Record<string, ActionDefinition> = {
	build: buildAction,
	"network/start": startNetworkAction,
	"network/await-convergence": awaitConvergenceAction,
	"network/check-departures": checkDeparturesAction,
	"network/liveness": livenessAction,
	"network/stop": stopNetworkAction,
	suite: suiteAction,
	churn: churnAction,
	"diagnostics/timeline": timelineAction,
	"diagnostics/logs": logBundleAction,
};

export function createActionRegistry(extra: Record<string, ActionDefinition> = {}): ActionRegistry {
	return new Map(Object.entries({ ...ACTION_REGISTRY, ...extra }));
}

export function listRegisteredActions(): string[] {
	return Object.keys(ACTION_REGISTRY);
}
