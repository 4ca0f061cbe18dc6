import { runScenario, type RunOptions } from "../runner.js";
import type { RunOutcome } from "../types.js";
import { debugUiScenario } from "./debug-ui.js";
import type { ScenarioDeps } from "./deps.js";
import { flowScenario } from "./flow.js";
import { integrationScenario } from "./integration.js";
import { sessionScenario } from "./session.js";

export const SCENARIO_NAMES = ["flow", "session", "integration", "debug-ui"] as const;
export type ScenarioName = (typeof SCENARIO_NAMES)[number];

type ScenarioRun = (deps: ScenarioDeps, opts?: RunOptions) => Promise<RunOutcome>;

export const SCENARIOS: Record<ScenarioName, ScenarioRun> = {
  flow: (deps, opts) => runScenario(flowScenario(deps), opts),
  session: (deps, opts) => runScenario(sessionScenario(deps), opts),
  integration: (deps, opts) => runScenario(integrationScenario(deps), opts),
  "debug-ui": (deps, opts) => runScenario(debugUiScenario(deps), opts),
};

export { debugUiScenario, flowScenario, integrationScenario, sessionScenario };
export type { DebugUiContext } from "./debug-ui.js";
export type { ScenarioDeps } from "./deps.js";
export type { FlowContext } from "./flow.js";
export type { IntegrationContext } from "./integration.js";
export type { SessionContext } from "./session.js";
