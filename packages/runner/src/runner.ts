import { errorText } from "./errors.js";
import type { Logger } from "./logger.js";
import { ConsoleReporter, type Reporter } from "./reporter.js";
import type { RunOutcome, Scenario, ScenarioResult } from "./types.js";

export type RunOptions = {
  reporter?: Reporter;
  logger?: Logger;
  // run only these checks (by name); the rest are left out of the outcome
  only?: readonly string[];
};

/**
 * Runs the checks of a scenario one after another against its context.
 * A thrown fault fails that check only; the run stops early only on stopOnFailure
 * or a failed prerequisite. Cleanup always runs.
 */
export async function runScenario<C>(scenario: Scenario<C>, opts: RunOptions = {}): Promise<RunOutcome> {
  const reporter = opts.reporter ?? new ConsoleReporter();
  const checks = opts.only?.length ? scenario.checks.filter((c) => opts.only?.includes(c.name)) : scenario.checks;
  const results: ScenarioResult[] = [];
  const skipped: string[] = [];

  reporter.begin(scenario.title);

  try {
    for (let i = 0; i < checks.length; i++) {
      const check = checks[i];
      reporter.checkStarted(check.name);

      let result: ScenarioResult;
      try {
        const verdict = await check.run(scenario.context);
        result = Object.freeze({ name: check.name, ...verdict });
      } catch (e) {
        opts.logger?.error({ check: check.name, err: e }, "check threw");
        result = Object.freeze({ name: check.name, passed: false, message: `Exception: ${errorText(e)}` });
      }

      results.push(result);
      reporter.checkFinished(result, check);

      if (!result.passed && (scenario.stopOnFailure || check.prerequisite)) {
        skipped.push(...checks.slice(i + 1).map((c) => c.name));
        break;
      }
    }
  } finally {
    if (scenario.cleanup) {
      try {
        await scenario.cleanup(scenario.context);
      } catch (e) {
        opts.logger?.warn({ suite: scenario.suite, err: errorText(e) }, "cleanup failed");
      }
    }
  }

  const passed = results.filter((r) => r.passed).length;
  const outcome: RunOutcome = {
    suite: scenario.suite,
    ok: results.every((r) => r.passed),
    passed,
    failed: results.length - passed,
    results: Object.freeze([...results]),
    skipped: Object.freeze([...skipped]),
  };

  reporter.finish(outcome, scenario.title);
  return outcome;
}
