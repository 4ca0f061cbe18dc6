import type { Check, RunOutcome, ScenarioResult } from "./types.js";

export interface Reporter {
  begin(title: string): void;
  checkStarted(name: string): void;
  checkFinished<C>(result: ScenarioResult, check: Check<C>): void;
  finish(outcome: RunOutcome, title: string): void;
}

const RULE = "=".repeat(60);

/** Console report: a banner, one block per check, then the summary. */
export class ConsoleReporter implements Reporter {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  begin(title: string): void {
    this.write("");
    this.write(RULE);
    this.write(title);
    this.write(RULE);
  }

  checkStarted(name: string): void {
    this.write("");
    this.write(`--- ${name} ---`);
  }

  checkFinished<C>(result: ScenarioResult, check: Check<C>): void {
    this.write(`${result.passed ? "✅" : "❌"} ${result.message}`);
    if (result.details && Object.keys(result.details).length && (!result.passed || check.verbose)) {
      this.write(`Details: ${JSON.stringify(result.details, null, 2)}`);
    }
  }

  finish(outcome: RunOutcome, title: string): void {
    this.write("");
    this.write(RULE);
    this.write(`${title} Summary`);
    this.write(RULE);
    for (const r of outcome.results) {
      this.write(`  ${r.passed ? "✅" : "❌"} ${r.name}: ${r.message}`);
    }
    this.write("");
    this.write(`Total: ${outcome.passed} passed, ${outcome.failed} failed`);
    if (outcome.skipped.length) this.write(`Skipped: ${outcome.skipped.join(", ")}`);
    this.write(RULE);
    this.write("");
  }
}

export const silentReporter: Reporter = {
  begin: () => undefined,
  checkStarted: () => undefined,
  checkFinished: () => undefined,
  finish: () => undefined,
};
