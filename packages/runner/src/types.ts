export type Details = Record<string, unknown>;

export type Verdict = {
  passed: boolean;
  message: string;
  details?: Details;
};

export type ScenarioResult = Readonly<{
  name: string;
  passed: boolean;
  message: string;
  details?: Readonly<Details>;
}>;

export type Check<C> = {
  name: string;
  run: (ctx: C) => Promise<Verdict>;
  // a failed prerequisite stops the scenario; later checks would only fail noisily
  prerequisite?: boolean;
  // print details even when the check passed
  verbose?: boolean;
};

export type Scenario<C> = {
  suite: string;
  title: string;
  context: C;
  checks: Check<C>[];
  stopOnFailure?: boolean;
  cleanup?: (ctx: C) => Promise<void>;
};

export type RunOutcome = {
  suite: string;
  ok: boolean;
  passed: number;
  failed: number;
  results: readonly ScenarioResult[];
  skipped: readonly string[];
};

export type RunReport = {
  total: number;
  passed: number;
  failed: number;
  ok: boolean;
  suites: RunOutcome[];
};
