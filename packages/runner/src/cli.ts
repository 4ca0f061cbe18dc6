#!/usr/bin/env node
import "dotenv/config";
import fg from "fast-glob";
import { Command } from "commander";
import { loadConfig, type ConfigOverrides, type HarnessConfig } from "./config.js";
import { contractScenario, loadSuite, shippedSuites } from "./contract.js";
import { ConfigError, ContractError, errorText } from "./errors.js";
import { makeLogger, type Logger } from "./logger.js";
import { buildReport, writeReport } from "./report.js";
import { runScenario, type RunOptions } from "./runner.js";
import { SCENARIOS, SCENARIO_NAMES, type ScenarioName } from "./scenarios/index.js";
import type { RunOutcome } from "./types.js";

type CommonOpts = {
  report: string;
  only: string[];
  backendUrl?: string;
  frontendUrl?: string;
  keycloakUrl?: string;
  headed?: boolean;
};

type SuiteOpts = CommonOpts & { suite: string };

type Work = (config: HarnessConfig, logger: Logger, run: RunOptions) => Promise<RunOutcome[]>;

const DEBUG_UI_SUITE = shippedSuites("debug-ui.yml");
const ALL_SUITES = shippedSuites("*.yml");

const program = new Command();

program.name("anybank-e2e").description("Black-box end-to-end checks for an AnyBank deployment.").version("0.1.0");

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--report <path>", "JSON report output path", "e2e-report.json")
    .option("--only <check>", "Run only this check by name (repeatable)", collect, [])
    .option("--backend-url <url>", "Backend base URL (defaults to BACKEND_URL)")
    .option("--frontend-url <url>", "Frontend base URL (defaults to FRONTEND_URL)")
    .option("--keycloak-url <url>", "Keycloak base URL (defaults to KEYCLOAK_URL)")
    .option("--headed", "Show the browser window");
}

function overrides(opts: CommonOpts): ConfigOverrides {
  return {
    backendUrl: opts.backendUrl,
    frontendUrl: opts.frontendUrl,
    keycloakUrl: opts.keycloakUrl,
    headless: opts.headed ? false : undefined,
  };
}

/** Suites are loaded and validated before any of them runs. */
async function runContracts(glob: string, config: HarnessConfig, logger: Logger, run: RunOptions): Promise<RunOutcome[]> {
  const files = (await fg(glob)).sort();
  if (!files.length) throw new ContractError(`No suite files matched: ${glob}`);

  const suites = files.map((f) => loadSuite(f));
  const outcomes: RunOutcome[] = [];
  for (const suite of suites) {
    outcomes.push(await runScenario(contractScenario(suite, { config, logger }), run));
  }
  return outcomes;
}

function runNamed(name: ScenarioName, config: HarnessConfig, logger: Logger, run: RunOptions): Promise<RunOutcome> {
  return SCENARIOS[name]({ config, logger: logger.child({ suite: name }) }, run);
}

async function execute(command: string, opts: CommonOpts, work: Work): Promise<void> {
  const logger = makeLogger({ command });

  let code: number;
  try {
    const config = loadConfig(process.env, overrides(opts));

    console.log(`\n🏦 AnyBank e2e: ${command}`);
    console.log(`Backend:  ${config.backendUrl}`);
    console.log(`Frontend: ${config.frontendUrl}`);
    console.log(`Keycloak: ${config.keycloak.url} (realm ${config.keycloak.realm})`);

    const outcomes = await work(config, logger, { logger, only: opts.only });
    const report = buildReport(outcomes);
    const out = writeReport(opts.report, report);

    console.log(`Overall: ${report.passed} passed, ${report.failed} failed`);
    console.log(`Report written: ${out}`);
    code = report.ok ? 0 : 1;
  } catch (e) {
    if (!(e instanceof ConfigError) && !(e instanceof ContractError)) throw e;
    console.error(`❌ ${e.message}`);
    code = 2;
  }

  logger.flush();
  process.exit(code);
}

for (const name of SCENARIO_NAMES) {
  if (name === "debug-ui") continue;
  withCommonOptions(program.command(name).description(`Run the ${name} scenario`)).action((opts: CommonOpts) =>
    execute(name, opts, async (config, logger, run) => [await runNamed(name, config, logger, run)])
  );
}

withCommonOptions(
  program
    .command("debug-ui")
    .description("Run the debug control plane contract suite, then its behavioural checks")
    .option("--suite <glob>", "Contract suite for the debug UI", DEBUG_UI_SUITE)
).action((opts: SuiteOpts) =>
  execute("debug-ui", opts, async (config, logger, run) => [
    ...(await runContracts(opts.suite, config, logger, run)),
    await runNamed("debug-ui", config, logger, run),
  ])
);

withCommonOptions(
  program
    .command("contracts")
    .description("Run declarative contract suites")
    .option("--suite <glob>", "Suite file path or glob", ALL_SUITES)
).action((opts: SuiteOpts) => execute("contracts", opts, (config, logger, run) => runContracts(opts.suite, config, logger, run)));

withCommonOptions(
  program
    .command("all")
    .description("Run every scenario and the debug UI contract suite")
    .option("--suite <glob>", "Contract suite for the debug UI", DEBUG_UI_SUITE)
).action((opts: SuiteOpts) =>
  execute("all", opts, async (config, logger, run) => {
    const outcomes: RunOutcome[] = [];
    for (const name of SCENARIO_NAMES) {
      if (name === "debug-ui") outcomes.push(...(await runContracts(opts.suite, config, logger, run)));
      outcomes.push(await runNamed(name, config, logger, run));
    }
    return outcomes;
  })
);

program
  .command("parse")
  .argument("<file>", "Suite file (.yml/.yaml or .json)")
  .option("--pretty", "Pretty-print JSON")
  .action((file: string, opts: { pretty?: boolean }) => {
    try {
      const suite = loadSuite(file);
      console.log(opts.pretty ? JSON.stringify(suite, null, 2) : JSON.stringify(suite));
    } catch (e) {
      if (!(e instanceof ContractError)) throw e;
      console.error(`❌ ${e.message}`);
      process.exit(2);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`❌ ${errorText(e)}`);
  process.exit(1);
});
