import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import fg from "fast-glob";
import yaml from "js-yaml";
import { TARGETS, targetUrl, type HarnessConfig, type Target } from "./config.js";
import { interpolate, type Env } from "./env.js";
import { ContractError } from "./errors.js";
import { HttpSession, runHttpStep } from "./http.js";
import type { Logger } from "./logger.js";
import { isObj } from "./match.js";
import type { Check, Scenario, Verdict } from "./types.js";
import { fail, guarded, pass } from "./verdict.js";

export type HttpStep = {
  method: string;
  path: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
};

export type Expectation = {
  status?: number | number[];
  contentType?: string | string[];
  bodyContains?: string | string[];
  json?: unknown;
  isArray?: boolean;
  // body parses as a JSON object or array
  jsonBody?: boolean;
  // required keys of the body object, or of the first element under isArray
  fields?: string[];
};

export type Step = { http: HttpStep; expect?: Expectation; target?: Target };

export type ContractScenario = {
  id: string;
  name?: string;
  target?: Target;
  steps: Step[];
};

export type Contract = {
  name: string;
  scenarios: ContractScenario[];
};

export type SuiteFileV1 = {
  version: 1;
  suite: string;
  title?: string;
  target: Target;
  contracts: Contract[];
};

export type ContractContext = {
  config: HarnessConfig;
  http: HttpSession;
};

const TARGET_LABELS: Record<Target, string> = {
  keycloak: "Keycloak",
  backend: "backend",
  frontend: "frontend",
  debugUi: "debug UI",
  debugApi: "debug API",
};

function invalid(msg: string): never {
  throw new ContractError(msg);
}

function parseFile(abs: string): unknown {
  const raw = fs.readFileSync(abs, "utf8");
  if (abs.endsWith(".yml") || abs.endsWith(".yaml")) return yaml.load(raw);
  if (abs.endsWith(".json")) return JSON.parse(raw);
  invalid(`Unsupported file type: ${abs}`);
}

function parseTarget(raw: unknown, where: string): Target | undefined {
  if (raw === undefined) return undefined;
  const t = TARGETS.find((x) => x === raw);
  if (!t) invalid(`${where}: target must be one of ${TARGETS.join(", ")}.`);
  return t;
}

function stringMap(raw: unknown, where: string): Record<string, string> | undefined {
  if (raw === undefined) return undefined;
  if (!isObj(raw)) invalid(`${where} must be an object.`);
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) out[k] = String(v);
  return out;
}

function scalarMap(raw: unknown, where: string): HttpStep["query"] {
  if (raw === undefined) return undefined;
  if (!isObj(raw)) invalid(`${where} must be an object.`);
  const out: Record<string, string | number | boolean> = {};
  for (const [k, v] of Object.entries(raw)) {
    out[k] = typeof v === "number" || typeof v === "boolean" ? v : String(v);
  }
  return out;
}

function oneOrMany<T>(raw: unknown, is: (x: unknown) => x is T, where: string, what: string): T | T[] | undefined {
  if (raw === undefined) return undefined;
  if (is(raw)) return raw;
  if (Array.isArray(raw) && raw.length && raw.every(is)) return raw;
  invalid(`${where} must be ${what} or a non-empty list of them.`);
}

const isNumber = (x: unknown): x is number => typeof x === "number";
const isString = (x: unknown): x is string => typeof x === "string";

function parseExpect(raw: unknown, where: string): Expectation | undefined {
  if (raw === undefined) return undefined;
  if (!isObj(raw)) invalid(`${where}: expect must be an object.`);

  const fields = raw.fields;
  if (fields !== undefined && !(Array.isArray(fields) && fields.every(isString))) {
    invalid(`${where}: expect.fields must be a list of strings.`);
  }
  if (raw.isArray !== undefined && typeof raw.isArray !== "boolean") {
    invalid(`${where}: expect.isArray must be true or false.`);
  }
  if (raw.jsonBody !== undefined && typeof raw.jsonBody !== "boolean") {
    invalid(`${where}: expect.jsonBody must be true or false.`);
  }

  return {
    status: oneOrMany(raw.status, isNumber, `${where}: expect.status`, "a number"),
    contentType: oneOrMany(raw.contentType, isString, `${where}: expect.contentType`, "a string"),
    bodyContains: oneOrMany(raw.bodyContains, isString, `${where}: expect.bodyContains`, "a string"),
    json: raw.json,
    isArray: typeof raw.isArray === "boolean" ? raw.isArray : undefined,
    jsonBody: typeof raw.jsonBody === "boolean" ? raw.jsonBody : undefined,
    fields: Array.isArray(fields) ? fields.filter(isString) : undefined,
  };
}

function parseHttp(rawHttp: unknown, where: string): HttpStep {
  if (!isObj(rawHttp)) invalid(`${where}: http must be object.`);
  const method = String(rawHttp.method ?? "").toUpperCase();
  const pth = String(rawHttp.path ?? "");
  if (!method) invalid(`${where}: http.method is required.`);
  if (!pth.startsWith("/")) invalid(`${where}: http.path must start with "/".`);

  return {
    method,
    path: pth,
    headers: stringMap(rawHttp.headers, `${where}: http.headers`),
    query: scalarMap(rawHttp.query, `${where}: http.query`),
    body: rawHttp.body,
  };
}

function normalizeScenario(raw: unknown, where: string): ContractScenario {
  if (!isObj(raw)) invalid(`${where}: scenario must be an object.`);
  const id = String(raw.id ?? "").trim();
  if (!id) invalid(`${where}: scenario id required.`);
  const at = `${where} scenario ${id}`;

  const name = typeof raw.name === "string" && raw.name.trim() ? raw.name.trim() : undefined;
  const target = parseTarget(raw.target, at);

  // steps mode
  if (Array.isArray(raw.steps)) {
    if (!raw.steps.length) invalid(`${at}: steps must not be empty.`);
    const steps: Step[] = raw.steps.map((st: unknown, i: number) => {
      if (!isObj(st) || !isObj(st.http)) invalid(`${at}: steps[${i}] must include http.`);
      return {
        http: parseHttp(st.http, `${at} steps[${i}]`),
        expect: parseExpect(st.expect, `${at} steps[${i}]`),
        target: parseTarget(st.target, `${at} steps[${i}]`),
      };
    });
    return { id, name, target, steps };
  }

  // single step
  if (isObj(raw.http)) {
    return { id, name, target, steps: [{ http: parseHttp(raw.http, at), expect: parseExpect(raw.expect, at) }] };
  }

  invalid(`${at}: must contain steps[] or http.`);
}

/** Suites shipped at the repository root; src/ and the bundled dist/ sit at the same depth below it. */
export const SHIPPED_SUITES_DIR = fileURLToPath(new URL("../../../contracts/", import.meta.url));

/** Glob for shipped suite files, independent of the working directory. */
export function shippedSuites(file: string): string {
  return `${fg.convertPathToPattern(path.resolve(SHIPPED_SUITES_DIR))}/${file}`;
}

/** Reads and validates a suite file; `${NAME}` placeholders are filled from env. */
export function loadSuite(filePath: string, env: Env = process.env): SuiteFileV1 {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) invalid(`Suite file not found: ${abs}`);

  const data = interpolate(parseFile(abs), env);
  if (!isObj(data)) invalid("Suite file must be an object.");

  if (data.version !== 1) invalid(`Unsupported version: ${String(data.version)} (expected 1)`);
  if (typeof data.suite !== "string" || !data.suite.trim()) invalid("suite must be a string.");
  const target = parseTarget(data.target, `suite ${data.suite}`) ?? invalid(`suite ${data.suite}: target is required.`);
  if (!Array.isArray(data.contracts) || data.contracts.length === 0) invalid("contracts must be a non-empty array.");

  const contracts: Contract[] = data.contracts.map((c: unknown, ci: number) => {
    if (!isObj(c)) invalid(`contracts[${ci}] must be an object.`);
    if (typeof c.name !== "string" || !c.name.trim()) invalid(`contracts[${ci}].name must be a string.`);
    const contractName = c.name;
    if (!Array.isArray(c.scenarios) || c.scenarios.length === 0) {
      invalid(`contracts[${ci}].scenarios must be non-empty array.`);
    }

    const scenarios = c.scenarios.map((s: unknown) => normalizeScenario(s, `Contract "${contractName}"`));

    const seen = new Set<string>();
    for (const s of scenarios) {
      if (seen.has(s.id)) invalid(`Duplicate scenario id in contract "${contractName}": ${s.id}`);
      seen.add(s.id);
    }

    return { name: contractName, scenarios };
  });

  const title = typeof data.title === "string" && data.title.trim() ? data.title.trim() : undefined;
  return { version: 1, suite: data.suite, title, target, contracts };
}

function scenarioCheck(suite: SuiteFileV1, scenario: ContractScenario): Check<ContractContext> {
  const target = scenario.target ?? suite.target;

  return {
    name: scenario.name ?? scenario.id,
    run: guarded(TARGET_LABELS[target], async (ctx): Promise<Verdict> => {
      const verdicts: Verdict[] = [];
      for (const st of scenario.steps) {
        const base = targetUrl(ctx.config, st.target ?? target);
        verdicts.push(await runHttpStep(ctx.http, base, st.http, st.expect));
      }
      if (verdicts.length === 1) return verdicts[0];

      const failed = verdicts.filter((v) => !v.passed);
      const steps = verdicts.map((v, i) => ({ step: `${scenario.steps[i].http.method} ${scenario.steps[i].http.path}`, ...v }));
      return failed.length
        ? fail(failed.map((v) => v.message).join(" "), { steps })
        : pass(`${verdicts.length} steps passed`, { steps });
    }),
  };
}

export function contractScenario(
  suite: SuiteFileV1,
  deps: { config: HarnessConfig; logger?: Logger; http?: HttpSession }
): Scenario<ContractContext> {
  const http = deps.http ?? new HttpSession({ timeoutMs: deps.config.timeouts.probeMs, logger: deps.logger });
  return {
    suite: suite.suite,
    title: suite.title ?? `Contract Suite: ${suite.suite}`,
    context: { config: deps.config, http },
    checks: suite.contracts.flatMap((c) => c.scenarios.map((s) => scenarioCheck(suite, s))),
  };
}
