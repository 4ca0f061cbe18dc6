import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { SHIPPED_SUITES_DIR, contractScenario, loadSuite } from "../../src/contract.js";
import { silentReporter } from "../../src/reporter.js";
import { runScenario } from "../../src/runner.js";
import { debugUiScenario } from "../../src/scenarios/debug-ui.js";
import { FakeAnyBank, type FakeOptions } from "../fixtures/fake-anybank.js";

const DEBUG_UI_SUITE = path.join(SHIPPED_SUITES_DIR, "debug-ui.yml");

let bank: FakeAnyBank;

async function startBank(opts?: FakeOptions): Promise<void> {
  bank = new FakeAnyBank(opts);
  await bank.start();
}

afterEach(async () => {
  await bank.stop();
});

describe("debug-ui scenario", () => {
  it("passes every check against a working control plane", async () => {
    await startBank();
    const outcome = await runScenario(debugUiScenario({ config: bank.config() }), { reporter: silentReporter });

    expect(outcome.results.map((r) => [r.name, r.message])).toEqual([
      ["SSE Backend Direct", "Backend SSE endpoint responds correctly"],
      ["SSE via Frontend Proxy", "Frontend SSE proxy responds correctly"],
      ["Debug API Auth Decode", "JWT decode endpoint works (returned invalid for test token)"],
      ["Session Debug Visibility", "Session created for jdoe@example.com and visible in debug UI"],
      ["Session Timeline", "Timeline retrieved for session dbg-sess-1..."],
      ["Session Timeline (Workflow Path)", "Timeline retrieved via /workflows/ path for session dbg-sess-1..."],
      ["Session Timeline with Actions", "Timeline shows login event and tenant switch to 'Personal'"],
      ["Risk Controls (SET/CLEAR)", "Risk override set to 75 and cleared successfully"],
      ["Policy List", "Got 2 policies"],
      ["Policy Evaluate", "Policy evaluation returned allow=false"],
      ["People Page Personal vs Business", "Personal tenant has 1 users, business has 2 users"],
    ]);
    expect(outcome.ok).toBe(true);
    expect(bank.riskScore).toBeNull();

    const visibility = outcome.results[3].details;
    expect(visibility).toMatchObject({ session_id: "dbg-sess-1", token_visible: true, total_sessions: 1 });
    expect(outcome.results[5].details).toMatchObject({ missing_session_fields: [] });
  });

  it("spots the HTML fallback behind the frontend proxy", async () => {
    await startBank({ proxySseAsHtml: true });
    const outcome = await runScenario(debugUiScenario({ config: bank.config() }), {
      reporter: silentReporter,
      only: ["SSE Backend Direct", "SSE via Frontend Proxy"],
    });

    expect(outcome.results[0].passed).toBe(true);
    expect(outcome.results[1]).toMatchObject({
      passed: false,
      message:
        "Wrong content type: text/html (expected text/event-stream). The proxy may be returning the HTML fallback instead of forwarding to the backend.",
    });
  });

  it("clears a risk override left behind by an interrupted run", async () => {
    await startBank();
    const scenario = debugUiScenario({ config: bank.config() });
    bank.riskScore = 75;
    scenario.context.riskOverrideSet = true;

    await scenario.cleanup?.(scenario.context);

    expect(bank.riskScore).toBeNull();
    expect(scenario.context.riskOverrideSet).toBe(false);
  });

  it("cannot build a timeline without credentials or sessions", async () => {
    await startBank();
    const outcome = await runScenario(debugUiScenario({ config: bank.config({ TEST_USER_PASSWORD: "wrong-password" }) }), {
      reporter: silentReporter,
      only: ["Session Debug Visibility", "Session Timeline"],
    });

    expect(outcome.results.map((r) => r.message)).toEqual([
      "Keycloak auth failed: 401",
      "No sessions available to test timeline",
    ]);
  });
});

describe("debug-ui contract suite", () => {
  it("holds against the control plane", async () => {
    await startBank();
    const suite = loadSuite(DEBUG_UI_SUITE);
    const outcome = await runScenario(contractScenario(suite, { config: bank.config() }), { reporter: silentReporter });

    const failures = outcome.results.filter((r) => !r.passed).map((r) => `${r.name}: ${r.message}`);
    expect(failures).toEqual([]);
    expect(outcome.passed).toBe(18);
  });
});
