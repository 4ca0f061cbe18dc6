import { afterEach, describe, expect, it } from "vitest";
import { silentReporter } from "../../src/reporter.js";
import { runScenario } from "../../src/runner.js";
import { sessionScenario } from "../../src/scenarios/session.js";
import { FakeAnyBank, type FakeOptions } from "../fixtures/fake-anybank.js";

let bank: FakeAnyBank;

async function run(opts?: FakeOptions, env?: Record<string, string>) {
  bank = new FakeAnyBank(opts);
  await bank.start();
  const scenario = sessionScenario({ config: bank.config(env) });
  return { scenario, outcome: await runScenario(scenario, { reporter: silentReporter }) };
}

afterEach(async () => {
  await bank.stop();
});

describe("session scenario", () => {
  it("keeps the cookie session through exchanges and ends it on logout", async () => {
    const { scenario, outcome } = await run();

    expect(outcome.results.map((r) => [r.name, r.message])).toEqual([
      ["Fresh Session Is Anonymous", "Session without cookies answered 401 and is anonymous"],
      ["Login via BFF", "Logged in as jdoe@example.com"],
      ["Exchange to Business Tenant", "Exchanged to tenant-003"],
      ["Accounts in Business Tenant", "Fetched 2 account(s) in tenant-003"],
      ["Identity After Exchange", "Still signed in as jdoe@example.com"],
      ["Swap and Back Keeps Session", "Session kept across consumer and business exchanges"],
      ["Rapid Repeated Requests", "3 requests all returned 200"],
      ["Logout Ends Session", "Session ended (status 401)"],
    ]);
    expect(outcome.ok).toBe(true);
    // the logout response expired the cookie
    expect(scenario.context.http.cookies.get(bank.url, "SESSION")).toBeUndefined();
    expect(scenario.context.anonymous.cookies.size).toBe(0);
  });

  it("skips everything after a failed login", async () => {
    const { outcome } = await run({}, { TEST_USER_PASSWORD: "wrong-password" });

    expect(outcome.results.map((r) => r.passed)).toEqual([true, false]);
    expect(outcome.results[1].message).toBe("Login failed with error");
    expect(outcome.results[1].details).toEqual({
      final_url: `${bank.url}/realms/anybank/protocol/openid-connect/auth?client_id=anybank-bff&error=invalid_user_credentials`,
    });
    expect(outcome.skipped).toHaveLength(6);
  });

  it("calls out a 403 on accounts after the exchange", async () => {
    const { outcome } = await run({ refuseAccounts: true });

    const failed = outcome.results.filter((r) => !r.passed);
    expect(failed.map((r) => [r.name, r.message])).toEqual([
      ["Accounts in Business Tenant", "Accounts refused with 403 after exchange"],
      ["Rapid Repeated Requests", "3 of 3 requests did not return 200"],
    ]);
    expect(failed[1].details).toEqual({ statuses: [403, 403, 403] });
  });

  it("fails when the session survives logout", async () => {
    const { outcome } = await run({ logoutKeepsSession: true });

    expect(outcome.results[7]).toEqual({
      name: "Logout Ends Session",
      passed: false,
      message: "Session still active after logout: 200",
      details: { logout_status: 302, status: 200 },
    });
  });
});
