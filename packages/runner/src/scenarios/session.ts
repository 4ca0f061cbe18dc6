import {
  authenticatedUser,
  bffLogin,
  bffLogout,
  bffMe,
  exchangeTenant,
  isAnonymous,
  toAccounts,
} from "../anybank.js";
import type { HarnessConfig } from "../config.js";
import { parseJson, payloadOf, type HttpSession } from "../http.js";
import { isObj, str } from "../match.js";
import type { Check, Scenario } from "../types.js";
import { fail, guarded, pass } from "../verdict.js";
import { newSession, type ScenarioDeps } from "./deps.js";

export type SessionContext = {
  config: HarnessConfig;
  // signs in; every check after login runs on its cookies
  http: HttpSession;
  // never signs in
  anonymous: HttpSession;
};

function accountsUrl(ctx: SessionContext): string {
  return `${ctx.config.backendUrl}/api/accounts`;
}

const freshSession: Check<SessionContext> = {
  name: "Fresh Session Is Anonymous",
  run: guarded("backend", async (ctx) => {
    const res = await bffMe(ctx.anonymous, ctx.config);
    if (isAnonymous(res)) return pass(`Session without cookies answered ${res.status} and is anonymous`);
    return fail(`Expected 401 or authenticated: false, got ${res.status}`, { status: res.status, body: payloadOf(res) });
  }),
};

const login: Check<SessionContext> = {
  name: "Login via BFF",
  prerequisite: true,
  run: guarded("backend", async (ctx) => {
    const out = await bffLogin(ctx.http, ctx.config);
    if (!out.ok) return fail(out.reason, out.details);
    if (out.email !== ctx.config.user.email) {
      return fail(`Logged in as ${out.email ?? "unknown"}, expected ${ctx.config.user.email}`, { email: out.email });
    }
    return pass(`Logged in as ${out.email}`, { email: out.email, tenants: out.tenants.length });
  }),
};

const exchangeToBusiness: Check<SessionContext> = {
  name: "Exchange to Business Tenant",
  run: guarded("backend", async (ctx) => {
    const tenant = ctx.config.tenants.business;
    const res = await exchangeTenant(ctx.http, ctx.config, tenant);
    if (res.status !== 200) return fail(`Exchange failed: ${res.status}`, { status: res.status, body: payloadOf(res) });

    const body = parseJson(res);
    if (!isObj(body) || body.success !== true) return fail("Exchange response did not report success", { response: body });
    return pass(`Exchanged to ${str(body, "tenant_id") ?? tenant}`, { tenant_id: body.tenant_id, expires_in: body.expires_in });
  }),
};

const businessAccounts: Check<SessionContext> = {
  name: "Accounts in Business Tenant",
  run: guarded("backend", async (ctx) => {
    const res = await ctx.http.get(accountsUrl(ctx));
    if (res.status === 403) {
      return fail("Accounts refused with 403 after exchange", { tenant: ctx.config.tenants.business, body: payloadOf(res) });
    }
    if (res.status !== 200) return fail(`Failed to fetch accounts: ${res.status}`, { status: res.status });
    return pass(`Fetched ${toAccounts(parseJson(res)).length} account(s) in ${ctx.config.tenants.business}`);
  }),
};

const identityAfterExchange: Check<SessionContext> = {
  name: "Identity After Exchange",
  run: guarded("backend", async (ctx) => {
    const res = await bffMe(ctx.http, ctx.config);
    const user = authenticatedUser(res);
    if (!user) return fail(`Session lost after exchange: ${res.status}`, { status: res.status, body: payloadOf(res) });
    return pass(`Still signed in as ${str(user, "email") ?? "unknown"}`);
  }),
};

const swapAndBack: Check<SessionContext> = {
  name: "Swap and Back Keeps Session",
  run: guarded("backend", async (ctx) => {
    const order = [ctx.config.tenants.consumer, ctx.config.tenants.business];
    for (const tenant of order) {
      const ex = await exchangeTenant(ctx.http, ctx.config, tenant);
      if (ex.status !== 200) return fail(`Exchange to ${tenant} failed: ${ex.status}`, { status: ex.status, body: payloadOf(ex) });

      const me = await bffMe(ctx.http, ctx.config);
      if (!authenticatedUser(me)) return fail(`Session lost after exchange to ${tenant}: ${me.status}`, { status: me.status });
    }
    return pass("Session kept across consumer and business exchanges", { tenants: order });
  }),
};

const burst: Check<SessionContext> = {
  name: "Rapid Repeated Requests",
  run: guarded("backend", async (ctx) => {
    const statuses: number[] = [];
    for (let i = 0; i < ctx.config.burstCount; i++) {
      statuses.push((await ctx.http.get(accountsUrl(ctx))).status);
    }
    const bad = statuses.filter((s) => s !== 200).length;
    if (bad) return fail(`${bad} of ${statuses.length} requests did not return 200`, { statuses });
    return pass(`${statuses.length} requests all returned 200`);
  }),
};

const logout: Check<SessionContext> = {
  name: "Logout Ends Session",
  run: guarded("backend", async (ctx) => {
    const out = await bffLogout(ctx.http, ctx.config);
    const me = await bffMe(ctx.http, ctx.config);
    if (isAnonymous(me)) return pass(`Session ended (status ${me.status})`, { logout_status: out.status });
    return fail(`Session still active after logout: ${me.status}`, { logout_status: out.status, status: me.status });
  }),
};

/** Cookie session behaviour of the BFF across login, tenant exchanges and logout. */
export function sessionScenario(deps: ScenarioDeps): Scenario<SessionContext> {
  return {
    suite: "session",
    title: "BFF Session Properties",
    context: { config: deps.config, http: newSession(deps), anonymous: newSession(deps) },
    checks: [freshSession, login, exchangeToBusiness, businessAccounts, identityAfterExchange, swapAndBack, burst, logout],
  };
}
