import { findSessionFor, passwordGrant, toTenants } from "../anybank.js";
import { backendStreamUrl, debugStreamUrl, type HarnessConfig } from "../config.js";
import { parseJson, payloadOf, type HttpSession } from "../http.js";
import { unsignedJwt } from "../jwt.js";
import type { Logger } from "../logger.js";
import { isObj, list, missingFields, missingFieldsIgnoringCase, str, type Row } from "../match.js";
import { probeEventStream, type StreamProbe } from "../sse.js";
import type { Check, Scenario, Verdict } from "../types.js";
import { fail, guarded, pass } from "../verdict.js";
import { newSession, type ScenarioDeps } from "./deps.js";

export type DebugUiContext = {
  config: HarnessConfig;
  http: HttpSession;
  logger?: Logger;
  // a risk override this run set and has not cleared yet
  riskOverrideSet: boolean;
};

type Signed = { ok: true; token: string; me: Row; email: string } | { ok: false; verdict: Verdict };
type SessionPick = { ok: true; id: string } | { ok: false; verdict: Verdict };

const SERVICES = "AnyBank services";
const EVENT_FIELDS = ["id", "timestamp", "type", "action"];
const POLICY_FIELDS = ["id", "name", "raw"];
const RISK_SCORE = 75;

function api(ctx: DebugUiContext, path: string): string {
  return `${ctx.config.debugApiUrl}${path}`;
}

function short(id: string): string {
  return `${id.slice(0, 12)}...`;
}

/** Password grant plus a bearer /auth/me, which is what registers a session with the debug plane. */
async function signIn(ctx: DebugUiContext): Promise<Signed> {
  const grant = await passwordGrant(ctx.http, ctx.config);
  if (grant.response.status !== 200) {
    return {
      ok: false,
      verdict: fail(`Keycloak auth failed: ${grant.response.status}`, { error: grant.response.text.slice(0, 200) }),
    };
  }
  if (!grant.accessToken) return { ok: false, verdict: fail("No access_token in Keycloak response") };

  const res = await ctx.http.get(`${ctx.config.backendUrl}/auth/me`, { bearer: grant.accessToken });
  if (res.status !== 200) return { ok: false, verdict: fail(`/auth/me failed: ${res.status}`, { status: res.status }) };

  const me = parseJson(res);
  if (!isObj(me)) return { ok: false, verdict: fail("/auth/me did not return an object", { response: me }) };
  return { ok: true, token: grant.accessToken, me, email: str(me, "email") ?? "unknown" };
}

async function debugSessions(ctx: DebugUiContext): Promise<{ status: number; sessions: unknown[] }> {
  const res = await ctx.http.get(api(ctx, "/data/sessions"));
  return { status: res.status, sessions: res.status === 200 ? list(parseJson(res), "sessions") : [] };
}

/** The first recorded session; signs in to create one when there is none. */
async function anySession(ctx: DebugUiContext): Promise<SessionPick> {
  const first = await debugSessions(ctx);
  if (first.status !== 200) {
    return { ok: false, verdict: fail(`Failed to get sessions: ${first.status}`, { status: first.status }) };
  }

  let sessions = first.sessions;
  if (!sessions.length) {
    const signed = await signIn(ctx);
    if (signed.ok) sessions = (await debugSessions(ctx)).sessions;
    else ctx.logger?.warn({ reason: signed.verdict.message }, "could not create a session");
  }

  const id = str(sessions[0], "id");
  if (!id) return { ok: false, verdict: fail("No sessions available to test timeline") };
  return { ok: true, id };
}

function eventCount(timeline: Row): unknown {
  return timeline.eventCount ?? list(timeline, "events").length;
}

function streamVerdict(probe: StreamProbe, where: string, wrongTypeHint: string): Verdict {
  if (probe.timedOut) return pass(`${where} responds (timeout expected)`);
  if (probe.status === 404) return fail(`${where} not found (404)`, { status: 404, url: probe.url });
  if (probe.status !== 200) {
    return fail(`Status ${probe.status ?? "unknown"}`, { status: probe.status, content_type: probe.contentType });
  }
  if (!probe.contentType.includes("text/event-stream")) {
    return fail(`Wrong content type: ${probe.contentType} (expected text/event-stream).${wrongTypeHint}`, {
      content_type: probe.contentType,
      url: probe.url,
    });
  }
  return pass(`${where} responds correctly`);
}

const sseBackend: Check<DebugUiContext> = {
  name: "SSE Backend Direct",
  run: guarded("backend SSE", async (ctx) =>
    streamVerdict(await probeEventStream(backendStreamUrl(ctx.config), ctx.config.timeouts.probeMs), "Backend SSE endpoint", "")
  ),
};

const sseProxy: Check<DebugUiContext> = {
  name: "SSE via Frontend Proxy",
  run: guarded("frontend SSE proxy", async (ctx) =>
    streamVerdict(
      await probeEventStream(debugStreamUrl(ctx.config), ctx.config.timeouts.probeMs),
      "Frontend SSE proxy",
      " The proxy may be returning the HTML fallback instead of forwarding to the backend."
    )
  ),
};

const decodeJwt: Check<DebugUiContext> = {
  name: "Debug API Auth Decode",
  run: guarded("debug API", async (ctx) => {
    const token = unsignedJwt({ alg: "RS256", typ: "JWT" }, { sub: "test", name: "Test User", iat: 1234567890 });
    const res = await ctx.http.post(api(ctx, "/auth/decode"), { json: { token } });

    if (res.status === 404) return fail("JWT decode endpoint not found", { status: 404 });
    if (res.status === 500) return fail("Server error (500)", { status: 500 });
    if (res.status === 400) {
      const body = payloadOf(res);
      if (isObj(body) && body.valid === false) {
        return pass("JWT decode endpoint works (returned invalid for test token)", { valid: false });
      }
    }
    if (res.status !== 200) return fail(`Unexpected status ${res.status}`, { status: res.status });

    const body = parseJson(res);
    return pass("JWT decode endpoint works", { valid: isObj(body) && "valid" in body ? body.valid : "unknown" });
  }),
};

const sessionVisible: Check<DebugUiContext> = {
  name: "Session Debug Visibility",
  run: guarded(SERVICES, async (ctx) => {
    const signed = await signIn(ctx);
    if (!signed.ok) return signed.verdict;

    const { status, sessions } = await debugSessions(ctx);
    if (status !== 200) return fail(`Debug sessions endpoint failed: ${status}`, { status });

    const ours = findSessionFor(sessions, signed.email);
    if (!ours) {
      return fail(`Session for ${signed.email} not found in debug sessions`, {
        user_email: signed.email,
        session_count: sessions.length,
        session_emails: sessions.map((s) => str(s, "userEmail") ?? str(s, "user_email")),
      });
    }

    const tokensRes = await ctx.http.get(api(ctx, "/auth/tokens"));
    const tokens = tokensRes.status === 200 ? list(payloadOf(tokensRes), "tokens") : [];
    return pass(`Session created for ${signed.email} and visible in debug UI`, {
      user_email: signed.email,
      session_id: ours.id,
      session_visible: true,
      token_visible: tokens.some((t) => str(t, "userEmail") === signed.email),
      total_sessions: sessions.length,
      total_tokens: tokens.length,
    });
  }),
};

const timeline: Check<DebugUiContext> = {
  name: "Session Timeline",
  run: guarded(SERVICES, async (ctx) => {
    const pick = await anySession(ctx);
    if (!pick.ok) return pick.verdict;

    const res = await ctx.http.get(api(ctx, `/sessions/${encodeURIComponent(pick.id)}/timeline`));
    if (res.status !== 200) {
      return fail(`Timeline endpoint returned ${res.status}`, { status: res.status, session_id: pick.id });
    }
    const body = parseJson(res);
    if (!isObj(body) || !("session" in body)) return fail("Timeline response missing 'session' field", { response: body });

    return pass(`Timeline retrieved for session ${short(pick.id)}`, { session_id: pick.id, event_count: eventCount(body) });
  }),
};

const workflowTimeline: Check<DebugUiContext> = {
  name: "Session Timeline (Workflow Path)",
  run: guarded(SERVICES, async (ctx) => {
    const pick = await anySession(ctx);
    if (!pick.ok) return pick.verdict;

    const res = await ctx.http.get(api(ctx, `/workflows/sessions/${encodeURIComponent(pick.id)}/timeline`));
    if (res.status === 404) return fail("Workflow timeline endpoint not found (404)", { session_id: pick.id });
    if (res.status === 500) return fail("Server error (500)", { session_id: pick.id });
    if (res.status !== 200) {
      return fail(`Timeline endpoint returned ${res.status}`, { status: res.status, session_id: pick.id });
    }

    const body = parseJson(res);
    if (!isObj(body) || !("session" in body)) return fail("Timeline response missing 'session' field", { response: body });
    if (!("events" in body)) return fail("Timeline response missing 'events' field", { response: body });

    const events = list(body, "events");
    if (events.length) {
      const missing = missingFields(events[0], EVENT_FIELDS);
      if (missing.length) {
        return fail(`Event missing expected fields: ${missing.join(", ")}`, {
          event_fields: isObj(events[0]) ? Object.keys(events[0]) : [],
        });
      }
    }

    return pass(`Timeline retrieved via /workflows/ path for session ${short(pick.id)}`, {
      session_id: pick.id,
      event_count: eventCount(body),
      has_session: true,
      has_events: true,
      missing_session_fields: missingFieldsIgnoringCase(body.session, ["id", "userEmail"]),
    });
  }),
};

const timelineActions: Check<DebugUiContext> = {
  name: "Session Timeline with Actions",
  run: guarded(SERVICES, async (ctx) => {
    const signed = await signIn(ctx);
    if (!signed.ok) return signed.verdict;

    const target = toTenants(list(signed.me, "tenants"))[0];
    let switched = false;
    if (target) {
      const ex = await ctx.http.post(`${ctx.config.backendUrl}/auth/token/exchange`, {
        bearer: signed.token,
        json: { targetTenantId: target.id },
      });
      switched = ex.status === 200;
    }

    const { status, sessions } = await debugSessions(ctx);
    if (status !== 200) return fail(`Failed to get sessions: ${status}`, { status });

    const ours = findSessionFor(sessions, signed.email);
    const sessionId = str(ours, "id");
    if (!sessionId) {
      return fail(`Session for ${signed.email} not found`, {
        user_email: signed.email,
        sessions: sessions.map((s) => str(s, "userEmail") ?? str(s, "user_email")),
      });
    }

    const res = await ctx.http.get(api(ctx, `/workflows/sessions/${encodeURIComponent(sessionId)}/timeline`));
    if (res.status !== 200) {
      return fail(`Timeline endpoint returned ${res.status}`, { status: res.status, session_id: sessionId });
    }

    const events = list(parseJson(res), "events");
    const has = (type: string, action: string) => events.some((e) => str(e, "type") === type && str(e, "action") === action);
    const hasLogin = has("AUTH", "login_success");
    const hasSwitch = has("CONTEXT_SWITCH", "tenant_switch");
    const seen = {
      session_id: sessionId,
      event_count: events.length,
      event_types: [...new Set(events.map((e) => str(e, "type")))],
      event_actions: [...new Set(events.map((e) => str(e, "action")))],
    };

    if (!hasLogin) {
      return fail("Login event (AUTH/login_success) not found in timeline", {
        ...seen,
        expected: "AUTH event with action 'login_success'",
      });
    }
    if (switched && !hasSwitch) {
      return fail(`Context switch event not found after switching to tenant '${target?.name ?? ""}'`, {
        ...seen,
        switched_to: target?.name,
        expected: "CONTEXT_SWITCH event with action 'tenant_switch'",
      });
    }

    const suffix = switched ? ` and tenant switch to '${target?.name ?? ""}'` : " (no tenant switch performed)";
    return pass(`Timeline shows login event${suffix}`, {
      ...seen,
      has_login_event: hasLogin,
      has_context_switch: hasSwitch,
      tenant_switched: switched,
      switched_tenant: target?.name,
    });
  }),
};

async function riskState(ctx: DebugUiContext): Promise<{ status: number; body: unknown }> {
  const res = await ctx.http.get(api(ctx, "/controls/risk"));
  return { status: res.status, body: res.status === 200 ? parseJson(res) : undefined };
}

const riskSetAndClear: Check<DebugUiContext> = {
  name: "Risk Controls (SET/CLEAR)",
  run: guarded("debug API", async (ctx) => {
    const set = await ctx.http.post(api(ctx, "/controls/risk"), { json: { score: RISK_SCORE } });
    if (set.status !== 200) {
      return fail(`Failed to set risk override: ${set.status}`, { status: set.status, response: set.text.slice(0, 200) });
    }
    ctx.riskOverrideSet = true;

    const after = await riskState(ctx);
    if (after.status !== 200) return fail(`Failed to verify risk override: ${after.status}`, { status: after.status });
    if (!isObj(after.body) || !after.body.active || after.body.score !== RISK_SCORE) {
      return fail("Risk override was not set correctly", { expected_score: RISK_SCORE, actual: after.body });
    }

    const clear = await ctx.http.post(api(ctx, "/controls/risk"), { json: { score: null } });
    if (clear.status !== 200) return fail(`Failed to clear risk override: ${clear.status}`, { status: clear.status });
    ctx.riskOverrideSet = false;

    const final = await riskState(ctx);
    if (final.status !== 200) return fail(`Failed to verify cleared risk: ${final.status}`, { status: final.status });
    if (isObj(final.body) && final.body.active) return fail("Risk override was not cleared", { response: final.body });

    return pass(`Risk override set to ${RISK_SCORE} and cleared successfully`);
  }),
};

const policyList: Check<DebugUiContext> = {
  name: "Policy List",
  run: guarded("debug API", async (ctx) => {
    const res = await ctx.http.get(api(ctx, "/policy/policies"));
    if (res.status !== 200) return fail(`Policy list endpoint returned ${res.status}`, { status: res.status });

    const body = parseJson(res);
    if (!isObj(body) || !("policies" in body)) return fail("Response missing 'policies' field", { response: body });
    const policies = list(body, "policies");
    if (!policies.length) return fail("No policies returned", { response: body });

    const missing = missingFields(policies[0], POLICY_FIELDS);
    if (missing.length) return fail(`Policy missing fields: ${missing.join(", ")}`, { policy: policies[0] });

    return pass(`Got ${policies.length} policies`, {
      policy_count: policies.length,
      policy_names: policies.map((p) => str(p, "name")),
    });
  }),
};

const policyEvaluate: Check<DebugUiContext> = {
  name: "Policy Evaluate",
  run: guarded("debug API", async (ctx) => {
    const res = await ctx.http.post(api(ctx, "/policy/evaluate"), {
      json: { action: "view_balance", user: { roles: ["viewer"] } },
    });
    if (res.status !== 200) return fail(`Policy evaluate endpoint returned ${res.status}`, { status: res.status });

    const body = parseJson(res);
    if (!isObj(body) || !("result" in body)) return fail("Response missing 'result' field", { response: body });
    const result = body.result;
    if (!isObj(result) || !("allow" in result)) return fail("Result missing 'allow' field", { result });

    return pass(`Policy evaluation returned allow=${String(result.allow)}`, { result });
  }),
};

async function adminUsers(ctx: DebugUiContext, token: string, tenantId: string): Promise<{ status: number; users: unknown[] }> {
  const res = await ctx.http.get(`${ctx.config.backendUrl}/api/admin/users`, { bearer: token, tenantId });
  const body = res.status === 200 ? payloadOf(res) : [];
  return { status: res.status, users: Array.isArray(body) ? body : [] };
}

function emails(users: unknown[]): string[] {
  return [...new Set(users.map((u) => str(u, "email") ?? ""))].sort();
}

const peoplePage: Check<DebugUiContext> = {
  name: "People Page Personal vs Business",
  run: guarded(SERVICES, async (ctx) => {
    const signed = await signIn(ctx);
    if (!signed.ok) return signed.verdict;

    const tenants = toTenants(list(signed.me, "tenants"));
    if (tenants.length < 2) {
      return fail(`User needs at least 2 tenants to test (has ${tenants.length})`, { tenant_count: tenants.length });
    }
    const personal = tenants.find((t) => t.type === "CONSUMER");
    const business = tenants.find((t) => t.type === "COMMERCIAL" || t.type === "SMALL_BUSINESS");
    if (!personal) return fail("No CONSUMER (personal) tenant found for user", { tenants: tenants.map((t) => t.type) });
    if (!business) {
      return fail("No COMMERCIAL/SMALL_BUSINESS tenant found for user", { tenants: tenants.map((t) => t.type) });
    }

    const p = await adminUsers(ctx, signed.token, personal.id);
    const b = await adminUsers(ctx, signed.token, business.id);

    let different = p.users.length !== b.users.length || JSON.stringify(p.users) !== JSON.stringify(b.users);
    // a personal tenant lists its owner at most, or refuses non-admins
    const personalValid = p.users.length <= 1 || p.status === 403;

    const details: Row = {
      personal_tenant: { id: personal.id, name: personal.name, type: personal.type, user_count: p.users.length, status: p.status },
      business_tenant: { id: business.id, name: business.name, type: business.type, user_count: b.users.length, status: b.status },
      results_different: different,
    };

    if (!different && p.users.length && b.users.length) {
      const personalEmails = emails(p.users);
      const businessEmails = emails(b.users);
      details.personal_emails = personalEmails;
      details.business_emails = businessEmails;
      different = personalEmails.join(",") !== businessEmails.join(",");
    }

    if (different || personalValid) {
      return pass(`Personal tenant has ${p.users.length} users, business has ${b.users.length} users`, details);
    }
    return fail("Personal and business accounts returned same user list - they should be different", details);
  }),
};

async function clearRiskOverride(ctx: DebugUiContext): Promise<void> {
  if (!ctx.riskOverrideSet) return;
  const res = await ctx.http.post(api(ctx, "/controls/risk"), { json: { score: null } });
  ctx.logger?.info({ status: res.status }, "risk override cleared");
  ctx.riskOverrideSet = false;
}

/** Behavioural checks of the debug control plane; its static resources are covered by contracts/debug-ui.yml. */
export function debugUiScenario(deps: ScenarioDeps): Scenario<DebugUiContext> {
  return {
    suite: "debug-ui",
    title: "Debug UI Test Suite",
    context: { config: deps.config, http: newSession(deps), logger: deps.logger, riskOverrideSet: false },
    checks: [
      sseBackend,
      sseProxy,
      decodeJwt,
      sessionVisible,
      timeline,
      workflowTimeline,
      timelineActions,
      riskSetAndClear,
      policyList,
      policyEvaluate,
      peoplePage,
    ],
    cleanup: clearRiskOverride,
  };
}
