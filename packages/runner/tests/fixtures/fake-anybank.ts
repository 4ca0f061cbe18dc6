import type { IncomingMessage, ServerResponse } from "node:http";
import type { DomProbe } from "../../src/browser.js";
import { loadConfig, type HarnessConfig } from "../../src/config.js";
import type { Env } from "../../src/env.js";
import { unsignedJwt } from "../../src/jwt.js";
import { isObj, str } from "../../src/match.js";
import { readBody, redirect, sendJson, sendText, startServer, type TestServer } from "./server.js";

export const USER = { id: "u-1", email: "jdoe@example.com", password: "test-password", name: "Jane Doe" };

export type FakeOptions = {
  transferStatus?: number;
  refuseAccounts?: boolean;
  logoutKeepsSession?: boolean;
  proxySseAsHtml?: boolean;
};

export type DebugEvent = {
  id: string;
  timestamp: string;
  type: string;
  action: string;
  sessionId?: string;
};

type Tenant = { id: string; name: string; type: string; role: string };

type Account = {
  id: string;
  tenantId: string;
  tenantName: string;
  accountNumber: string;
  accountType: string;
  name: string;
  balance: number;
  currency: string;
  status: string;
};

type DebugSession = { id: string; userEmail: string; createdAt: string; events: DebugEvent[] };
type BffSession = { email: string; tenantId?: string };
type Caller = { email: string; tenantId?: string; bearer: boolean };

const TENANTS: Tenant[] = [
  { id: "tenant-001", name: "Personal", type: "CONSUMER", role: "OWNER" },
  { id: "tenant-003", name: "AnyBusiness Inc.", type: "COMMERCIAL", role: "ADMIN" },
];

function account(id: string, tenant: Tenant, name: string, type: string, balance: number): Account {
  return {
    id,
    tenantId: tenant.id,
    tenantName: tenant.name,
    accountNumber: `****${id.slice(-3)}`,
    accountType: type,
    name,
    balance,
    currency: "USD",
    status: "ACTIVE",
  };
}

const ACCOUNTS: Record<string, Account[]> = {
  "tenant-001": [account("acc-101", TENANTS[0], "Everyday Checking", "CHECKING", 1200)],
  "tenant-003": [
    account("acc-301", TENANTS[1], "Operating", "CHECKING", 50000),
    account("acc-302", TENANTS[1], "Payroll", "CHECKING", 20000),
  ],
};

const MEMBERS: Record<string, Array<{ id: string; email: string; role: string }>> = {
  "tenant-001": [{ id: "u-1", email: USER.email, role: "OWNER" }],
  "tenant-003": [
    { id: "u-1", email: USER.email, role: "ADMIN" },
    { id: "u-2", email: "ops@anybusiness.example", role: "MEMBER" },
  ],
};

const POLICIES = [
  { id: "accounts", name: "accounts", raw: "package anybank.accounts" },
  { id: "transfers", name: "transfers", raw: "package anybank.transfers" },
];

const LOGIN_ACTION = "/realms/anybank/login-actions/authenticate";

const DEBUG_PAGE = `<!doctype html>
<html>
<head><title>AnyBank Debug Control Plane</title><link rel="stylesheet" href="css/debug-styles.css"></head>
<body>
<h1>Debug Control Plane</h1>
<span id="connection-status">Connected</span>
<div id="events-container"></div>
<aside id="slide-over"><button id="close-slide-over"></button><h2 id="slide-over-title"></h2><div id="slide-over-content"></div></aside>
<script type="module" src="js/main.js"></script>
</body>
</html>`;

function loginPage(error?: string): string {
  const notice = error ? `<p class="alert-error">Invalid username or password.</p>` : "";
  return `<html><body>${notice}<form id="kc-form-login" method="post" action="${LOGIN_ACTION}?session_code=sc-1&amp;tab_id=tab-1"><input name="username"><input name="password" type="password"></form></body></html>`;
}

function parseJsonBody(raw: string): unknown {
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * One loopback server standing in for a whole deployment:
 * Keycloak under /realms, the backend under /backend, and the frontend with its debug plane at the root.
 */
export class FakeAnyBank {
  readonly events: DebugEvent[] = [];

  private server?: TestServer;
  private readonly sessions = new Map<string, BffSession>();
  private readonly debugSessions = new Map<string, DebugSession>();
  private readonly tokens = new Map<string, string>();
  private readonly issued: Array<{ userEmail: string; issuedAt: string }> = [];
  private readonly streams = new Set<ServerResponse>();
  private sequence = 0;
  riskScore: number | null = null;

  constructor(private readonly opts: FakeOptions = {}) {}

  get url(): string {
    if (!this.server) throw new Error("fake AnyBank is not started");
    return this.server.url;
  }

  async start(): Promise<void> {
    this.server = await startServer((req, res) => {
      this.handle(req, res).catch((e: unknown) => {
        sendJson(res, 500, { error: String(e) });
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    await server?.close();
  }

  config(env: Env = {}): HarnessConfig {
    return loadConfig({
      KEYCLOAK_URL: this.url,
      BACKEND_URL: `${this.url}/backend`,
      FRONTEND_URL: this.url,
      TEST_USER_EMAIL: USER.email,
      TEST_USER_PASSWORD: USER.password,
      E2E_TIMEOUT_MS: "2000",
      E2E_AUTH_TIMEOUT_MS: "2000",
      E2E_BURST_COUNT: "3",
      ...env,
    });
  }

  get apiEvents(): DebugEvent[] {
    return this.events.filter((e) => e.type === "API");
  }

  private next(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }

  private record(type: string, action: string, session?: DebugSession): void {
    const event: DebugEvent = {
      id: this.next("evt"),
      timestamp: new Date().toISOString(),
      type,
      action,
      sessionId: session?.id,
    };
    this.events.push(event);
    session?.events.push(event);
    for (const stream of this.streams) stream.write(`event: debug\ndata: ${JSON.stringify(event)}\n\n`);
  }

  private debugSession(email: string): DebugSession {
    let session = this.debugSessions.get(email);
    if (!session) {
      session = { id: `dbg-sess-${this.debugSessions.size + 1}`, userEmail: email, createdAt: new Date().toISOString(), events: [] };
      this.debugSessions.set(email, session);
    }
    return session;
  }

  private bffSession(req: IncomingMessage): BffSession | undefined {
    const sid = /(?:^|;\s*)SESSION=([^;]+)/.exec(req.headers.cookie ?? "")?.[1];
    return sid ? this.sessions.get(sid) : undefined;
  }

  private bearerEmail(req: IncomingMessage): string | undefined {
    const auth = req.headers.authorization;
    return auth?.startsWith("Bearer ") ? this.tokens.get(auth.slice("Bearer ".length)) : undefined;
  }

  private caller(req: IncomingMessage): Caller | undefined {
    if (req.headers.authorization) {
      const email = this.bearerEmail(req);
      const tenant = req.headers["x-tenant-id"];
      return email ? { email, tenantId: typeof tenant === "string" ? tenant : undefined, bearer: true } : undefined;
    }
    const session = this.bffSession(req);
    return session ? { email: session.email, tenantId: session.tenantId, bearer: false } : undefined;
  }

  private stream(res: ServerResponse): void {
    res.writeHead(200, { "content-type": "text/event-stream", "cache-control": "no-cache", connection: "keep-alive" });
    res.write(": connected\n\n");
    this.streams.add(res);
    res.on("close", () => this.streams.delete(res));
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", this.url);
    const method = req.method ?? "GET";
    const raw = await readBody(req);

    if (url.pathname.startsWith("/realms/")) return this.keycloak(method, url, req, res, raw);
    if (url.pathname.startsWith("/backend/")) return this.backend(method, url, req, res, raw);
    if (url.pathname.startsWith("/debug/api/")) return this.debugApi(method, url.pathname.slice("/debug/api".length), res, raw);
    return this.frontend(url.pathname, res);
  }

  private keycloak(method: string, url: URL, req: IncomingMessage, res: ServerResponse, raw: string): void {
    const p = url.pathname;

    if (p === "/realms/anybank") return sendJson(res, 200, { realm: "anybank", "token-service": `${this.url}${p}/protocol/openid-connect` });

    if (p === "/realms/anybank/protocol/openid-connect/token" && method === "POST") {
      const form = new URLSearchParams(raw);
      if (form.get("grant_type") !== "password" || form.get("username") !== USER.email || form.get("password") !== USER.password) {
        return sendJson(res, 401, { error: "invalid_grant", error_description: "Invalid user credentials" });
      }
      const token = unsignedJwt({ alg: "none", typ: "JWT" }, { sub: USER.id, email: USER.email, jti: this.next("jti") });
      this.tokens.set(token, USER.email);
      this.issued.push({ userEmail: USER.email, issuedAt: new Date().toISOString() });
      return sendJson(res, 200, { access_token: token, token_type: "Bearer", expires_in: 300, scope: form.get("scope") ?? "" });
    }

    if (p === "/realms/anybank/protocol/openid-connect/auth") {
      res.writeHead(200, { "content-type": "text/html", "set-cookie": "AUTH_SESSION_ID=kc-1; Path=/realms/anybank/; HttpOnly" });
      res.end(loginPage(url.searchParams.get("error") ?? undefined));
      return;
    }

    if (p === LOGIN_ACTION && method === "POST") {
      const form = new URLSearchParams(raw);
      const validForm = url.searchParams.get("session_code") === "sc-1" && url.searchParams.get("tab_id") === "tab-1";
      const hasCookie = (req.headers.cookie ?? "").includes("AUTH_SESSION_ID=kc-1");
      if (!validForm || !hasCookie) return sendText(res, 400, "text/html", "<p>Session expired</p>");
      if (form.get("username") !== USER.email || form.get("password") !== USER.password) {
        return redirect(res, 302, "/realms/anybank/protocol/openid-connect/auth?client_id=anybank-bff&error=invalid_user_credentials");
      }
      return redirect(res, 302, "/backend/bff/auth/callback?code=ok-code");
    }

    sendJson(res, 404, { error: "Realm resource not found" });
  }

  private backend(method: string, url: URL, req: IncomingMessage, res: ServerResponse, raw: string): void {
    const p = url.pathname.slice("/backend".length);
    if (p === "/debug/events/stream") return this.stream(res);
    if (p === "/actuator/health") return sendJson(res, 200, { status: "UP" });

    this.record("API", `${method} ${url.pathname}`);

    if (p === "/bff/auth/login") return redirect(res, 302, "/realms/anybank/protocol/openid-connect/auth?client_id=anybank-bff");

    if (p === "/bff/auth/callback") {
      if (url.searchParams.get("code") !== "ok-code") return sendJson(res, 400, { error: "invalid code" });
      const sid = this.next("sid");
      this.sessions.set(sid, { email: USER.email });
      this.record("AUTH", "login_success", this.debugSession(USER.email));
      return redirect(res, 302, "/", [`SESSION=${sid}; Path=/; HttpOnly`]);
    }

    if (p === "/bff/auth/me") {
      const session = this.bffSession(req);
      if (!session) return sendJson(res, 401, { authenticated: false });
      return sendJson(res, 200, {
        authenticated: true,
        email: session.email,
        name: USER.name,
        tenants: TENANTS,
        activeTenantId: session.tenantId ?? null,
      });
    }

    if (p === "/bff/auth/token/exchange" && method === "POST") {
      const session = this.bffSession(req);
      if (!session) return sendJson(res, 401, { error: "not authenticated" });
      const target = str(parseJsonBody(raw), "target_tenant_id");
      if (!target || !TENANTS.some((t) => t.id === target)) return sendJson(res, 403, { error: "not a member of tenant" });
      session.tenantId = target;
      this.record("CONTEXT_SWITCH", "tenant_switch", this.debugSession(session.email));
      return sendJson(res, 200, { success: true, tenant_id: target, expires_in: 300 });
    }

    if (p === "/bff/auth/logout") {
      const sid = /(?:^|;\s*)SESSION=([^;]+)/.exec(req.headers.cookie ?? "")?.[1];
      if (this.opts.logoutKeepsSession) return redirect(res, 302, "/");
      if (sid) this.sessions.delete(sid);
      return redirect(res, 302, "/", ["SESSION=; Path=/; Max-Age=0"]);
    }

    if (p === "/auth/me") {
      const email = this.bearerEmail(req);
      if (!email) return sendJson(res, 401, { error: "invalid token" });
      this.record("AUTH", "login_success", this.debugSession(email));
      return sendJson(res, 200, { id: USER.id, email, display_name: USER.name, tenants: TENANTS });
    }

    if (p === "/auth/token/exchange" && method === "POST") {
      const email = this.bearerEmail(req);
      if (!email) return sendJson(res, 401, { error: "invalid token" });
      const target = str(parseJsonBody(raw), "targetTenantId");
      if (!target || !TENANTS.some((t) => t.id === target)) return sendJson(res, 403, { error: "not a member of tenant" });
      this.record("CONTEXT_SWITCH", "tenant_switch", this.debugSession(email));
      return sendJson(res, 200, { accessToken: `exchanged-${target}`, tenantId: target });
    }

    if (p.startsWith("/api/")) return this.api(method, p, req, res);

    sendJson(res, 404, { error: "not found" });
  }

  private api(method: string, p: string, req: IncomingMessage, res: ServerResponse): void {
    const caller = this.caller(req);
    if (!caller) return sendJson(res, 401, { error: "unauthorized" });
    if (!caller.tenantId) return sendJson(res, 400, { error: "no tenant selected" });
    const accounts = ACCOUNTS[caller.tenantId] ?? [];

    if (p === "/api/accounts") {
      if (this.opts.refuseAccounts) return sendJson(res, 403, { error: "forbidden" });
      return sendJson(res, 200, caller.bearer ? accounts : { accounts });
    }

    if (p === "/api/admin/users") return sendJson(res, 200, MEMBERS[caller.tenantId] ?? []);

    const m = /^\/api\/accounts\/([^/]+)(\/transactions|\/transfer)?$/.exec(p);
    const found = m ? accounts.find((a) => a.id === m[1]) : undefined;
    if (!m || !found) return sendJson(res, 404, { error: "account not found" });

    if (m[2] === "/transactions") return sendJson(res, 200, { transactions: [] });
    if (m[2] === "/transfer" && method === "POST") {
      const status = this.opts.transferStatus ?? 201;
      return sendJson(res, status, status < 300 ? { id: this.next("tx"), status: "COMPLETED" } : { error: "transfer rejected" });
    }
    sendJson(res, 200, found);
  }

  private debugApi(method: string, p: string, res: ServerResponse, raw: string): void {
    if (p === "/health") return sendJson(res, 200, { status: "ok" });
    if (p === "/events") return sendJson(res, 200, { events: this.events.slice(-50), count: Math.min(this.events.length, 50), total: this.events.length });

    if (p === "/data/users") return sendJson(res, 200, { users: [{ id: USER.id, email: USER.email, name: USER.name }] });
    if (p === "/data/tenants") return sendJson(res, 200, { tenants: TENANTS });
    if (p === "/data/sessions") {
      const sessions = [...this.debugSessions.values()].map(({ id, userEmail, createdAt }) => ({ id, userEmail, createdAt }));
      return sendJson(res, 200, { sessions });
    }
    if (p === "/data/accounts") return sendJson(res, 200, Object.values(ACCOUNTS).flat());
    if (p === "/data/memberships") {
      const rows = TENANTS.flatMap((t) =>
        (MEMBERS[t.id] ?? []).map((m) => ({
          id: `${m.id}-${t.id}`,
          userId: m.id,
          userEmail: m.email,
          tenantId: t.id,
          tenantName: t.name,
          role: m.role,
          status: "ACTIVE",
        }))
      );
      return sendJson(res, 200, rows);
    }

    if (p === "/auth/tokens") return sendJson(res, 200, { tokens: this.issued, count: this.issued.length });
    if (p === "/auth/keycloak/events") return sendJson(res, 200, { events: [], count: 0 });
    if (p === "/auth/decode" && method === "POST") {
      return sendJson(res, 400, { valid: false, error: "signature verification failed" });
    }
    if (p === "/opa/decisions") return sendJson(res, 200, { decisions: [] });

    if (p === "/controls") {
      return sendJson(res, 200, { risk_override_active: this.riskScore !== null, time_override_active: false });
    }
    if (p === "/controls/time") return sendJson(res, 200, { active: false, effective: new Date().toISOString() });
    if (p === "/controls/risk") {
      if (method === "POST") {
        const body = parseJsonBody(raw);
        const score = isObj(body) ? body.score : undefined;
        this.riskScore = typeof score === "number" ? score : null;
      }
      return sendJson(res, 200, { active: this.riskScore !== null, score: this.riskScore });
    }

    if (p === "/policy/policies") return sendJson(res, 200, { policies: POLICIES });
    if (p === "/policy/evaluate" && method === "POST") return sendJson(res, 200, { result: { allow: false } });

    const timeline = /^(?:\/workflows)?\/sessions\/([^/]+)\/timeline$/.exec(p);
    if (timeline) {
      const session = [...this.debugSessions.values()].find((s) => s.id === timeline[1]);
      if (!session) return sendJson(res, 404, { error: "session not found" });
      return sendJson(res, 200, {
        session: { id: session.id, userEmail: session.userEmail },
        events: session.events,
        eventCount: session.events.length,
      });
    }

    sendJson(res, 404, { error: "not found" });
  }

  private frontend(p: string, res: ServerResponse): void {
    if (p === "/health") return sendText(res, 200, "text/plain", "ok");
    if (p === "/debug/events/stream") {
      if (this.opts.proxySseAsHtml) return sendText(res, 200, "text/html", "<!doctype html><title>AnyBank</title>");
      return this.stream(res);
    }
    if (p === "/debug" || p === "/debug/") return sendText(res, 200, "text/html", DEBUG_PAGE);
    if (p === "/debug/css/debug-styles.css") return sendText(res, 200, "text/css", ".debug-card { padding: 8px; }");
    if (p === "/debug/js/main.js") {
      return sendText(res, 200, "application/javascript", 'import { connect } from "./sse.js";\nexport const debugState = connect();');
    }
    sendText(res, 200, "text/html", "<!doctype html><title>AnyBank</title>");
  }
}

/** Answers the DOM questions from the fake's event log, as the rendered debug page would. */
export class FakeDomProbe implements DomProbe {
  readonly name = "fake";
  opened?: string;
  closed = false;

  constructor(private readonly bank: FakeAnyBank) {}

  async open(url: string): Promise<void> {
    this.opened = url;
  }

  async waitFor(selector: string): Promise<boolean> {
    return selector === "#events-container";
  }

  async waitForText(selector: string, text: string): Promise<boolean> {
    return selector === "#connection-status" && text === "Connected";
  }

  async text(selector: string): Promise<string | null> {
    switch (selector) {
      case "#event-count":
        return String(this.bank.events.length);
      case "#connection-status":
        return "Connected";
      case "#events-container":
        return this.bank.events.map((e) => `${e.type} ${e.action}`).join("\n");
      default:
        return null;
    }
  }

  async count(selector: string): Promise<number> {
    switch (selector) {
      case "#events-container [data-event-id]":
      case "#events-container .event-badge":
        return this.bank.events.length;
      case "#events-container .event-badge-api":
        return this.bank.apiEvents.length;
      default:
        return 0;
    }
  }

  async texts(selector: string, limit: number): Promise<string[]> {
    if (selector !== "#events-container [data-event-id]") return [];
    return this.bank.events.slice(0, limit).map((e) => `${e.type} ${e.action}`);
  }

  async title(): Promise<string> {
    return "AnyBank Debug Control Plane";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
