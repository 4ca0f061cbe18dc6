import { tokenUrl, type HarnessConfig } from "./config.js";
import { parseJson, pathOf, payloadOf, type HttpResponse, type HttpSession } from "./http.js";
import { isObj, list, str, type Row } from "./match.js";
import type { Details } from "./types.js";

export type Tenant = {
  id: string;
  name: string;
  type: string;
  role?: string;
};

export type CallRecord = {
  method: string;
  path: string;
  status: number;
  at: string;
};

export type LoginOutcome =
  | { ok: true; me: Row; meResponse: HttpResponse; email?: string; tenants: Tenant[] }
  | { ok: false; reason: string; details?: Details };

export type GrantOutcome = {
  response: HttpResponse;
  accessToken?: string;
  body?: Row;
};

export function toTenants(value: unknown): Tenant[] {
  const rows = Array.isArray(value) ? value : [];
  const out: Tenant[] = [];
  for (const row of rows) {
    const id = str(row, "id");
    if (!id) continue;
    out.push({
      id,
      name: str(row, "name") ?? "",
      type: str(row, "type") ?? "",
      role: str(row, "role"),
    });
  }
  return out;
}

/** Account lists arrive bare, paged under `content`, or wrapped in `accounts`. */
export function toAccounts(body: unknown): Row[] {
  const rows = Array.isArray(body) ? body : isObj(body) ? (body.content ?? body.accounts) : undefined;
  return Array.isArray(rows) ? rows.filter(isObj) : [];
}

/** COMMERCIAL, or "business" in the name; otherwise the first tenant. */
export function pickBusinessTenant(tenants: readonly Tenant[]): Tenant | undefined {
  return tenants.find((t) => t.type === "COMMERCIAL" || t.name.toLowerCase().includes("business")) ?? tenants[0];
}

export function trackCall(calls: CallRecord[], res: HttpResponse): void {
  calls.push({ method: res.method, path: pathOf(res), status: res.status, at: new Date().toISOString() });
}

/** Direct access grant against the realm's token endpoint. */
export async function passwordGrant(http: HttpSession, config: HarnessConfig): Promise<GrantOutcome> {
  const response = await http.post(tokenUrl(config), {
    form: {
      grant_type: "password",
      client_id: config.keycloak.clientId,
      username: config.user.email,
      password: config.user.password,
      scope: "openid profile email",
    },
    timeoutMs: config.timeouts.authMs,
  });
  if (response.status !== 200) return { response };

  const body = parseJson(response);
  if (!isObj(body)) return { response };
  return { response, body, accessToken: str(body, "access_token") };
}

export function bffMe(http: HttpSession, config: HarnessConfig): Promise<HttpResponse> {
  return http.get(`${config.backendUrl}/bff/auth/me`);
}

export function exchangeTenant(http: HttpSession, config: HarnessConfig, tenantId: string): Promise<HttpResponse> {
  return http.post(`${config.backendUrl}/bff/auth/token/exchange`, {
    json: { target_tenant_id: tenantId },
    timeoutMs: config.timeouts.authMs,
  });
}

/** The 3xx is not followed: its Set-Cookie is what ends the session. */
export function bffLogout(http: HttpSession, config: HarnessConfig): Promise<HttpResponse> {
  return http.get(`${config.backendUrl}/bff/auth/logout`, { followRedirects: false, timeoutMs: config.timeouts.authMs });
}

/** Body of a /bff/auth/me response when it says the session is signed in. */
export function authenticatedUser(res: HttpResponse): Row | undefined {
  if (res.status !== 200) return undefined;
  const body = parseJson(res);
  return isObj(body) && body.authenticated === true ? body : undefined;
}

/** 401, or 200 with `authenticated: false`. */
export function isAnonymous(res: HttpResponse): boolean {
  if (res.status === 401) return true;
  if (res.status !== 200) return false;
  const body = payloadOf(res);
  return isObj(body) && body.authenticated === false;
}

/**
 * The browser login: follow /bff/auth/login to the identity provider's form,
 * post the credentials to its action, and confirm the BFF now knows the user.
 */
export async function bffLogin(http: HttpSession, config: HarnessConfig): Promise<LoginOutcome> {
  const page = await http.get(`${config.backendUrl}/bff/auth/login`, { timeoutMs: config.timeouts.authMs });
  if (page.status !== 200) {
    return { ok: false, reason: `Failed to reach Keycloak login page: ${page.status}`, details: { url: page.url } };
  }

  const action = /action="([^"]+)"/.exec(page.text)?.[1];
  if (!action) {
    return { ok: false, reason: "Could not find login form action URL", details: { url: page.url } };
  }

  const submitted = await http.post(new URL(action.replace(/&amp;/g, "&"), page.url).toString(), {
    form: { username: config.user.email, password: config.user.password },
    timeoutMs: config.timeouts.authMs,
  });
  if (submitted.url.includes("error")) {
    return { ok: false, reason: "Login failed with error", details: { final_url: submitted.url } };
  }

  const me = await bffMe(http, config);
  if (me.status !== 200) {
    return { ok: false, reason: `Session not established after login: ${me.status}`, details: { status: me.status } };
  }
  const body = parseJson(me);
  if (!isObj(body) || body.authenticated !== true) {
    return { ok: false, reason: "User not authenticated after login", details: { response: body } };
  }

  return { ok: true, me: body, meResponse: me, email: str(body, "email"), tenants: toTenants(list(body, "tenants")) };
}

/** Debug API sessions are keyed by email under either spelling. */
export function findSessionFor(sessions: readonly unknown[], email: string): Row | undefined {
  for (const s of sessions) {
    if (isObj(s) && (str(s, "userEmail") === email || str(s, "user_email") === email)) return s;
  }
  return undefined;
}
