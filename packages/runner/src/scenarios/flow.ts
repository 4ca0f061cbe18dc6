import { passwordGrant, pickBusinessTenant, toAccounts, toTenants, type Tenant } from "../anybank.js";
import { realmUrl, type HarnessConfig } from "../config.js";
import { parseJson, payloadOf, type HttpSession } from "../http.js";
import { decodeJwtPayload } from "../jwt.js";
import type { Logger } from "../logger.js";
import { list, str, type Row } from "../match.js";
import type { Check, Scenario } from "../types.js";
import { fail, guarded, pass } from "../verdict.js";
import { newSession, type ScenarioDeps } from "./deps.js";

export type FlowContext = {
  config: HarnessConfig;
  http: HttpSession;
  logger?: Logger;
  accessToken?: string;
  tenants: Tenant[];
  selectedTenant?: Tenant;
  accounts: Row[];
};

const TRANSFER_AMOUNT = 100;

const keycloakAuth: Check<FlowContext> = {
  name: "Keycloak Authentication",
  verbose: true,
  run: guarded("Keycloak", async (ctx) => {
    const realm = await ctx.http.get(realmUrl(ctx.config));
    if (realm.status !== 200) {
      return fail(`Keycloak realm not accessible: ${realm.status}`, { url: realm.requestUrl });
    }

    const grant = await passwordGrant(ctx.http, ctx.config);
    if (grant.response.status !== 200) {
      return fail(`Failed to get token: ${grant.response.status}`, {
        status_code: grant.response.status,
        error: payloadOf(grant.response),
        hint: "Direct Access Grants might be disabled for this client",
      });
    }
    if (!grant.accessToken) return fail("No access_token in response", { response: grant.body });

    ctx.accessToken = grant.accessToken;
    const claims = decodeJwtPayload(grant.accessToken) ?? {};
    return pass(`Got access token for ${str(claims, "email") ?? "unknown"}`, {
      token_type: grant.body?.token_type,
      expires_in: grant.body?.expires_in,
      scope: grant.body?.scope,
      email: claims.email,
      sub: claims.sub,
      token_preview: `${grant.accessToken.slice(0, 50)}...`,
    });
  }),
};

const userInfo: Check<FlowContext> = {
  name: "Get User Info (/auth/me)",
  verbose: true,
  run: guarded("backend", async (ctx) => {
    if (!ctx.accessToken) return fail("No access token available");

    const res = await ctx.http.get(`${ctx.config.backendUrl}/auth/me`, { bearer: ctx.accessToken });
    if (res.status !== 200) {
      return fail(`Failed to get user info: ${res.status}`, { status_code: res.status, response_body: payloadOf(res) });
    }

    const body = parseJson(res);
    ctx.tenants = toTenants(list(body, "tenants"));
    return pass(`Got user info with ${ctx.tenants.length} tenant(s)`, {
      user_id: str(body, "id"),
      email: str(body, "email"),
      display_name: str(body, "display_name") ?? str(body, "displayName"),
      tenants: ctx.tenants,
    });
  }),
};

const selectTenant: Check<FlowContext> = {
  name: "Select Business Tenant",
  verbose: true,
  run: async (ctx) => {
    const tenant = pickBusinessTenant(ctx.tenants);
    if (!tenant) return fail("No tenants available");

    ctx.selectedTenant = tenant;
    ctx.logger?.info({ tenant: tenant.id, type: tenant.type }, "tenant selected");
    return pass(`Selected tenant: ${tenant.name}`, {
      tenant_id: tenant.id,
      tenant_name: tenant.name,
      tenant_type: tenant.type,
      role: tenant.role,
    });
  },
};

const fetchAccounts: Check<FlowContext> = {
  name: "Fetch Accounts",
  verbose: true,
  run: guarded("backend", async (ctx) => {
    if (!ctx.accessToken || !ctx.selectedTenant) return fail("Missing token or tenant");

    const res = await ctx.http.get(`${ctx.config.backendUrl}/api/accounts`, {
      bearer: ctx.accessToken,
      tenantId: ctx.selectedTenant.id,
    });
    if (res.status !== 200) {
      return fail(`Failed to fetch accounts: ${res.status}`, {
        status_code: res.status,
        response_body: payloadOf(res),
        tenant_id: ctx.selectedTenant.id,
      });
    }

    ctx.accounts = toAccounts(parseJson(res));
    return pass(`Fetched ${ctx.accounts.length} account(s)`, {
      accounts: ctx.accounts.slice(0, 5).map((a) => ({
        id: a.id,
        name: a.name,
        account_number: a.accountNumber ?? a.account_number,
        balance: a.balance,
        type: a.accountType ?? a.account_type,
      })),
    });
  }),
};

const transfer: Check<FlowContext> = {
  name: "Attempt Transfer",
  verbose: true,
  run: guarded("backend", async (ctx) => {
    if (ctx.accounts.length < 2) {
      return fail(`Need at least 2 accounts for transfer, have ${ctx.accounts.length}`);
    }
    const [source, target] = ctx.accounts;
    const sourceId = str(source, "id");
    if (!sourceId || !ctx.accessToken || !ctx.selectedTenant) return fail("Missing source account, token or tenant");

    const request = { toAccountId: target.id, amount: TRANSFER_AMOUNT, memo: "E2E Test Transfer" };
    const res = await ctx.http.post(`${ctx.config.backendUrl}/api/accounts/${encodeURIComponent(sourceId)}/transfer`, {
      bearer: ctx.accessToken,
      tenantId: ctx.selectedTenant.id,
      json: request,
    });

    if (res.status !== 200 && res.status !== 201) {
      return fail(`Transfer failed: ${res.status}`, {
        status_code: res.status,
        response_body: payloadOf(res),
        transfer_request: request,
      });
    }
    return pass("Transfer completed successfully", {
      source: source.name,
      target: target.name,
      amount: TRANSFER_AMOUNT,
    });
  }),
};

/** Password grant to transfer, with bearer tokens; the first failure ends the run. */
export function flowScenario(deps: ScenarioDeps): Scenario<FlowContext> {
  return {
    suite: "flow",
    title: "AnyBank E2E Token Flow",
    stopOnFailure: true,
    context: { config: deps.config, http: newSession(deps), logger: deps.logger, tenants: [], accounts: [] },
    checks: [keycloakAuth, userInfo, selectTenant, fetchAccounts, transfer],
  };
}
