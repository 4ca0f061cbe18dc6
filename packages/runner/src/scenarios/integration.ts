import { setTimeout as sleep } from "node:timers/promises";
import {
  bffLogin,
  bffLogout,
  bffMe,
  exchangeTenant,
  isAnonymous,
  toAccounts,
  trackCall,
  type CallRecord,
} from "../anybank.js";
import { launchBrowser, type BrowserLauncher, type DomProbe } from "../browser.js";
import { debugStreamUrl, realmUrl, type HarnessConfig } from "../config.js";
import { ConnectionError, HarnessError, RequestTimeoutError, errorText } from "../errors.js";
import { parseJson, payloadOf, type HttpSession } from "../http.js";
import type { Logger } from "../logger.js";
import { isObj, str } from "../match.js";
import { EventStreamWatcher } from "../sse.js";
import type { Check, Scenario, Verdict } from "../types.js";
import { fail, guarded, pass } from "../verdict.js";
import { newSession, type ScenarioDeps } from "./deps.js";

export type IntegrationContext = {
  config: HarnessConfig;
  http: HttpSession;
  logger?: Logger;
  launch: BrowserLauncher;
  settleMs: number;
  browser: DomProbe | null;
  watcher?: EventStreamWatcher;
  calls: CallRecord[];
  initialEventCount: number;
  initialApiTotal?: number;
};

const EVENTS = "#events-container";
const ROWS = `${EVENTS} [data-event-id]`;

function noBrowser(): Verdict {
  return fail("Browser not initialized");
}

function accountsUrl(ctx: IntegrationContext): string {
  return `${ctx.config.backendUrl}/api/accounts`;
}

async function badgeCount(browser: DomProbe): Promise<number> {
  const text = (await browser.text("#event-count")) ?? "";
  return /^\d+$/.test(text) ? Number(text) : 0;
}

/** `total` from the debug API's event listing; undefined when it cannot be read. */
async function apiEventTotal(ctx: IntegrationContext): Promise<number | undefined> {
  try {
    const res = await ctx.http.get(`${ctx.config.debugApiUrl}/events`);
    const body = payloadOf(res);
    if (res.status !== 200 || !isObj(body) || typeof body.total !== "number") {
      ctx.logger?.warn({ status: res.status }, "debug API events listing has no total");
      return undefined;
    }
    return body.total;
  } catch (e) {
    if (!(e instanceof HarnessError)) throw e;
    ctx.logger?.warn({ err: errorText(e) }, "debug API events listing unreachable");
    return undefined;
  }
}

async function openWatcher(ctx: IntegrationContext): Promise<string> {
  const watcher = new EventStreamWatcher(debugStreamUrl(ctx.config), ctx.logger);
  ctx.watcher = watcher;
  try {
    await watcher.open(ctx.config.timeouts.probeMs);
    return `${watcher.status ?? "?"} ${watcher.contentType}`.trim();
  } catch (e) {
    if (!(e instanceof ConnectionError) && !(e instanceof RequestTimeoutError)) throw e;
    ctx.logger?.warn({ err: errorText(e) }, "event stream not opened");
    return errorText(e);
  }
}

const serviceHealth: Check<IntegrationContext> = {
  name: "Service Health Check",
  run: async (ctx) => {
    const services: Array<[string, string]> = [
      ["Frontend", `${ctx.config.frontendUrl}/health`],
      ["Backend", `${ctx.config.backendUrl}/actuator/health`],
      ["Keycloak", realmUrl(ctx.config)],
      ["Debug API", `${ctx.config.debugApiUrl}/health`],
    ];

    const failed: string[] = [];
    for (const [name, url] of services) {
      try {
        const res = await ctx.http.get(url);
        if (res.status !== 200 && res.status !== 204) failed.push(`${name} (${res.status})`);
      } catch (e) {
        if (e instanceof ConnectionError) failed.push(`${name} (connection failed)`);
        else if (e instanceof RequestTimeoutError) failed.push(`${name} (timed out)`);
        else throw e;
      }
    }

    if (failed.length) return fail(`Services unavailable: ${failed.join(", ")}`, { failed });
    return pass("All services healthy");
  },
};

const initBrowser: Check<IntegrationContext> = {
  name: "Initialize Browser for Debug UI",
  run: async (ctx) => {
    ctx.browser = await ctx.launch({
      headless: ctx.config.headless,
      executablePath: ctx.config.browserPath,
      logger: ctx.logger,
    });
    if (!ctx.browser) {
      return fail("No browser available (Chrome or Firefox required)", {
        hint: "Install Chromium or Firefox, or point E2E_BROWSER_PATH at a Chromium binary",
      });
    }
    return pass(`Browser initialized: ${ctx.browser.name}`);
  },
};

const openDebugUi: Check<IntegrationContext> = {
  name: "Open Debug UI and Verify Connection",
  run: async (ctx) => {
    const browser = ctx.browser;
    if (!browser) return noBrowser();

    const wait = ctx.config.timeouts.authMs;
    await browser.open(ctx.config.debugUiUrl, wait);
    if (!(await browser.waitFor(EVENTS, wait))) {
      return fail("Timeout waiting for debug UI to load", { url: ctx.config.debugUiUrl });
    }

    const connected = await browser.waitForText("#connection-status", "Connected", wait);
    const connection = connected ? "Connected" : ((await browser.text("#connection-status")) ?? "Unknown");

    const title = await browser.title();
    if (!title.includes("Debug") && !title.includes("AnyBank")) {
      return fail(`Unexpected page title: ${title}`, { title });
    }
    return pass(`Debug UI loaded, SSE status: ${connection}`, { title, connection });
  },
};

const initialCount: Check<IntegrationContext> = {
  name: "Get Initial DOM Event Count",
  run: async (ctx) => {
    ctx.initialApiTotal = await apiEventTotal(ctx);
    const stream = await openWatcher(ctx);

    const browser = ctx.browser;
    if (!browser) return fail("Browser not initialized", { api_total: ctx.initialApiTotal, stream });

    ctx.initialEventCount = await badgeCount(browser);
    const rows = await browser.count(ROWS);
    return pass(`Initial event count: ${ctx.initialEventCount} (badge), ${rows} rows in DOM`, {
      badge_count: ctx.initialEventCount,
      dom_rows: rows,
      api_total: ctx.initialApiTotal,
      stream,
    });
  },
};

const login: Check<IntegrationContext> = {
  name: "Login via BFF",
  run: guarded("backend", async (ctx) => {
    const out = await bffLogin(ctx.http, ctx.config);
    if (!out.ok) return fail(out.reason, out.details);
    trackCall(ctx.calls, out.meResponse);
    return pass(`Logged in as ${out.email ?? "unknown"}`, { email: out.email, tenants: out.tenants.length });
  }),
};

const dashboard: Check<IntegrationContext> = {
  name: "Navigate to Dashboard",
  run: guarded("backend", async (ctx) => {
    const ex = await exchangeTenant(ctx.http, ctx.config, ctx.config.tenants.consumer);
    trackCall(ctx.calls, ex);
    if (ex.status !== 200) return fail(`Failed to select tenant: ${ex.status}`, { status: ex.status });

    const res = await ctx.http.get(accountsUrl(ctx));
    trackCall(ctx.calls, res);
    if (res.status !== 200) return fail(`Failed to fetch accounts: ${res.status}`, { status: res.status });

    const count = toAccounts(parseJson(res)).length;
    return pass(`Dashboard loaded with ${count} accounts`, { account_count: count });
  }),
};

const accountsList: Check<IntegrationContext> = {
  name: "Navigate to Accounts List",
  run: guarded("backend", async (ctx) => {
    const res = await ctx.http.get(accountsUrl(ctx));
    trackCall(ctx.calls, res);
    if (res.status !== 200) return fail(`Failed to fetch accounts: ${res.status}`, { status: res.status });
    return pass(`Accounts list loaded with ${toAccounts(parseJson(res)).length} accounts`);
  }),
};

const accountDetails: Check<IntegrationContext> = {
  name: "View Account Details",
  run: guarded("backend", async (ctx) => {
    const list = await ctx.http.get(accountsUrl(ctx));
    if (list.status !== 200) return fail("Could not fetch accounts", { status: list.status });

    const accounts = toAccounts(parseJson(list));
    if (!accounts.length) return pass("No accounts to view (skipped)");
    const id = str(accounts[0], "id");
    if (!id) return fail("First account has no id", { account: accounts[0] });

    const base = `${accountsUrl(ctx)}/${encodeURIComponent(id)}`;
    const detail = await ctx.http.get(base);
    trackCall(ctx.calls, detail);
    const tx = await ctx.http.get(`${base}/transactions`);
    trackCall(ctx.calls, tx);

    return pass(`Viewed account ${id}`, { account_id: id, detail_status: detail.status, transactions_status: tx.status });
  }),
};

const swapToBusiness: Check<IntegrationContext> = {
  name: "Swap to Business Tenant",
  run: guarded("backend", async (ctx) => {
    const ex = await exchangeTenant(ctx.http, ctx.config, ctx.config.tenants.business);
    trackCall(ctx.calls, ex);
    if (ex.status !== 200) return fail(`Failed to swap tenant: ${ex.status}`, { body: ex.text.slice(0, 200) });

    const tenantId = str(parseJson(ex), "tenant_id");
    trackCall(ctx.calls, await bffMe(ctx.http, ctx.config));
    return pass(`Swapped to business tenant: ${tenantId ?? "unknown"}`, { tenant_id: tenantId });
  }),
};

const businessDashboard: Check<IntegrationContext> = {
  name: "Navigate Business Dashboard",
  run: guarded("backend", async (ctx) => {
    const res = await ctx.http.get(accountsUrl(ctx));
    trackCall(ctx.calls, res);
    if (res.status !== 200) return fail(`Failed to fetch business accounts: ${res.status}`, { status: res.status });

    const admin = await ctx.http.get(`${ctx.config.backendUrl}/api/admin/users`);
    trackCall(ctx.calls, admin);
    return pass("Business dashboard loaded", { admin_users_status: admin.status });
  }),
};

const businessAccounts: Check<IntegrationContext> = {
  name: "Navigate Business Accounts",
  run: guarded("backend", async (ctx) => {
    const res = await ctx.http.get(accountsUrl(ctx));
    trackCall(ctx.calls, res);
    return pass(`Business accounts loaded (status ${res.status})`);
  }),
};

const swapBack: Check<IntegrationContext> = {
  name: "Swap Back to Consumer",
  run: guarded("backend", async (ctx) => {
    const ex = await exchangeTenant(ctx.http, ctx.config, ctx.config.tenants.consumer);
    trackCall(ctx.calls, ex);
    if (ex.status !== 200) return fail(`Failed to swap back: ${ex.status}`, { status: ex.status });

    trackCall(ctx.calls, await bffMe(ctx.http, ctx.config));
    return pass("Swapped back to consumer tenant");
  }),
};

const eventsInDom: Check<IntegrationContext> = {
  name: "Verify Events in DOM",
  run: async (ctx) => {
    const browser = ctx.browser;
    if (!browser) return noBrowser();
    if (ctx.settleMs > 0) await sleep(ctx.settleMs);

    const current = await badgeCount(browser);
    const rows = await browser.count(ROWS);
    const newEvents = current - ctx.initialEventCount;
    const made = ctx.calls.length;
    const details = {
      badge_count: current,
      dom_rows: rows,
      initial_count: ctx.initialEventCount,
      new_events: newEvents,
      api_calls_made: made,
    };

    if (rows === 0) return fail("No event rows found in DOM - events not rendering", details);
    if (newEvents < Math.floor(made / 2)) {
      return fail(`Too few events in DOM: ${newEvents} new events, expected ~${made}`, details);
    }
    return pass(`Events appear in DOM: ${rows} rows, ${newEvents} new events (made ${made} API calls)`, details);
  },
};

const apiEventsInDom: Check<IntegrationContext> = {
  name: "Verify API Events in DOM",
  run: async (ctx) => {
    const browser = ctx.browser;
    if (!browser) return noBrowser();

    const apiBadges = await browser.count(`${EVENTS} .event-badge-api`);
    const allBadges = await browser.count(`${EVENTS} .event-badge`);
    const samples = (await browser.texts(ROWS, 5)).map((t) => t.slice(0, 100));
    const text = (await browser.text(EVENTS)) ?? "";
    const pathsFound = [...new Set(ctx.calls.map((c) => c.path))].filter((p) => text.includes(p));

    if (apiBadges === 0 && allBadges === 0) {
      return fail("No event badges found in DOM", { api_badges: 0, all_badges: 0, sample_events: samples });
    }
    if (apiBadges === 0) {
      return fail(`No API-type events found (but found ${allBadges} other badges)`, {
        api_badges: 0,
        all_badges: allBadges,
        sample_events: samples,
        paths_found: pathsFound,
      });
    }
    return pass(`Found ${apiBadges} API events in DOM, ${pathsFound.length} paths matched`, {
      api_badges: apiBadges,
      all_badges: allBadges,
      paths_found: pathsFound.slice(0, 10),
      sample_events: samples,
    });
  },
};

const apiEventTotalGrew: Check<IntegrationContext> = {
  name: "Verify Debug API Event Total",
  run: guarded("debug API", async (ctx) => {
    if (ctx.initialApiTotal === undefined) return fail("No baseline event total was recorded");

    const res = await ctx.http.get(`${ctx.config.debugApiUrl}/events`);
    if (res.status !== 200) return fail(`Debug events endpoint returned ${res.status}`, { status: res.status });
    const body = parseJson(res);
    if (!isObj(body) || typeof body.total !== "number") {
      return fail("Debug events response has no numeric total", { response: body });
    }

    const grew = body.total - ctx.initialApiTotal;
    const min = Math.floor(ctx.calls.length / 2);
    const details = { initial_total: ctx.initialApiTotal, total: body.total, api_calls_made: ctx.calls.length };
    if (grew < min) return fail(`Debug API event total grew by ${grew}, expected at least ${min}`, details);
    return pass(`Debug API recorded ${grew} new events`, details);
  }),
};

const pushedOverSse: Check<IntegrationContext> = {
  name: "Verify Events Pushed Over SSE",
  run: async (ctx) => {
    const watcher = ctx.watcher;
    if (!watcher) return fail("Event stream was not opened");
    if (watcher.status !== 200 || !watcher.contentType.includes("text/event-stream")) {
      return fail(`Event stream answered ${watcher.status ?? "nothing"} with "${watcher.contentType}"`, {
        url: watcher.url,
      });
    }
    if (watcher.count === 0) return fail("No events were pushed over the event stream", { url: watcher.url });

    const kinds = watcher.events().slice(0, 3).map((e) => e.event ?? "message");
    return pass(`${watcher.count} events pushed over the event stream`, { count: watcher.count, first: kinds });
  },
};

const logout: Check<IntegrationContext> = {
  name: "Logout",
  run: guarded("backend", async (ctx) => {
    trackCall(ctx.calls, await bffLogout(ctx.http, ctx.config));
    const me = await bffMe(ctx.http, ctx.config);
    if (me.status === 401) return pass("Logged out successfully");
    if (isAnonymous(me)) return pass("Logged out (session invalidated)");
    // a session can linger briefly after logout
    return pass(`Logout completed (final status: ${me.status})`);
  }),
};

async function release(ctx: IntegrationContext): Promise<void> {
  const settled = await Promise.allSettled([ctx.watcher?.close(), ctx.browser?.close()]);
  for (const s of settled) {
    if (s.status === "rejected") ctx.logger?.warn({ err: errorText(s.reason) }, "release failed");
  }
  ctx.watcher = undefined;
  ctx.browser = null;
}

/**
 * Drives the BFF like the web app would and checks that the debug control plane
 * saw it: in its DOM, its event listing and its event stream.
 */
export function integrationScenario(deps: ScenarioDeps): Scenario<IntegrationContext> {
  return {
    suite: "integration",
    title: "Debug Integration Test Suite",
    context: {
      config: deps.config,
      http: newSession(deps),
      logger: deps.logger,
      launch: deps.launch ?? launchBrowser,
      settleMs: deps.settleMs ?? 2000,
      browser: null,
      calls: [],
      initialEventCount: 0,
    },
    checks: [
      serviceHealth,
      initBrowser,
      openDebugUi,
      initialCount,
      login,
      dashboard,
      accountsList,
      accountDetails,
      swapToBusiness,
      businessDashboard,
      businessAccounts,
      swapBack,
      eventsInDom,
      apiEventsInDom,
      apiEventTotalGrew,
      pushedOverSse,
      logout,
    ],
    cleanup: release,
  };
}
