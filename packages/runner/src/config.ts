import { ConfigError } from "./errors.js";
import type { Env } from "./env.js";

export type HarnessConfig = {
  keycloak: { url: string; realm: string; clientId: string };
  backendUrl: string;
  frontendUrl: string;
  debugUiUrl: string;
  debugApiUrl: string;
  user: { email: string; password: string };
  tenants: { consumer: string; business: string };
  timeouts: { probeMs: number; authMs: number };
  burstCount: number;
  headless: boolean;
  browserPath?: string;
};

/** Values given on the command line win over the environment. */
export type ConfigOverrides = {
  keycloakUrl?: string;
  backendUrl?: string;
  frontendUrl?: string;
  headless?: boolean;
};

export const TARGETS = ["keycloak", "backend", "frontend", "debugUi", "debugApi"] as const;
export type Target = (typeof TARGETS)[number];

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function requireUrl(name: string, value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`${name} is not a valid URL: "${value}"`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${name} must be an http(s) URL: "${value}"`);
  }
  return trimSlash(value);
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`${name} must be a positive integer: "${raw}"`);
  return n;
}

function flag(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const v = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new ConfigError(`${name} must be true or false: "${raw}"`);
}

function text(raw: string | undefined, fallback: string): string {
  return raw && raw.trim() ? raw.trim() : fallback;
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): HarnessConfig {
  const frontendUrl = requireUrl("FRONTEND_URL", overrides.frontendUrl ?? text(env.FRONTEND_URL, "http://localhost:3000"));

  return {
    keycloak: {
      url: requireUrl("KEYCLOAK_URL", overrides.keycloakUrl ?? text(env.KEYCLOAK_URL, "http://localhost:8080")),
      realm: text(env.KEYCLOAK_REALM, "anybank"),
      clientId: text(env.KEYCLOAK_CLIENT_ID, "anybank-web"),
    },
    backendUrl: requireUrl("BACKEND_URL", overrides.backendUrl ?? text(env.BACKEND_URL, "http://localhost:8000")),
    frontendUrl,
    debugUiUrl: requireUrl("DEBUG_UI_URL", text(env.DEBUG_UI_URL, `${frontendUrl}/debug`)),
    debugApiUrl: requireUrl("DEBUG_API_URL", text(env.DEBUG_API_URL, `${frontendUrl}/debug/api`)),
    user: {
      email: text(env.TEST_USER_EMAIL, "jdoe@example.com"),
      password: text(env.TEST_USER_PASSWORD, "demo123"),
    },
    tenants: {
      consumer: text(env.CONSUMER_TENANT_ID, "tenant-001"),
      business: text(env.BUSINESS_TENANT_ID, "tenant-003"),
    },
    timeouts: {
      probeMs: positiveInt("E2E_TIMEOUT_MS", env.E2E_TIMEOUT_MS, 5000),
      authMs: positiveInt("E2E_AUTH_TIMEOUT_MS", env.E2E_AUTH_TIMEOUT_MS, 9000),
    },
    burstCount: positiveInt("E2E_BURST_COUNT", env.E2E_BURST_COUNT, 10),
    headless: overrides.headless ?? flag("E2E_HEADLESS", env.E2E_HEADLESS, true),
    browserPath: env.E2E_BROWSER_PATH?.trim() || undefined,
  };
}

export function realmUrl(config: HarnessConfig): string {
  return `${config.keycloak.url}/realms/${encodeURIComponent(config.keycloak.realm)}`;
}

export function tokenUrl(config: HarnessConfig): string {
  return `${realmUrl(config)}/protocol/openid-connect/token`;
}

/** The debug SSE stream as the browser sees it (through the frontend proxy). */
export function debugStreamUrl(config: HarnessConfig): string {
  return `${config.frontendUrl}/debug/events/stream`;
}

export function backendStreamUrl(config: HarnessConfig): string {
  return `${config.backendUrl}/debug/events/stream`;
}

export function targetUrl(config: HarnessConfig, target: Target): string {
  switch (target) {
    case "keycloak":
      return config.keycloak.url;
    case "backend":
      return config.backendUrl;
    case "frontend":
      return config.frontendUrl;
    case "debugUi":
      return config.debugUiUrl;
    case "debugApi":
      return config.debugApiUrl;
  }
}

export function joinUrl(baseUrl: string, path: string): string {
  const base = trimSlash(baseUrl);
  const p = path.startsWith("/") ? path : `/${path}`;
  return `${base}${p}`;
}
