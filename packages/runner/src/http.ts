import { fetch } from "undici";
import { joinUrl } from "./config.js";
import type { Expectation, HttpStep } from "./contract.js";
import { CookieJar } from "./cookies.js";
import { ConnectionError, HarnessError, RequestTimeoutError, ResponseFormatError, errorText } from "./errors.js";
import type { Logger } from "./logger.js";
import { deepSubsetMatch, missingFields, typeName } from "./match.js";
import type { Verdict } from "./types.js";
import { fail, pass } from "./verdict.js";

const MAX_REDIRECTS = 10;

export type RequestOptions = {
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  json?: unknown;
  form?: Record<string, string>;
  body?: string;
  bearer?: string;
  tenantId?: string;
  followRedirects?: boolean;
  timeoutMs?: number;
};

export type HttpResponse = {
  method: string;
  requestUrl: string;
  url: string;
  status: number;
  contentType: string;
  headers: Record<string, string>;
  text: string;
  json: unknown;
  redirects: string[];
  elapsedMs: number;
};

function withQuery(url: string, query?: RequestOptions["query"]): string {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) u.searchParams.set(k, String(v));
  return u.toString();
}

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

function encodeBody(opts: RequestOptions, headers: Record<string, string>): string | undefined {
  if (opts.json !== undefined) {
    headers["content-type"] ??= "application/json";
    return JSON.stringify(opts.json);
  }
  if (opts.form) {
    headers["content-type"] ??= "application/x-www-form-urlencoded";
    return new URLSearchParams(opts.form).toString();
  }
  return opts.body;
}

/**
 * Cookie-bearing HTTP client shared by the checks of one scenario.
 * Redirects are followed hop by hop so Set-Cookie on 3xx responses lands in the jar.
 * No retries: a failed call is a failed check.
 */
export class HttpSession {
  readonly cookies: CookieJar;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(opts: { timeoutMs: number; logger?: Logger; cookies?: CookieJar }) {
    this.timeoutMs = opts.timeoutMs;
    this.logger = opts.logger;
    this.cookies = opts.cookies ?? new CookieJar();
  }

  get(url: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.request("GET", url, opts);
  }

  post(url: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.request("POST", url, opts);
  }

  async request(method: string, url: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;
    const follow = opts.followRedirects ?? true;
    const requestUrl = withQuery(url, opts.query);
    const origin = new URL(requestUrl).origin;

    const headers: Record<string, string> = {};
    for (const [k, v] of Object.entries(opts.headers ?? {})) headers[k.toLowerCase()] = v;
    if (opts.bearer) headers.authorization = `Bearer ${opts.bearer}`;
    if (opts.tenantId) headers["x-tenant-id"] = opts.tenantId;

    let currentMethod = method.toUpperCase();
    let current = requestUrl;
    let body = encodeBody(opts, headers);
    const redirects: string[] = [];

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const started = Date.now();

    try {
      for (let hop = 0; ; hop++) {
        const cookie = this.cookies.header(current);
        const res = await fetch(current, {
          method: currentMethod,
          headers: cookie ? { ...headers, cookie } : headers,
          body,
          redirect: "manual",
          signal: controller.signal,
        });
        this.cookies.store(current, res.headers.getSetCookie());

        const location = res.headers.get("location");
        if (follow && isRedirect(res.status) && location) {
          await res.body?.cancel();
          if (hop >= MAX_REDIRECTS) throw new HarnessError(`Too many redirects starting at ${requestUrl}`);

          const next = new URL(location, current).toString();
          if (res.status === 303 || ((res.status === 301 || res.status === 302) && currentMethod !== "HEAD")) {
            if (currentMethod !== "GET") {
              currentMethod = "GET";
              body = undefined;
              delete headers["content-type"];
            }
          }
          // credentials stay with the origin they were sent to
          if (new URL(next).origin !== origin) {
            delete headers.authorization;
            delete headers["x-tenant-id"];
          }
          redirects.push(next);
          current = next;
          continue;
        }

        const text = await res.text();
        const contentType = res.headers.get("content-type") ?? "";
        let json: unknown;
        if (contentType.includes("json") && text) {
          try {
            json = JSON.parse(text);
          } catch {
            json = undefined;
          }
        }

        const out: HttpResponse = {
          method: method.toUpperCase(),
          requestUrl,
          url: current,
          status: res.status,
          contentType,
          headers: Object.fromEntries(res.headers.entries()),
          text,
          json,
          redirects,
          elapsedMs: Date.now() - started,
        };
        this.logger?.debug(
          { method: out.method, url: requestUrl, status: out.status, ms: out.elapsedMs, redirects: redirects.length },
          "http"
        );
        return out;
      }
    } catch (e) {
      if (e instanceof HarnessError) throw e;
      if (controller.signal.aborted) throw new RequestTimeoutError(current, timeoutMs);
      throw new ConnectionError(current, errorText(e), { cause: e });
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Parsed JSON body whatever the advertised content type; throws when the body is not JSON. */
export function parseJson(res: HttpResponse): unknown {
  if (res.json !== undefined) return res.json;
  try {
    return JSON.parse(res.text);
  } catch {
    throw new ResponseFormatError(res.url, res.status, res.text.slice(0, 200));
  }
}

/** JSON body when there is one, else the raw text; used for failure details. */
export function payloadOf(res: HttpResponse): unknown {
  if (res.json !== undefined) return res.json;
  try {
    return JSON.parse(res.text);
  } catch {
    return res.text.slice(0, 500);
  }
}

export function pathOf(res: HttpResponse): string {
  return new URL(res.requestUrl).pathname;
}

function asList<T>(v: T | T[] | undefined): T[] {
  if (v === undefined) return [];
  return Array.isArray(v) ? v : [v];
}

function bodyAsJson(res: HttpResponse): unknown {
  if (res.json !== undefined) return res.json;
  try {
    return JSON.parse(res.text);
  } catch {
    return undefined;
  }
}

/** Everything about `res` that does not meet `exp`, one sentence per miss. */
export function expectationNotes(res: HttpResponse, exp: Expectation): string[] {
  const notes: string[] = [];

  const statuses = asList(exp.status);
  if (statuses.length && !statuses.includes(res.status)) {
    notes.push(`Expected status ${statuses.join(" or ")} but got ${res.status}.`);
  }

  const types = asList(exp.contentType);
  if (types.length && !types.some((t) => res.contentType.includes(t))) {
    notes.push(`Expected content type ${types.join(" or ")} but got "${res.contentType}".`);
  }

  for (const s of asList(exp.bodyContains)) {
    if (!res.text.includes(s)) notes.push(`Expected body to contain: "${s}"`);
  }

  if (exp.json === undefined && exp.isArray === undefined && !exp.jsonBody && !exp.fields?.length) return notes;

  const json = bodyAsJson(res);
  if (json === undefined) {
    notes.push("Expected a JSON body, but response was not JSON.");
    return notes;
  }

  if (exp.json !== undefined && !deepSubsetMatch(json, exp.json)) {
    notes.push("Expected JSON subset did not match response JSON.");
  }

  if (exp.isArray && !Array.isArray(json)) {
    notes.push(`Expected a JSON array but got ${typeName(json)}.`);
  }

  if (exp.jsonBody && (json === null || typeof json !== "object")) {
    notes.push(`Expected a JSON object or array but got ${typeName(json)}.`);
  }

  if (exp.fields?.length) {
    if (exp.isArray) {
      // an empty list has nothing to inspect
      if (Array.isArray(json) && json.length) {
        const missing = missingFields(json[0], exp.fields);
        if (missing.length) notes.push(`Missing expected fields: ${missing.join(", ")}.`);
      }
    } else if (json === null || typeof json !== "object" || Array.isArray(json)) {
      notes.push(`Expected a JSON object but got ${typeName(json)}.`);
    } else {
      const missing = missingFields(json, exp.fields);
      if (missing.length) notes.push(`Missing expected fields: ${missing.join(", ")}.`);
    }
  }

  return notes;
}

/** One contract step: a single request judged against its expectation. Transport faults propagate. */
export async function runHttpStep(
  session: HttpSession,
  baseUrl: string,
  step: HttpStep,
  expect?: Expectation
): Promise<Verdict> {
  const method = step.method.toUpperCase();
  const opts: RequestOptions = { headers: step.headers, query: step.query };
  if (step.body !== undefined && step.body !== null) {
    if (typeof step.body === "string") opts.body = step.body;
    else opts.json = step.body;
  }

  const res = await session.request(method, joinUrl(baseUrl, step.path), opts);
  const notes = expectationNotes(res, expect ?? {});
  const details = { method, url: res.requestUrl, status: res.status, contentType: res.contentType };

  if (notes.length) return fail(notes.join(" "), { ...details, notes });
  return pass(`${method} ${step.path} returned ${res.status}`, details);
}
