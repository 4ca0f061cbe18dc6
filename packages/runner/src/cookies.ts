type StoredCookie = {
  name: string;
  value: string;
  domain: string;
  hostOnly: boolean;
  path: string;
  expiresAt?: number;
};

function defaultPath(pathname: string): string {
  if (!pathname.startsWith("/")) return "/";
  const last = pathname.lastIndexOf("/");
  return last <= 0 ? "/" : pathname.slice(0, last);
}

function domainMatches(cookie: StoredCookie, host: string): boolean {
  if (cookie.hostOnly) return host === cookie.domain;
  return host === cookie.domain || host.endsWith(`.${cookie.domain}`);
}

function pathMatches(cookiePath: string, requestPath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith("/") || requestPath[cookiePath.length] === "/";
}

/**
 * Per-host cookie store carried across the requests of one scenario.
 * Secure and SameSite are ignored: the harness talks to local http deployments.
 */
export class CookieJar {
  private cookies: StoredCookie[] = [];

  store(url: string, setCookieHeaders: readonly string[], now = Date.now()): void {
    const { hostname, pathname } = new URL(url);

    for (const header of setCookieHeaders) {
      const [pair, ...attrs] = header.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;

      const cookie: StoredCookie = {
        name: pair.slice(0, eq).trim(),
        value: pair.slice(eq + 1).trim(),
        domain: hostname,
        hostOnly: true,
        path: defaultPath(pathname),
      };

      let maxAge: number | undefined;
      let expires: number | undefined;

      for (const attr of attrs) {
        const i = attr.indexOf("=");
        const key = (i < 0 ? attr : attr.slice(0, i)).trim().toLowerCase();
        const val = i < 0 ? "" : attr.slice(i + 1).trim();

        if (key === "domain" && val) {
          const domain = val.replace(/^\./, "").toLowerCase();
          // a server may not set cookies for an unrelated host
          if (hostname !== domain && !hostname.endsWith(`.${domain}`)) continue;
          cookie.domain = domain;
          cookie.hostOnly = false;
        } else if (key === "path" && val.startsWith("/")) {
          cookie.path = val;
        } else if (key === "max-age" && /^-?\d+$/.test(val)) {
          maxAge = Number(val);
        } else if (key === "expires") {
          const t = Date.parse(val);
          if (!Number.isNaN(t)) expires = t;
        }
      }

      // Max-Age wins over Expires
      if (maxAge !== undefined) cookie.expiresAt = now + maxAge * 1000;
      else if (expires !== undefined) cookie.expiresAt = expires;

      this.cookies = this.cookies.filter(
        (c) => !(c.name === cookie.name && c.domain === cookie.domain && c.path === cookie.path)
      );
      if (cookie.expiresAt === undefined || cookie.expiresAt > now) this.cookies.push(cookie);
    }
  }

  /** Value for the `cookie` request header, or undefined when nothing applies. */
  header(url: string, now = Date.now()): string | undefined {
    const matching = this.matching(url, now);
    if (!matching.length) return undefined;
    return matching.map((c) => `${c.name}=${c.value}`).join("; ");
  }

  get(url: string, name: string, now = Date.now()): string | undefined {
    return this.matching(url, now).find((c) => c.name === name)?.value;
  }

  get size(): number {
    return this.cookies.length;
  }

  clear(): void {
    this.cookies = [];
  }

  private matching(url: string, now: number): StoredCookie[] {
    const { hostname, pathname } = new URL(url);
    this.cookies = this.cookies.filter((c) => c.expiresAt === undefined || c.expiresAt > now);
    // longer paths first, as browsers send them
    return this.cookies
      .filter((c) => domainMatches(c, hostname) && pathMatches(c.path, pathname))
      .sort((a, b) => b.path.length - a.path.length);
  }
}
