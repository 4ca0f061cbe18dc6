import { ConnectionError, RequestTimeoutError, ResponseFormatError } from "./errors.js";
import type { Details, Verdict } from "./types.js";

export function pass(message: string, details?: Details): Verdict {
  return details ? { passed: true, message, details } : { passed: true, message };
}

export function fail(message: string, details?: Details): Verdict {
  return details ? { passed: false, message, details } : { passed: false, message };
}

/**
 * Turns transport faults raised while talking to `service` into failed verdicts.
 * Anything else propagates to the runner.
 */
export function guarded<C>(service: string, run: (ctx: C) => Promise<Verdict>): (ctx: C) => Promise<Verdict> {
  return async (ctx: C) => {
    try {
      return await run(ctx);
    } catch (e) {
      if (e instanceof ConnectionError) {
        return fail(`Cannot connect to ${service}`, { url: e.url, error: e.message });
      }
      if (e instanceof RequestTimeoutError) {
        return fail(`Timed out after ${e.timeoutMs}ms waiting for ${service}`, { url: e.url });
      }
      if (e instanceof ResponseFormatError) {
        return fail("Response is not valid JSON", { url: e.url, status: e.status, preview: e.preview });
      }
      throw e;
    }
  };
}
