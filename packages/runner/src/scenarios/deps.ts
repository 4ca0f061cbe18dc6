import type { BrowserLauncher } from "../browser.js";
import type { HarnessConfig } from "../config.js";
import { HttpSession } from "../http.js";
import type { Logger } from "../logger.js";

export type ScenarioDeps = {
  config: HarnessConfig;
  logger?: Logger;
  launch?: BrowserLauncher;
  // pause before reading the DOM so pushed events can render
  settleMs?: number;
};

export function newSession(deps: ScenarioDeps): HttpSession {
  return new HttpSession({ timeoutMs: deps.config.timeouts.probeMs, logger: deps.logger });
}
