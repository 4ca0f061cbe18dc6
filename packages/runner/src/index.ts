export * from "./anybank.js";
export * from "./browser.js";
export * from "./config.js";
export * from "./contract.js";
export * from "./cookies.js";
export * from "./errors.js";
export * from "./http.js";
export * from "./jwt.js";
export * from "./logger.js";
export * from "./match.js";
export * from "./report.js";
export * from "./reporter.js";
export * from "./runner.js";
export * from "./scenarios/index.js";
export * from "./sse.js";
export * from "./types.js";
export * from "./verdict.js";
export { interpolate, type Env } from "./env.js";
