import fs from "node:fs";
import path from "node:path";
import type { RunOutcome, RunReport } from "./types.js";

export function buildReport(suites: RunOutcome[]): RunReport {
  const passed = suites.reduce((n, s) => n + s.passed, 0);
  const failed = suites.reduce((n, s) => n + s.failed, 0);
  return {
    total: passed + failed,
    passed,
    failed,
    ok: suites.every((s) => s.ok),
    suites,
  };
}

export function writeReport(file: string, report: RunReport): string {
  const out = path.resolve(process.cwd(), file);
  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, JSON.stringify(report, null, 2), "utf8");
  return out;
}
