import { appendFileSync, writeFileSync } from "node:fs";
import type { ClassificationResult, JsonReport } from "../types.js";
import { sortByInactivity } from "./generate-markdown.js";
import * as log from "../log.js";

export function buildJsonReport(results: ClassificationResult[]): JsonReport {
  return sortByInactivity(results).map((r) => ({
    url: r.url,
    daysInactive: r.daysInactive,
    lastPushDate: r.lastActiveDate,
    visibility: r.visibility,
    daysSinceLastRelease: r.daysSinceLastRelease,
    daysSinceLastPR: r.daysSinceLastPr,
  }));
}

/**
 * Write the report to `destination` ("-" for stdout). Inside GitHub Actions
 * the compact JSON is also exposed as the `inactiveRepos` step output.
 */
export function writeJsonOutput(
  report: JsonReport,
  destination: string,
  env: NodeJS.ProcessEnv = process.env,
): void {
  const json = JSON.stringify(report, null, 2);
  if (destination === "-") {
    process.stdout.write(json + "\n");
  } else {
    writeFileSync(destination, json, "utf-8");
    log.success(`Wrote stale repos to ${destination}`);
  }

  const outputPath = env.GITHUB_OUTPUT;
  if (outputPath) {
    appendFileSync(outputPath, `inactiveRepos=${JSON.stringify(report)}\n`, "utf-8");
    log.debug(`Appended inactiveRepos to ${outputPath}`);
  }
}
