import { appendFileSync, writeFileSync } from "node:fs";
import type { ActivityMethod, ClassificationResult, SupplementalMetric } from "../types.js";
import * as log from "../log.js";

export interface MarkdownOptions {
  results: ClassificationResult[];
  inactiveDays: number;
  activityMethod: ActivityMethod;
  additionalMetrics: readonly SupplementalMetric[];
}

export interface WriteMarkdownOptions {
  workflowSummary?: boolean;
  env?: NodeJS.ProcessEnv;
}

const ABSENT = "None";

/** Most inactive first; ties keep scan order. */
export function sortByInactivity(results: ClassificationResult[]): ClassificationResult[] {
  return [...results].sort((a, b) => b.daysInactive - a.daysInactive);
}

function escapeMarkdown(text: string): string {
  return text
    .replace(/[\r\n]+/g, " ")
    .trim()
    .replace(/\|/g, "\\|");
}

function formatMetric(value: number | null): string {
  return value === null ? ABSENT : String(value);
}

function describeActivity(method: ActivityMethod, inactiveDays: number): { intro: string; dateHeader: string } {
  switch (method) {
    case "pushed":
      return {
        intro: `The following repos have not had a push event for more than ${inactiveDays} days:`,
        dateHeader: "Last Push Date",
      };
    case "default-branch-updated":
      return {
        intro: `The following repos have not had a commit on their default branch for more than ${inactiveDays} days:`,
        dateHeader: "Last Commit Date",
      };
  }
}

export function generateMarkdown(options: MarkdownOptions): string {
  const { results, inactiveDays, activityMethod, additionalMetrics } = options;
  const { intro, dateHeader } = describeActivity(activityMethod, inactiveDays);
  const withRelease = additionalMetrics.includes("release");
  const withPr = additionalMetrics.includes("pr");

  const headers = ["Repository URL", "Days Inactive", dateHeader, "Visibility"];
  if (withRelease) headers.push("Days Since Last Release");
  if (withPr) headers.push("Days Since Last PR");

  let md = "# Inactive Repositories\n\n";
  md += `${intro}\n\n`;
  md += `| ${headers.join(" | ")} |\n|${headers.map(() => "---").join("|")}|\n`;

  for (const repo of sortByInactivity(results)) {
    const cells = [escapeMarkdown(repo.url), String(repo.daysInactive), repo.lastActiveDate, repo.visibility];
    if (withRelease) cells.push(formatMetric(repo.daysSinceLastRelease));
    if (withPr) cells.push(formatMetric(repo.daysSinceLastPr));
    md += `| ${cells.join(" | ")} |\n`;
  }

  return md;
}

/**
 * Write the report and, when enabled inside GitHub Actions, append it to
 * the workflow step summary.
 */
export function writeMarkdownReport(
  content: string,
  destination: string,
  options: WriteMarkdownOptions = {},
): void {
  const env = options.env ?? process.env;
  writeFileSync(destination, content, "utf-8");
  log.success(`Wrote stale repos to ${destination}`);

  const summaryPath = env.GITHUB_STEP_SUMMARY;
  if (options.workflowSummary && summaryPath) {
    appendFileSync(summaryPath, content, "utf-8");
    log.success("Added stale repos to workflow summary");
  } else if (options.workflowSummary) {
    log.debug("Workflow summary enabled but GITHUB_STEP_SUMMARY is not set, skipping");
  }
}
