import type { ClassificationResult, Policy, RepositorySummary } from "../types.js";
import { isExempt } from "./exemption.js";
import { resolveActivity } from "./activity.js";
import { collectMetrics, metricValue } from "./supplemental.js";
import { daysSince, isStale, toIsoDate } from "./staleness.js";
import * as log from "../log.js";

export interface ClassifyOptions {
  /** Reference instant for every day count in the run. */
  now?: Date;
  /** Only used to scope the summary line. */
  organization?: string;
}

async function classifyOne(
  repo: RepositorySummary,
  policy: Policy,
  now: Date,
): Promise<ClassificationResult | null> {
  if (repo.archived) {
    log.debug(`${repo.url} — archived, skipping`);
    return null;
  }

  if (await isExempt(repo, policy.exemptRepos, policy.exemptTopics)) {
    return null;
  }

  const activity = await resolveActivity(repo, policy.activityMethod);
  if (activity.status === "unavailable") {
    return null;
  }

  const daysInactive = daysSince(activity.at, now);
  if (!isStale(daysInactive, policy.inactiveDays)) {
    log.debug(`${repo.url} — ${daysInactive} days inactive, within threshold`);
    return null;
  }

  const metrics = await collectMetrics(repo, policy.additionalMetrics, now);

  return {
    url: repo.url,
    daysInactive,
    lastActiveDate: toIsoDate(activity.at),
    visibility: repo.visibility,
    daysSinceLastRelease: metricValue(metrics.release),
    daysSinceLastPr: metricValue(metrics.pr),
  };
}

/**
 * Walk the repositories one at a time and collect the stale ones.
 *
 * Results keep the order of the incoming sequence; sorting for display is
 * left to the report writers. Provider errors that are not soft failures
 * propagate and abort the scan.
 */
export async function classify(
  repositories: Iterable<RepositorySummary> | AsyncIterable<RepositorySummary>,
  policy: Policy,
  options: ClassifyOptions = {},
): Promise<ClassificationResult[]> {
  const now = options.now ?? new Date();
  const results: ClassificationResult[] = [];

  for await (const repo of repositories) {
    const result = await classifyOne(repo, policy, now);
    if (result) {
      results.push(result);
      log.info(`${result.url}: ${result.daysInactive} days inactive`);
    }
  }

  if (options.organization) {
    log.info(`Found ${results.length} stale repos in ${options.organization}`);
  } else {
    log.info(`Found ${results.length} stale repos`);
  }
  return results;
}
