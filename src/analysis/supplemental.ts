import type { CollectedMetrics, MetricSignal, RepositorySummary, SupplementalMetric } from "../types.js";
import { AuthenticationError, MalformedRecordError, errorMessage } from "../errors.js";
import { daysSince, parseTimestamp } from "./staleness.js";
import * as log from "../log.js";

async function firstOf<T>(items: AsyncIterable<T>): Promise<T | undefined> {
  for await (const item of items) {
    return item;
  }
  return undefined;
}

async function daysSinceNewest(
  label: string,
  repo: RepositorySummary,
  items: () => AsyncIterable<{ createdAt: string }>,
  now: Date,
): Promise<MetricSignal> {
  let newest: { createdAt: string } | undefined;
  try {
    newest = await firstOf(items());
  } catch (err: unknown) {
    if (err instanceof MalformedRecordError) {
      log.warn(`${repo.url}: latest ${label} could not be read — ${err.message}`);
      return { status: "absent", reason: "unresolvable" };
    }
    throw err;
  }

  if (!newest) return { status: "absent", reason: "none" };

  const at = parseTimestamp(newest.createdAt);
  if (!at) {
    log.warn(`${repo.url}: latest ${label} has an invalid date '${newest.createdAt}'`);
    return { status: "absent", reason: "unresolvable" };
  }
  return { status: "present", days: daysSince(at, now) };
}

/** Days since the newest release, or absent when there has never been one. */
export function daysSinceLastRelease(repo: RepositorySummary, now: Date = new Date()): Promise<MetricSignal> {
  return daysSinceNewest("release", repo, () => repo.releases(), now);
}

/** Days since the newest pull request in any state, or absent when there has never been one. */
export function daysSinceLastPr(repo: RepositorySummary, now: Date = new Date()): Promise<MetricSignal> {
  return daysSinceNewest("pull request", repo, () => repo.pullRequests(), now);
}

const FETCHERS: Record<SupplementalMetric, (repo: RepositorySummary, now: Date) => Promise<MetricSignal>> = {
  release: daysSinceLastRelease,
  pr: daysSinceLastPr,
};

async function collectOne(
  metric: SupplementalMetric,
  repo: RepositorySummary,
  requested: readonly SupplementalMetric[],
  now: Date,
): Promise<MetricSignal> {
  if (!requested.includes(metric)) {
    return { status: "absent", reason: "not-requested" };
  }
  try {
    return await FETCHERS[metric](repo, now);
  } catch (err: unknown) {
    if (err instanceof AuthenticationError) throw err;
    log.warn(`${repo.url}: failed to fetch '${metric}' metric — ${errorMessage(err)}`);
    return { status: "absent", reason: "failed" };
  }
}

/**
 * Resolve each requested metric independently. A failing metric is reported
 * as absent and never affects the other metric or the repository itself.
 */
export async function collectMetrics(
  repo: RepositorySummary,
  requested: readonly SupplementalMetric[],
  now: Date = new Date(),
): Promise<CollectedMetrics> {
  const release = await collectOne("release", repo, requested, now);
  const pr = await collectOne("pr", repo, requested, now);
  return { release, pr };
}

export function metricValue(signal: MetricSignal): number | null {
  return signal.status === "present" ? signal.days : null;
}
