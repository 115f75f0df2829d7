import type { RepoVisibility } from "./repository.js";

export interface ClassificationResult {
  url: string;
  daysInactive: number;
  /** YYYY-MM-DD, UTC */
  lastActiveDate: string;
  visibility: RepoVisibility;
  /** null when not requested, not available, or the lookup failed */
  daysSinceLastRelease: number | null;
  daysSinceLastPr: number | null;
}

export type ActivitySignal =
  | { status: "resolved"; at: Date }
  | { status: "unavailable"; reason: "no-timestamp" | "invalid-timestamp" | "lookup-failed" };

export type MetricSignal =
  | { status: "present"; days: number }
  | { status: "absent"; reason: "not-requested" | "none" | "unresolvable" | "failed" };

export type TopicLookup =
  | { status: "found"; topics: string[] }
  | { status: "not-found" };

export interface CollectedMetrics {
  release: MetricSignal;
  pr: MetricSignal;
}
