export const ACTIVITY_METHODS = ["pushed", "default-branch-updated"] as const;
export type ActivityMethod = (typeof ACTIVITY_METHODS)[number];

export const SUPPLEMENTAL_METRICS = ["release", "pr"] as const;
export type SupplementalMetric = (typeof SUPPLEMENTAL_METRICS)[number];

export interface Policy {
  readonly inactiveDays: number;
  readonly exemptRepos: readonly string[];
  readonly exemptTopics: readonly string[];
  readonly activityMethod: ActivityMethod;
  readonly additionalMetrics: readonly SupplementalMetric[];
}
