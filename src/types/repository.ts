export type RepoVisibility = "public" | "private";

export interface ReleaseSummary {
  name: string;
  /** ISO-8601 creation instant */
  createdAt: string;
}

export interface PullRequestSummary {
  number: number;
  /** ISO-8601 creation instant */
  createdAt: string;
}

export interface CommitSummary {
  sha: string;
  /** ISO-8601 committer instant; null when the provider could not resolve the committer */
  committedAt: string | null;
}

/**
 * A repository as seen by the classifier. The plain fields come from the
 * listing call; the methods hit the provider lazily and fail with the
 * errors in `errors.ts` (`NotFoundError`, `MalformedRecordError`, …).
 */
export interface RepositorySummary {
  url: string;
  name: string;
  fullName: string;
  archived: boolean;
  visibility: RepoVisibility;
  pushedAt: string | null;
  defaultBranch: string;
  topics(): Promise<string[]>;
  /** Newest first. */
  releases(): AsyncIterable<ReleaseSummary>;
  /** All states (open, closed, merged), newest first. */
  pullRequests(): AsyncIterable<PullRequestSummary>;
  defaultBranchCommit(): Promise<CommitSummary>;
}
