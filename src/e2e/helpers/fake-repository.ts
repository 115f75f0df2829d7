import { vi } from "vitest";
import type {
  CommitSummary,
  PullRequestSummary,
  ReleaseSummary,
  RepositorySummary,
} from "../../types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** ISO text for an instant `days` whole days before `now`. */
export function isoDaysAgo(days: number, now: Date): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}

export interface FakeRepoOptions {
  name?: string;
  archived?: boolean;
  visibility?: "public" | "private";
  pushedAt?: string | null;
  defaultBranch?: string;
  topics?: string[] | Error;
  releases?: ReleaseSummary[] | Error;
  pullRequests?: PullRequestSummary[] | Error;
  defaultBranchCommit?: CommitSummary | Error;
}

async function* itemsOrThrow<T>(items: T[] | Error): AsyncGenerator<T> {
  if (items instanceof Error) throw items;
  yield* items;
}

/**
 * In-memory RepositorySummary. Every lazy accessor is a vi.fn so tests can
 * assert whether (and how often) a lookup happened.
 */
export function fakeRepo(options: FakeRepoOptions = {}) {
  const name = options.name ?? "sample-repo";
  const topics = options.topics ?? [];
  const releases = options.releases ?? [];
  const pullRequests = options.pullRequests ?? [];
  const commit = options.defaultBranchCommit ?? { sha: "abc1234", committedAt: null };

  const repo = {
    url: `https://github.com/test-org/${name}`,
    name,
    fullName: `test-org/${name}`,
    archived: options.archived ?? false,
    visibility: options.visibility ?? "public",
    pushedAt: options.pushedAt === undefined ? null : options.pushedAt,
    defaultBranch: options.defaultBranch ?? "main",
    topics: vi.fn(async () => {
      if (topics instanceof Error) throw topics;
      return topics;
    }),
    releases: vi.fn(() => itemsOrThrow(releases)),
    pullRequests: vi.fn(() => itemsOrThrow(pullRequests)),
    defaultBranchCommit: vi.fn(async () => {
      if (commit instanceof Error) throw commit;
      return commit;
    }),
  } satisfies RepositorySummary;

  return repo;
}
