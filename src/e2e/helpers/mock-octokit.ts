import { vi } from "vitest";
import type { Octokit } from "@octokit/rest";

export interface MockRepoData {
  name: string;
  owner?: string;
  private?: boolean;
  archived?: boolean;
  pushedAt?: string | null;
  defaultBranch?: string;
  topics?: string[];
  releases?: Array<{ name: string; createdAt: string | null; author?: { login: string } | null }>;
  pullRequests?: Array<{ number: number; createdAt: string | null; user?: { login: string } | null }>;
  branchCommitDate?: string | null;
}

/** An HTTP failure shaped like Octokit's RequestError. */
export function httpError(status: number, message: string, headers: Record<string, string> = {}): Error {
  return Object.assign(new Error(message), { status, response: { headers } });
}

export interface MockOctokitOptions {
  login?: string;
  repositories?: MockRepoData[];
  /** Repositories per page, to exercise pagination. */
  pageSize?: number;
  /** Methods that reject, keyed by "repos.getAllTopics" style names. */
  failures?: Record<string, Error>;
}

function repoPayload(data: MockRepoData) {
  const owner = data.owner ?? "test-org";
  return {
    name: data.name,
    full_name: `${owner}/${data.name}`,
    html_url: `https://github.com/${owner}/${data.name}`,
    owner: { login: owner },
    private: data.private,
    archived: data.archived ?? false,
    pushed_at: data.pushedAt === undefined ? null : data.pushedAt,
    default_branch: data.defaultBranch ?? "main",
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  if (items.length === 0) return [[]];
  const pages: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    pages.push(items.slice(i, i + size));
  }
  return pages;
}

/**
 * Creates a mock Octokit that serves canned data.
 * Only stubs the endpoints used by the production code.
 */
export function createMockOctokit(options: MockOctokitOptions = {}) {
  const repos = options.repositories ?? [];
  const failures = options.failures ?? {};
  const byName = new Map(repos.map((r) => [r.name, r]));

  function find(repo: string): MockRepoData {
    const data = byName.get(repo);
    if (!data) throw httpError(404, "Not Found");
    return data;
  }

  function guard(name: string): void {
    const failure = failures[name];
    if (failure) throw failure;
  }

  const listForOrg = vi.fn();
  const listForAuthenticatedUser = vi.fn();
  const listReleases = vi.fn();
  const listPulls = vi.fn();

  const listReposAccessibleToInstallation = vi.fn(async (_params: { per_page?: number }) => {
    guard("apps.listReposAccessibleToInstallation");
    return { data: { total_count: repos.length, repositories: repos.map(repoPayload) } };
  });

  const getAllTopics = vi.fn(async ({ repo }: { owner: string; repo: string }) => {
    guard("repos.getAllTopics");
    return { data: { names: find(repo).topics ?? [] } };
  });

  const getBranch = vi.fn(async ({ repo, branch }: { owner: string; repo: string; branch: string }) => {
    guard("repos.getBranch");
    const data = find(repo);
    if (branch !== (data.defaultBranch ?? "main")) throw httpError(404, "Branch not found");
    return {
      data: {
        name: branch,
        commit: {
          sha: "0123abc",
          commit: { committer: data.branchCommitDate === null ? null : { date: data.branchCommitDate } },
        },
      },
    };
  });

  const getAuthenticated = vi.fn(async () => {
    guard("users.getAuthenticated");
    return { data: { login: options.login ?? "test-user" } };
  });

  const iterator = vi.fn(async function* (method: unknown, params: Record<string, unknown>) {
    const listings = new Map<unknown, string>([
      [listForOrg, "repos.listForOrg"],
      [listForAuthenticatedUser, "repos.listForAuthenticatedUser"],
      [listReposAccessibleToInstallation, "apps.listReposAccessibleToInstallation"],
    ]);
    const listing = listings.get(method);
    if (listing) {
      guard(listing);
      for (const page of chunk(repos, options.pageSize ?? 100)) {
        yield { data: page.map(repoPayload) };
      }
      return;
    }
    const data = find(String(params.repo));
    if (method === listReleases) {
      guard("repos.listReleases");
      yield {
        data: (data.releases ?? []).map((r) => ({
          name: r.name,
          tag_name: r.name,
          created_at: r.createdAt,
          author: r.author === undefined ? { login: "releaser" } : r.author,
        })),
      };
      return;
    }
    if (method === listPulls) {
      guard("pulls.list");
      yield {
        data: (data.pullRequests ?? []).map((p) => ({
          number: p.number,
          created_at: p.createdAt,
          user: p.user === undefined ? { login: "contributor" } : p.user,
        })),
      };
      return;
    }
    throw new Error("unexpected paginate.iterator call");
  });

  const mock = {
    repos: { listForOrg, listForAuthenticatedUser, listReleases, getAllTopics, getBranch },
    pulls: { list: listPulls },
    users: { getAuthenticated },
    apps: { listReposAccessibleToInstallation },
    paginate: { iterator },
  };

  return { octokit: mock as unknown as Octokit, mock };
}
