import { Octokit } from "@octokit/rest";
import { createAppAuth } from "@octokit/auth-app";
import type {
  CommitSummary,
  GitHubAuth,
  PullRequestSummary,
  ReleaseSummary,
  RepositorySummary,
} from "./types.js";
import {
  AuthenticationError,
  MalformedRecordError,
  NotFoundError,
  ProviderError,
  errorMessage,
} from "./errors.js";
import { withRetry } from "./retry.js";
import * as log from "./log.js";

const PAGE_SIZE = 100;
// Only the first item of releases / pull requests is ever read.
const LATEST_PAGE_SIZE = 10;

export type OctokitOptions = NonNullable<ConstructorParameters<typeof Octokit>[0]>;

export interface GitHubClientOptions {
  auth: GitHubAuth;
  enterpriseUrl?: string;
  userAgent?: string;
}

/** Fields of the repository listing payload the adapter reads. */
export interface RepositoryPayload {
  name: string;
  full_name: string;
  html_url: string;
  owner: { login: string };
  private?: boolean;
  archived?: boolean;
  pushed_at?: string | null;
  default_branch?: string;
}

export interface ReleasePayload {
  name?: string | null;
  tag_name?: string;
  created_at?: string | null;
  author?: unknown;
}

export interface PullRequestPayload {
  number: number;
  created_at?: string | null;
  user?: unknown;
}

export function apiBaseUrl(enterpriseUrl?: string): string | undefined {
  const trimmed = enterpriseUrl?.trim().replace(/\/+$/, "");
  if (!trimmed) return undefined;
  return `${trimmed}/api/v3`;
}

/**
 * Constructor options for the given credentials. A GitHub App registered on
 * github.com talks to github.com even when an enterprise URL is configured,
 * unless `enterpriseOnly` is set.
 */
export function clientOptions(options: GitHubClientOptions): OctokitOptions {
  const { auth } = options;
  const userAgent = options.userAgent ?? "stale-repos";
  switch (auth.kind) {
    case "token":
      return { auth: auth.token, baseUrl: apiBaseUrl(options.enterpriseUrl), userAgent };
    case "app":
      return {
        authStrategy: createAppAuth,
        auth: { appId: auth.appId, privateKey: auth.privateKey, installationId: auth.installationId },
        baseUrl: auth.enterpriseOnly ? apiBaseUrl(options.enterpriseUrl) : undefined,
        userAgent,
      };
  }
}

export function createGitHubClient(options: GitHubClientOptions): Octokit {
  const octokitOptions = clientOptions(options);
  const mode = options.auth.kind === "app" ? `GitHub App ${options.auth.appId}` : "token";
  log.debug(`Connecting to ${octokitOptions.baseUrl ?? "https://api.github.com"} (${mode})…`);
  return new Octokit(octokitOptions);
}

// ── Error mapping ──────────────────────────────────────────────

function readStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function rateLimitExhausted(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("response" in err)) return false;
  const response = err.response;
  if (typeof response !== "object" || response === null || !("headers" in response)) return false;
  const headers = response.headers;
  if (typeof headers !== "object" || headers === null || !("x-ratelimit-remaining" in headers)) return false;
  return String(headers["x-ratelimit-remaining"]) === "0";
}

/** Translate an Octokit request failure into the provider error taxonomy. */
export function toProviderError(label: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;

  const status = readStatus(err);
  const msg = errorMessage(err);
  if (status === 404) {
    return new NotFoundError(`${label}: ${msg}`, err);
  }
  if (status === 401 || (status === 403 && !rateLimitExhausted(err))) {
    return new AuthenticationError(`${label}: ${msg}`, status, err);
  }
  return new ProviderError(`${label}: ${msg}`, { status, cause: err });
}

async function request<T>(label: string, fn: () => Promise<T>): Promise<T> {
  return withRetry(label, async () => {
    try {
      return await fn();
    } catch (err: unknown) {
      throw toProviderError(label, err);
    }
  });
}

async function* mapErrors<T>(label: string, pages: AsyncIterable<T>): AsyncGenerator<T> {
  try {
    yield* pages;
  } catch (err: unknown) {
    throw toProviderError(label, err);
  }
}

// ── Payload mapping ────────────────────────────────────────────

export function toReleaseSummary(fullName: string, payload: ReleasePayload): ReleaseSummary {
  const label = payload.name ?? payload.tag_name ?? "(unnamed)";
  if (payload.author === null) {
    throw new MalformedRecordError(`release '${label}' of ${fullName} has no resolvable author`);
  }
  if (!payload.created_at) {
    throw new MalformedRecordError(`release '${label}' of ${fullName} has no creation date`);
  }
  return { name: label, createdAt: payload.created_at };
}

export function toPullRequestSummary(fullName: string, payload: PullRequestPayload): PullRequestSummary {
  if (payload.user === null) {
    throw new MalformedRecordError(`pull request #${payload.number} of ${fullName} has no resolvable author`);
  }
  if (!payload.created_at) {
    throw new MalformedRecordError(`pull request #${payload.number} of ${fullName} has no creation date`);
  }
  return { number: payload.number, createdAt: payload.created_at };
}

/**
 * Wrap a listing payload. The plain fields are copied; topics, releases,
 * pull requests and the branch tip are fetched only when asked for.
 */
export function toRepositorySummary(octokit: Octokit, payload: RepositoryPayload): RepositorySummary {
  const owner = payload.owner.login;
  const repo = payload.name;
  const fullName = payload.full_name;
  const defaultBranch = payload.default_branch ?? "main";

  return {
    url: payload.html_url,
    name: payload.name,
    fullName,
    archived: payload.archived ?? false,
    // GitHub omits `private` on some partial payloads; never report those as public.
    visibility: payload.private === false ? "public" : "private",
    pushedAt: payload.pushed_at ?? null,
    defaultBranch,

    async topics(): Promise<string[]> {
      const response = await request(`Fetch topics for ${fullName}`, () =>
        octokit.repos.getAllTopics({ owner, repo }),
      );
      return response.data.names;
    },

    async *releases(): AsyncGenerator<ReleaseSummary> {
      const pages = octokit.paginate.iterator(octokit.repos.listReleases, {
        owner,
        repo,
        per_page: LATEST_PAGE_SIZE,
      });
      for await (const page of mapErrors(`List releases for ${fullName}`, pages)) {
        for (const release of page.data) {
          yield toReleaseSummary(fullName, release);
        }
      }
    },

    async *pullRequests(): AsyncGenerator<PullRequestSummary> {
      const pages = octokit.paginate.iterator(octokit.pulls.list, {
        owner,
        repo,
        state: "all",
        sort: "created",
        direction: "desc",
        per_page: LATEST_PAGE_SIZE,
      });
      for await (const page of mapErrors(`List pull requests for ${fullName}`, pages)) {
        for (const pr of page.data) {
          yield toPullRequestSummary(fullName, pr);
        }
      }
    },

    async defaultBranchCommit(): Promise<CommitSummary> {
      const response = await request(`Fetch branch '${defaultBranch}' for ${fullName}`, () =>
        octokit.repos.getBranch({ owner, repo, branch: defaultBranch }),
      );
      const commit = response.data.commit;
      return { sha: commit.sha, committedAt: commit.commit.committer?.date ?? null };
    },
  };
}

/**
 * Fails fast on bad credentials. Returns the login of the token owner, or a
 * label for the app installation (installation tokens have no user).
 */
export async function verifyAuthentication(octokit: Octokit, auth?: GitHubAuth): Promise<string> {
  if (auth?.kind === "app") {
    await request("Authenticate to GitHub", () =>
      octokit.apps.listReposAccessibleToInstallation({ per_page: 1 }),
    );
    return `GitHub App installation ${auth.installationId}`;
  }
  const response = await request("Authenticate to GitHub", () => octokit.users.getAuthenticated());
  return response.data.login;
}

async function* summaries(
  octokit: Octokit,
  label: string,
  pages: AsyncIterable<{ data: RepositoryPayload[] }>,
): AsyncGenerator<RepositorySummary> {
  for await (const page of mapErrors(label, pages)) {
    for (const payload of page.data) {
      yield toRepositorySummary(octokit, payload);
    }
  }
}

/**
 * Repositories of `organization`. Without one: the repositories owned by the
 * token owner, or those the app installation can access. Pages are fetched
 * as the consumer pulls.
 */
export function listRepositories(
  octokit: Octokit,
  organization?: string,
  auth?: GitHubAuth,
): AsyncGenerator<RepositorySummary> {
  if (organization) {
    const pages = octokit.paginate.iterator(octokit.repos.listForOrg, {
      org: organization,
      type: "all",
      per_page: PAGE_SIZE,
    });
    return summaries(octokit, `List repositories of ${organization}`, pages);
  }

  if (auth?.kind === "app") {
    const pages = octokit.paginate.iterator(octokit.apps.listReposAccessibleToInstallation, {
      per_page: PAGE_SIZE,
    });
    return summaries(octokit, "List repositories of the app installation", pages);
  }

  const pages = octokit.paginate.iterator(octokit.repos.listForAuthenticatedUser, {
    type: "owner",
    per_page: PAGE_SIZE,
  });
  return summaries(octokit, "List repositories of the authenticated user", pages);
}
