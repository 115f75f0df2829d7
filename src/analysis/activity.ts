import type { ActivityMethod, ActivitySignal, RepositorySummary } from "../types.js";
import { AuthenticationError, errorMessage } from "../errors.js";
import { parseTimestamp } from "./staleness.js";
import * as log from "../log.js";

function fromText(text: string | null): ActivitySignal {
  if (text === null) return { status: "unavailable", reason: "no-timestamp" };
  const at = parseTimestamp(text);
  if (!at) return { status: "unavailable", reason: "invalid-timestamp" };
  return { status: "resolved", at };
}

async function resolveDefaultBranchActivity(repo: RepositorySummary): Promise<ActivitySignal> {
  let committedAt: string | null;
  try {
    const commit = await repo.defaultBranchCommit();
    committedAt = commit.committedAt;
  } catch (err: unknown) {
    if (err instanceof AuthenticationError) throw err;
    log.warn(`${repo.url}: could not resolve the tip of '${repo.defaultBranch}' — ${errorMessage(err)}`);
    return { status: "unavailable", reason: "lookup-failed" };
  }
  return fromText(committedAt);
}

/**
 * The instant that counts as the repository's last activity.
 *
 * - `pushed`: the repository's last push.
 * - `default-branch-updated`: committer date of the default branch tip.
 *   Lookup failures (deleted branch, unresolvable committer) make the
 *   activity unavailable instead of failing the run.
 */
export async function resolveActivity(
  repo: RepositorySummary,
  method: ActivityMethod,
): Promise<ActivitySignal> {
  let signal: ActivitySignal;
  switch (method) {
    case "pushed":
      signal = fromText(repo.pushedAt);
      break;
    case "default-branch-updated":
      signal = await resolveDefaultBranchActivity(repo);
      break;
    default: {
      const unsupported: never = method;
      throw new Error(`Unsupported activity method: ${String(unsupported)}`);
    }
  }

  if (signal.status === "unavailable") {
    log.debug(`${repo.url}: no activity timestamp (${signal.reason}), skipping`);
  }
  return signal;
}
