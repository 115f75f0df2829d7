import picomatch from "picomatch";
import type { RepositorySummary, TopicLookup } from "../types.js";
import { NotFoundError } from "../errors.js";
import * as log from "../log.js";

interface ExemptionContext {
  exemptRepos: readonly string[];
  exemptTopics: readonly string[];
}

type ExemptionRule = (repo: RepositorySummary, ctx: ExemptionContext) => Promise<boolean>;

// picomatch syntax that shell globs lack: negation, braces, extglobs.
const NON_SHELL_SYNTAX = /[!{}()+@|,]/g;

const SHELL_GLOB_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  nonegate: true,
  nobrace: true,
  noextglob: true,
};

function toShellGlob(pattern: string): string {
  // Shell `[!abc]` is picomatch `[^abc]`.
  return pattern.replace(/\[!/g, "[^").replace(NON_SHELL_SYNTAX, "\\$&");
}

/**
 * Case-sensitive shell-glob match of a repository name against any pattern.
 * Only `*`, `?` and `[...]` are special; every other character is literal.
 */
export function matchesAnyPattern(name: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return false;
  const matchers = patterns.map((p) => picomatch(toShellGlob(p), SHELL_GLOB_OPTIONS));
  return matchers.some((m) => m(name));
}

/**
 * Topic lookup where a 404 (restricted or temporary forks) is an outcome,
 * not an error. Everything else propagates.
 */
export async function lookupTopics(repo: RepositorySummary): Promise<TopicLookup> {
  try {
    return { status: "found", topics: await repo.topics() };
  } catch (err: unknown) {
    if (err instanceof NotFoundError) {
      return { status: "not-found" };
    }
    throw err;
  }
}

const nameRule: ExemptionRule = async (repo, ctx) =>
  matchesAnyPattern(repo.name, ctx.exemptRepos);

const topicRule: ExemptionRule = async (repo, ctx) => {
  if (ctx.exemptTopics.length === 0) return false;

  const lookup = await lookupTopics(repo);
  if (lookup.status === "not-found") {
    log.warn(`${repo.url}: topics not found (restricted or temporary fork?), treating as not exempt`);
    return false;
  }
  const exempt = new Set(ctx.exemptTopics);
  return lookup.topics.some((t) => exempt.has(t));
};

// Evaluated in order; the first match wins and later rules are not run.
const RULES: readonly ExemptionRule[] = [nameRule, topicRule];

export async function isExempt(
  repo: RepositorySummary,
  exemptRepos: readonly string[],
  exemptTopics: readonly string[],
): Promise<boolean> {
  const ctx: ExemptionContext = { exemptRepos, exemptTopics };
  for (const rule of RULES) {
    if (await rule(repo, ctx)) {
      log.info(`${repo.url} is exempt from stale repo check`);
      return true;
    }
  }
  return false;
}
