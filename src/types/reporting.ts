import type { RepoVisibility } from "./repository.js";

/** One entry of stale_repos.json and of the `inactiveRepos` workflow output. */
export interface JsonStaleRepo {
  url: string;
  daysInactive: number;
  lastPushDate: string;
  visibility: RepoVisibility;
  daysSinceLastRelease: number | null;
  daysSinceLastPR: number | null;
}

export type JsonReport = JsonStaleRepo[];
