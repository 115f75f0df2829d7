import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  createPolicy,
  getConfig,
  loadConfigFile,
  parseActivityMethod,
  parseBoolean,
  parseInteger,
  parseList,
  parseMetrics,
  resolveAuth,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseList", () => {
  it("splits on commas, trims and drops empty entries", () => {
    expect(parseList(" a, b ,,c ,")).toEqual(["a", "b", "c"]);
  });

  it("returns an empty list for unset or empty values", () => {
    expect(parseList(undefined)).toEqual([]);
    expect(parseList("")).toEqual([]);
  });
});

describe("parseBoolean", () => {
  it("accepts 'true' in any case", () => {
    expect(parseBoolean("TRUE", false)).toBe(true);
    expect(parseBoolean(" true ", false)).toBe(true);
  });

  it("falls back to the default when unset or blank", () => {
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parseBoolean("  ", true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  it("treats anything else as false", () => {
    expect(parseBoolean("false", true)).toBe(false);
    expect(parseBoolean("yes", true)).toBe(false);
  });
});

describe("parseInteger", () => {
  it("parses integers", () => {
    expect(parseInteger("X", "365")).toBe(365);
    expect(parseInteger("X", " 0 ")).toBe(0);
  });

  it("returns undefined for blank values", () => {
    expect(parseInteger("X", undefined)).toBeUndefined();
    expect(parseInteger("X", "")).toBeUndefined();
  });

  it("rejects non-integers", () => {
    expect(() => parseInteger("INACTIVE_DAYS", "ten")).toThrow("INACTIVE_DAYS must be an integer, got 'ten'");
    expect(() => parseInteger("INACTIVE_DAYS", "1.5")).toThrow(ConfigError);
  });
});

describe("parseActivityMethod", () => {
  it("defaults to pushed", () => {
    expect(parseActivityMethod(undefined)).toBe("pushed");
    expect(parseActivityMethod("")).toBe("pushed");
  });

  it("accepts supported methods case-insensitively", () => {
    expect(parseActivityMethod("Default-Branch-Updated")).toBe("default-branch-updated");
  });

  it("rejects unsupported methods", () => {
    expect(() => parseActivityMethod("created")).toThrow(
      "ACTIVITY_METHOD 'created' is not supported. Use one of: pushed, default-branch-updated",
    );
  });
});

describe("parseMetrics", () => {
  it("normalizes and de-duplicates", () => {
    expect(parseMetrics(["PR", "release", "pr"])).toEqual(["pr", "release"]);
  });

  it("rejects unknown metrics", () => {
    expect(() => parseMetrics(["stars"])).toThrow(ConfigError);
  });
});

describe("createPolicy", () => {
  it("fills defaults and freezes the result", () => {
    const policy = createPolicy({ inactiveDays: 10 });
    expect(policy).toEqual({
      inactiveDays: 10,
      exemptRepos: [],
      exemptTopics: [],
      activityMethod: "pushed",
      additionalMetrics: [],
    });
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.exemptRepos)).toBe(true);
  });

  it("copies the input lists", () => {
    const exemptRepos = ["docs"];
    const policy = createPolicy({ inactiveDays: 1, exemptRepos });
    exemptRepos.push("later");
    expect(policy.exemptRepos).toEqual(["docs"]);
  });

  it("rejects negative or fractional thresholds", () => {
    expect(() => createPolicy({ inactiveDays: -1 })).toThrow(ConfigError);
    expect(() => createPolicy({ inactiveDays: 2.5 })).toThrow(ConfigError);
  });
});

describe("resolveAuth", () => {
  const APP_ENV = {
    GH_APP_ID: "123",
    GH_APP_INSTALLATION_ID: "456",
    GH_APP_PRIVATE_KEY: "test-private-key",
  };

  it("uses GH_TOKEN", () => {
    expect(resolveAuth({ GH_TOKEN: " test-token " })).toEqual({ kind: "token", token: "test-token" });
  });

  it("requires GH_TOKEN or GitHub App credentials", () => {
    expect(() => resolveAuth({})).toThrow("GH_TOKEN environment variable not set");
    expect(() => resolveAuth({ GH_TOKEN: "  " })).toThrow(ConfigError);
  });

  it("builds GitHub App credentials", () => {
    expect(resolveAuth(APP_ENV)).toEqual({
      kind: "app",
      appId: 123,
      installationId: 456,
      privateKey: "test-private-key",
      enterpriseOnly: false,
    });
  });

  it("prefers the GitHub App over GH_TOKEN", () => {
    expect(resolveAuth({ ...APP_ENV, GH_TOKEN: "test-token" }).kind).toBe("app");
  });

  it("reads GITHUB_APP_ENTERPRISE_ONLY", () => {
    const auth = resolveAuth({ ...APP_ENV, GITHUB_APP_ENTERPRISE_ONLY: "TRUE" });
    expect(auth.kind === "app" && auth.enterpriseOnly).toBe(true);
  });

  it("restores newlines escaped in the private key", () => {
    const auth = resolveAuth({ ...APP_ENV, GH_APP_PRIVATE_KEY: "-----BEGIN KEY-----\\ntest\\n-----END KEY-----" });
    expect(auth.kind === "app" && auth.privateKey).toBe("-----BEGIN KEY-----\ntest\n-----END KEY-----");
  });

  it("rejects an app ID without the installation ID or private key", () => {
    const message = "GH_APP_ID set and GH_APP_INSTALLATION_ID or GH_APP_PRIVATE_KEY variable not set";
    expect(() => resolveAuth({ GH_APP_ID: "123", GH_APP_PRIVATE_KEY: "test-private-key" })).toThrow(message);
    expect(() => resolveAuth({ GH_APP_ID: "123", GH_APP_INSTALLATION_ID: "456" })).toThrow(message);
    expect(() => resolveAuth({ GH_APP_ID: "123", GH_APP_INSTALLATION_ID: "456", GH_TOKEN: "test-token" })).toThrow(
      message,
    );
  });

  it("rejects non-numeric app IDs", () => {
    expect(() => resolveAuth({ ...APP_ENV, GH_APP_ID: "my-app" })).toThrow("GH_APP_ID must be an integer, got 'my-app'");
  });
});

describe("loadConfigFile / getConfig", () => {
  let dir: string | undefined;

  function writeConfig(content: unknown): string {
    dir = mkdtempSync(join(tmpdir(), "stale-repos-config-"));
    const path = join(dir, "stale-repos-config.json");
    writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
    return path;
  }

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("throws when an explicit config path does not exist", () => {
    expect(() => loadConfigFile("/nonexistent/stale-repos-config.json")).toThrow(ConfigError);
  });

  it("rejects malformed JSON", () => {
    const path = writeConfig("{ not json");
    expect(() => loadConfigFile(path)).toThrow(/Failed to parse/);
  });

  it("rejects wrongly typed keys", () => {
    const path = writeConfig({ exemptRepos: "docs" });
    expect(() => loadConfigFile(path)).toThrow("Config 'exemptRepos' must be an array of strings");
  });

  it("requires GH_TOKEN", () => {
    const path = writeConfig({ inactiveDays: 30 });
    expect(() => getConfig({ configPath: path, env: {} })).toThrow("GH_TOKEN environment variable not set");
  });

  it("accepts GitHub App credentials in place of GH_TOKEN", () => {
    const path = writeConfig({ inactiveDays: 30 });
    const config = getConfig({
      configPath: path,
      env: { GH_APP_ID: "123", GH_APP_INSTALLATION_ID: "456", GH_APP_PRIVATE_KEY: "test-private-key" },
    });
    expect(config.auth).toEqual({
      kind: "app",
      appId: 123,
      installationId: 456,
      privateKey: "test-private-key",
      enterpriseOnly: false,
    });
  });

  it("requires INACTIVE_DAYS from some source", () => {
    const path = writeConfig({});
    expect(() => getConfig({ configPath: path, env: { GH_TOKEN: "test-token" } })).toThrow(
      "INACTIVE_DAYS environment variable not set",
    );
  });

  it("builds the run config from the file", () => {
    const path = writeConfig({
      organization: "test-org",
      inactiveDays: 90,
      exemptRepos: ["docs", "tmp-*"],
      exemptTopics: ["keep"],
      activityMethod: "default-branch-updated",
      additionalMetrics: ["release"],
      workflowSummary: true,
    });
    const config = getConfig({ configPath: path, env: { GH_TOKEN: "test-token" } });
    expect(config).toEqual({
      auth: { kind: "token", token: "test-token" },
      enterpriseUrl: undefined,
      organization: "test-org",
      policy: {
        inactiveDays: 90,
        exemptRepos: ["docs", "tmp-*"],
        exemptTopics: ["keep"],
        activityMethod: "default-branch-updated",
        additionalMetrics: ["release"],
      },
      skipEmptyReports: true,
      workflowSummary: true,
    });
  });

  it("lets environment variables override the file", () => {
    const path = writeConfig({ organization: "file-org", inactiveDays: 90, exemptRepos: ["docs"] });
    const config = getConfig({
      configPath: path,
      env: {
        GH_TOKEN: "test-token",
        GH_ENTERPRISE_URL: "https://ghe.example.com",
        ORGANIZATION: "env-org",
        INACTIVE_DAYS: "30",
        EXEMPT_REPOS: "a,b",
        ADDITIONAL_METRICS: "release,pr",
        SKIP_EMPTY_REPORTS: "false",
      },
    });
    expect(config.organization).toBe("env-org");
    expect(config.enterpriseUrl).toBe("https://ghe.example.com");
    expect(config.policy.inactiveDays).toBe(30);
    expect(config.policy.exemptRepos).toEqual(["a", "b"]);
    expect(config.policy.additionalMetrics).toEqual(["release", "pr"]);
    expect(config.skipEmptyReports).toBe(false);
  });

  it("lets CLI overrides win over the environment", () => {
    const path = writeConfig({});
    const config = getConfig({
      configPath: path,
      env: { GH_TOKEN: "test-token", ORGANIZATION: "env-org", INACTIVE_DAYS: "30" },
      overrides: { organization: "cli-org", inactiveDays: 7 },
    });
    expect(config.organization).toBe("cli-org");
    expect(config.policy.inactiveDays).toBe(7);
  });

  it("leaves the organization unset when none is given", () => {
    const path = writeConfig({});
    const config = getConfig({ configPath: path, env: { GH_TOKEN: "test-token", INACTIVE_DAYS: "1", ORGANIZATION: " " } });
    expect(config.organization).toBeUndefined();
  });

  it("fails on an unsupported activity method before anything runs", () => {
    const path = writeConfig({});
    expect(() =>
      getConfig({ configPath: path, env: { GH_TOKEN: "test-token", INACTIVE_DAYS: "1", ACTIVITY_METHOD: "created" } }),
    ).toThrow(ConfigError);
  });
});
