import { describe, expect, it } from "vitest";

import {
  MinerConfigSchema,
  defineConfig,
  interpolateEnvVars,
  loadConfig,
} from "../../src/core/config.js";
import { MinerError } from "../../src/core/errors.js";

describe("default config values", () => {
  it("produces a fully-populated config from an empty object", () => {
    const config = loadConfig({}, { env: {} });

    expect(config.repository).toEqual({ path: "." });
    expect(config.correlation.bestEffort).toBe(true);
    expect(config.output.path).toBe(".repo-miner/dataset.json");
  });

  it("has correct remote defaults", () => {
    const config = loadConfig({}, { env: {} });

    expect(config.remote.enabled).toBe(true);
    expect(config.remote.resources).toEqual(["issues", "pulls", "contributors"]);
    expect(config.remote.perPage).toBe(100);
    expect(config.remote.maxPages).toBe(50);
    expect(config.remote.maxRetries).toBe(3);
    expect(config.remote.maxRetryWaitMs).toBe(120_000);
    expect(config.remote.deadlineMs).toBeUndefined();
    expect(config.remote.token).toBeUndefined();
  });

  it("has correct cache defaults", () => {
    const config = loadConfig({}, { env: {} });

    expect(config.cache.enabled).toBe(true);
    expect(config.cache.directory).toBe(".repo-miner/cache");
    expect(config.cache.historyTtlMs).toBeNull();
    expect(config.cache.remoteTtlMs).toBe(3_600_000);
    expect(config.cache.analysisTtlMs).toBe(604_800_000);
  });

  it("has correct analysis defaults", () => {
    const config = loadConfig({}, { env: {} });

    expect(config.analysis.concurrency).toBe(4);
    expect(config.analysis.history).toBe(true);
    expect(config.analysis.extensions).toContain(".tsx");
    expect(config.analysis.exclude).toEqual([
      "node_modules/",
      "dist/",
      "build/",
      "coverage/",
      "vendor/",
      ".d.ts",
      ".min.js",
    ]);
  });

  it("keeps explicit values over defaults", () => {
    const config = loadConfig(
      {
        remote: { owner: "octo", name: "demo", maxPages: 2 },
        analysis: { history: false },
      },
      { env: {} },
    );

    expect(config.remote.owner).toBe("octo");
    expect(config.remote.name).toBe("demo");
    expect(config.remote.maxPages).toBe(2);
    expect(config.remote.perPage).toBe(100);
    expect(config.analysis.history).toBe(false);
  });
});

describe("environment interpolation", () => {
  it("replaces variables inside strings", () => {
    expect(interpolateEnvVars("token-${TOKEN}", { TOKEN: "test-secret" })).toBe("token-test-secret");
  });

  it("interpolates nested config values", () => {
    const config = loadConfig({ remote: { token: "${GITHUB_TOKEN}" } }, { env: { GITHUB_TOKEN: "test-secret" } });

    expect(config.remote.token).toBe("test-secret");
  });

  it("throws CONFIG_SECRET_MISSING with the config path of the reference", () => {
    let thrown: unknown;
    try {
      loadConfig({ remote: { token: "${MISSING_TOKEN}" } }, { env: {} });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(MinerError);
    const error = thrown instanceof MinerError ? thrown : undefined;
    expect(error?.code).toBe("CONFIG_SECRET_MISSING");
    expect(error?.severity).toBe("fatal");
    expect(error?.context).toEqual({ variableName: "MISSING_TOKEN", path: "remote.token" });
  });
});

describe("validation", () => {
  it("rejects unknown keys with CONFIG_INVALID", () => {
    expect(() => loadConfig({ remote: { pages: 3 } }, { env: {} })).toThrowError(
      expect.objectContaining({ code: "CONFIG_INVALID" }),
    );
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ remote: { perPage: 500 } }, { env: {} })).toThrowError(
      expect.objectContaining({ code: "CONFIG_INVALID" }),
    );
  });

  it("lists each issue with its path", () => {
    let thrown: unknown;
    try {
      loadConfig({ analysis: { concurrency: 0 } }, { env: {} });
    } catch (error) {
      thrown = error;
    }

    const issues = thrown instanceof MinerError ? thrown.context?.issues : undefined;
    expect(issues).toEqual([expect.objectContaining({ path: "analysis.concurrency" })]);
  });

  it("exposes the schema and a typed identity helper", () => {
    const input = defineConfig({ cache: { enabled: false } });

    expect(input).toEqual({ cache: { enabled: false } });
    expect(MinerConfigSchema.parse(input).cache.enabled).toBe(false);
  });
});
