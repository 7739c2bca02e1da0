import { describe, expect, it } from "vitest";

import { type MineCommandOptions, applyOverrides } from "../../src/cli/commands/mine.js";
import { loadConfig } from "../../src/core/config.js";

function defaults(): MineCommandOptions {
  return { remote: true, cache: true, history: true };
}

describe("applyOverrides", () => {
  const config = loadConfig({ remote: { owner: "octo", name: "demo" } }, { env: {} });

  it("keeps the config when no flags are given", () => {
    expect(applyOverrides(config, defaults())).toEqual(config);
  });

  it("applies path, output and paging flags", () => {
    const result = applyOverrides(config, {
      ...defaults(),
      repo: "../service",
      branch: "release",
      output: "out/service.json",
      maxPages: 5,
      deadline: 30_000,
    });

    expect(result.repository).toEqual({ path: "../service", branch: "release" });
    expect(result.output.path).toBe("out/service.json");
    expect(result.remote.maxPages).toBe(5);
    expect(result.remote.deadlineMs).toBe(30_000);
  });

  it("splits --github into owner and name", () => {
    const result = applyOverrides(config, { ...defaults(), github: "hubot/tools" });

    expect(result.remote.owner).toBe("hubot");
    expect(result.remote.name).toBe("tools");
  });

  it("lets negated flags switch features off but never on", () => {
    const off = applyOverrides(config, { remote: false, cache: false, history: false });
    expect(off.remote.enabled).toBe(false);
    expect(off.cache.enabled).toBe(false);
    expect(off.analysis.history).toBe(false);

    const disabled = loadConfig({ cache: { enabled: false } }, { env: {} });
    expect(applyOverrides(disabled, defaults()).cache.enabled).toBe(false);
  });
});
