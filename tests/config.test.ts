import { afterEach, describe, expect, it } from "vitest";

import { loadConfig, loadDirectoryConfig } from "../src/config/index.js";

const touched = ["JWT_SECRET", "GRAPH_MAX_RETRIES", "SNAPSHOT_PATH"];
const saved = Object.fromEntries(touched.map((key) => [key, process.env[key]]));

describe("configuration", () => {
  afterEach(() => {
    for (const key of touched) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("applies defaults for directory settings", () => {
    delete process.env["GRAPH_MAX_RETRIES"];
    delete process.env["SNAPSHOT_PATH"];

    const config = loadDirectoryConfig();

    expect(config.GRAPH_MAX_RETRIES).toBe(3);
    expect(config.SNAPSHOT_PATH).toBe("./core-data/license-catalog.csv");
  });

  it("coerces numeric settings", () => {
    process.env["GRAPH_MAX_RETRIES"] = "5";

    expect(loadDirectoryConfig().GRAPH_MAX_RETRIES).toBe(5);
  });

  it("requires a JWT secret for the HTTP API", () => {
    process.env["JWT_SECRET"] = "short";

    expect(() => loadConfig()).toThrow(/^Invalid environment configuration: JWT_SECRET:/);
  });
});
