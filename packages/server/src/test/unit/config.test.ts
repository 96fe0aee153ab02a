/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { loadServerConfig } from "../../config.js";

describe("loadServerConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      enabled: true,
      readOnly: false,
      dataFile: path.resolve("./data/peeringdb/net.json"),
    });
  });

  it("should expand a home-relative data file", () => {
    expect(loadServerConfig({ NETVIZ_DATA_FILE: "~/net.json" }).dataFile).toBe(path.join(homedir(), "net.json"));
  });

  it("should resolve a relative data file against the working directory", () => {
    expect(loadServerConfig({ NETVIZ_DATA_FILE: "dumps/net.json" }).dataFile).toBe(
      path.join(process.cwd(), "dumps", "net.json")
    );
  });

  it("should treat an empty data file as unset", () => {
    expect(loadServerConfig({ NETVIZ_DATA_FILE: "" }).dataFile).toBe(path.resolve("./data/peeringdb/net.json"));
  });

  it("should only honour exact flag values", () => {
    expect(loadServerConfig({ NETVIZ_MCP_ENABLED: "false", NETVIZ_MCP_READONLY: "true" })).toEqual(
      expect.objectContaining({ enabled: false, readOnly: true })
    );
    expect(loadServerConfig({ NETVIZ_MCP_ENABLED: "no", NETVIZ_MCP_READONLY: "1" })).toEqual(
      expect.objectContaining({ enabled: true, readOnly: false })
    );
  });
});
