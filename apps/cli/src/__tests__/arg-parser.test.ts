import { describe, expect, it } from "vitest";
import { getConfigFromCli, parseConfig } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("parseConfig", () => {
  it("reads the scenario path with defaults", () => {
    expect(parseConfig(["scenario.json"])).toEqual({
      index: "scenario.json",
      json: false,
      color: true,
      validateOnly: false,
    });
  });

  it("accepts every flag", () => {
    expect(
      parseConfig(["--json", "--no-color", "--validate-only", "./shapes.json"])
    ).toEqual({
      index: "./shapes.json",
      json: true,
      color: false,
      validateOnly: true,
    });
  });
});

describe("getConfigFromCli", () => {
  it("parses process arguments after the script name", () => {
    const config = runWithArgv(["node", "expandc", "demo.json", "--json"]);
    expect(config.index).toBe("demo.json");
    expect(config.json).toBe(true);
  });
});
