import { Command } from "commander";
import { readFileSync } from "node:fs";
import type { ExpandcConfig } from "./types.js";

const readVersion = (): string => {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf8")
  );
  return typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
};

export const parseConfig = (argv: readonly string[]): ExpandcConfig => {
  const program = new Command()
    .name("expandc")
    .description("Validate expanded parameters and resolve the calls that use them")
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<scenario>", "scenario JSON file")
    .option("--json", "print the full report as JSON")
    .option("--no-color", "disable colored diagnostics")
    .option("--validate-only", "validate signatures without resolving calls");

  program.parse(["node", "expandc", ...argv]);
  const opts = program.opts<{ json?: boolean; color: boolean; validateOnly?: boolean }>();
  const [index] = program.args;
  if (index === undefined) {
    program.error("missing scenario file");
  }

  return {
    index,
    json: opts.json ?? false,
    color: opts.color,
    validateOnly: opts.validateOnly ?? false,
  };
};

export const getConfigFromCli = (): ExpandcConfig =>
  parseConfig(process.argv.slice(2));
