import { getConfig } from "./config/index.js";
import { printJson, printReport } from "./report.js";
import { runScenario } from "./run-scenario.js";
import { buildProgram } from "./scenario/build-program.js";
import { ScenarioError, loadScenario } from "./scenario/parse-scenario.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const scenario = await loadScenario(config.index);
  const program = buildProgram(scenario, config.index);
  const report = runScenario(program, { validateOnly: config.validateOnly });

  if (config.json) {
    printJson(report);
  } else {
    printReport(report, { color: config.color });
  }

  if (report.hasErrors) {
    process.exitCode = 1;
  }
}

function errorHandler(error: unknown) {
  if (error instanceof ScenarioError) {
    console.error(`invalid scenario: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
}
