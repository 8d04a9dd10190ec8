import { formatCliDiagnostic } from "./diagnostics.js";
import { type ScenarioReport, describeOutcome } from "./run-scenario.js";

export const summaryLines = (report: ScenarioReport): string[] => [
  ...report.functions
    .filter((fn) => fn.diagnostics.length > 0)
    .map((fn) => `${fn.name}: invalid signature (${fn.diagnostics.length} error(s))`),
  ...report.calls.map((call) => `${call.call}: ${describeOutcome(call.outcome)}`),
];

/** Summaries go to stdout; diagnostics go to stderr. */
export const printReport = (
  report: ScenarioReport,
  { color }: { color: boolean }
): void => {
  summaryLines(report).forEach((line) => console.log(line));
  report.diagnostics.forEach((diagnostic) =>
    console.error(formatCliDiagnostic(diagnostic, { color }))
  );
};

export const printJson = (report: ScenarioReport): void => {
  console.log(JSON.stringify(report, undefined, 2));
};
