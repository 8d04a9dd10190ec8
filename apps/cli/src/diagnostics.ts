import type {
  Diagnostic,
  DiagnosticSeverity,
} from "@expandc/compiler/diagnostics/index.js";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

export const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

/**
 * Renders `<file>:<start>-<end> SEVERITY [phase] CODE: message`, followed by
 * one indented line per hint.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const { file, start, end } = diagnostic.span;
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${file}:${start}-${end} ${color.severityLabel(
    diagnostic.severity
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const hints = (diagnostic.hints ?? []).map((hint) =>
    color.muted(`  hint: ${hint.message}`)
  );

  return [header, ...hints].join("\n");
};
