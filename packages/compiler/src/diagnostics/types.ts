export type SourceSpan = {
  file: string;
  start: number;
  end: number;
};

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "declaration" | "expansion" | "typing";

export type DiagnosticHint = {
  message: string;
};

export type Diagnostic = {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
};

export type DiagnosticInput = Omit<Diagnostic, "severity"> & {
  severity?: DiagnosticSeverity;
};
