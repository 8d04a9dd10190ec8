export type ExpandcConfig = {
  /** Path to the scenario file. */
  index: string;
  /** Print the full report as JSON instead of summary lines. */
  json: boolean;
  /** Color diagnostics with ANSI escapes. */
  color: boolean;
  /** Validate function signatures without resolving calls. */
  validateOnly: boolean;
};
