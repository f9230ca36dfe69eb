/**
 * Diagnostic types for the retarget toolchain
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Parse unavailable (RTG1001-RTG1099)
  | "RTG1001" // Tree document carries no program
  | "RTG1002" // Tree document is not a JSON object
  | "RTG1003" // Malformed node
  // Unsupported node shapes (RTG2001-RTG2099)
  | "RTG2001" // Node kind outside the syntax model
  | "RTG2002" // No rule in the active profile, placeholder emitted
  // Configuration errors (RTG3001-RTG3099)
  | "RTG3001" // Unknown target language
  | "RTG3002" // Invalid retarget.json
  // Post-emission checks (RTG4001-RTG4099)
  | "RTG4001" // Structural imbalance of block delimiters
  | "RTG4002" // Placeholder token present in output
  | "RTG4003"; // Emitted JavaScript/TypeScript does not parse

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Attach a file name to diagnostics that were produced without one.
 */
export const withFile = (
  diagnostic: Diagnostic,
  file: string
): Diagnostic =>
  diagnostic.location && diagnostic.location.file === ""
    ? { ...diagnostic, location: { ...diagnostic.location, file } }
    : diagnostic;

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});
