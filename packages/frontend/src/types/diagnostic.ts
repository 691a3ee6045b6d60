/**
 * Diagnostic types for luastitch
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Analysis errors (LST1001-LST1099)
  | "LST1001" // Script not found
  | "LST1002" // Circular dependency detected
  | "LST1003" // Dynamic require
  | "LST1004" // Dependency limit exceeded
  | "LST1005" // Module not found
  | "LST1006" // Native module cannot be bundled
  // Bundling errors (LST2001-LST2099)
  | "LST2001" // Empty manifest
  | "LST2002" // Module key claimed by two files
  | "LST2003" // Module source unreadable
  | "LST2004" // Bundle output unwritable
  // Packaging errors (LST3001-LST3099)
  | "LST3001" // Unknown engine
  | "LST3002" // Toolchain executable missing
  | "LST3003" // Packaging process failed
  | "LST3004" // Output artifact missing after success exit
  | "LST3005"; // Engine not available on this platform

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
