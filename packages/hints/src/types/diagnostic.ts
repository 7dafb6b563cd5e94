/**
 * Diagnostic types for hint sanitization
 */

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticCode =
  | "HWD1001" // Malformed hint: template arity mismatch
  | "HWD1002" // Type argument violates type parameter bound
  | "HWD1003" // Unsupported raw hint value
  | "HWD1004" // Unsupported hint expression syntax
  | "HWD1005" // Hint not subscriptable
  | "HWD1006" // Return hint incompatible with callable kind
  | "HWD2001" // Invalid identifier
  | "HWD2002" // Forward scope lookup miss (untrusted caller)
  | "HWD2003" // Forward reference unresolvable
  | "HWD2004"; // Forward reference target not a class

/**
 * Placeholder prefixing every diagnostic message raised below the sanitizer.
 * Entry points substitute the caller-supplied site label for it.
 */
export const HINT_SITE_PLACEHOLDER = "$HINT_SITE$ ";

export type HintDiagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Offending values, for the violation-explanation engine */
  readonly culprits?: readonly unknown[];
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  culprits?: readonly unknown[],
  hint?: string
): HintDiagnostic => ({
  code,
  severity,
  message,
  culprits,
  hint,
});

/**
 * Shorthand for the common case: an error whose message starts with the site
 * placeholder.
 */
export const hintError = (
  code: DiagnosticCode,
  message: string,
  culprits?: readonly unknown[]
): HintDiagnostic =>
  createDiagnostic(code, "error", `${HINT_SITE_PLACEHOLDER}${message}`, culprits);

/**
 * Substitute a human-readable site label (e.g. `Function "greet()" parameter
 * "name" `) for every placeholder in the message.
 */
export const replaceSitePlaceholder = (
  diagnostic: HintDiagnostic,
  prefix: string
): HintDiagnostic => ({
  ...diagnostic,
  message: diagnostic.message.split(HINT_SITE_PLACEHOLDER).join(prefix),
});

export const formatDiagnostic = (diagnostic: HintDiagnostic): string => {
  const parts: string[] = [];

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
