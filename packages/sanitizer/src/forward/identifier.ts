/**
 * Identifier validation for forward reference and scope names
 */

import {
  type HintDiagnostic,
  type Result,
  error,
  hintError,
  ok,
} from "@hintwarden/hints";

const IDENTIFIER = /^[\p{ID_Start}_$][\p{ID_Continue}$\u200C\u200D]*$/u;

export const isIdentifier = (text: string): boolean => IDENTIFIER.test(text);

/**
 * True for `name` and `a.b.c`, false for `""`, `a.`, `.a` and `a..b`.
 */
export const isDottedIdentifier = (text: string): boolean =>
  text.split(".").every(isIdentifier);

export const validateDottedIdentifier = (
  text: string,
  label: string
): Result<string, HintDiagnostic> =>
  isDottedIdentifier(text)
    ? ok(text)
    : error(
        hintError(
          "HWD2001",
          `${label} ${JSON.stringify(text)} not a valid dotted identifier.`
        )
      );
