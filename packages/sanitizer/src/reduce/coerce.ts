/**
 * Coercion of raw hints into the hint model
 *
 * - string: deferred hint, destringified later through the forward scope
 * - constructor: class hint
 * - array: the legacy tuple-of-types union
 * - hint: itself
 */

import {
  type Hint,
  type HintDiagnostic,
  type RawHint,
  type Result,
  classHint,
  collectResults,
  deferred,
  error,
  hintError,
  isHint,
  isHintClass,
  map,
  ok,
  union,
} from "@hintwarden/hints";
import type { HintInterner } from "./hint-interner.js";

const isRawHintArray = (raw: RawHint): raw is readonly RawHint[] =>
  Array.isArray(raw);

export const coerceRawHint = (raw: RawHint): Result<Hint, HintDiagnostic> => {
  if (typeof raw === "string") return ok(deferred(raw));
  if (isRawHintArray(raw)) {
    return map(collectResults(raw.map(coerceRawHint)), union);
  }
  if (isHintClass(raw)) return ok(classHint(raw));
  if (isHint(raw)) return ok(raw);

  return error(
    hintError("HWD1003", `type hint ${String(raw)} unsupported.`, [raw])
  );
};

/**
 * Coerce and intern a root hint.
 */
export const coerceRootHint = (
  raw: RawHint,
  interner: HintInterner
): Result<Hint, HintDiagnostic> =>
  map(coerceRawHint(raw), (hint) => interner.intern(hint));

/**
 * Coerce a child hint: children are already hints, so only interning applies.
 */
export const coerceHintAny = (hint: Hint, interner: HintInterner): Hint =>
  interner.intern(hint);
