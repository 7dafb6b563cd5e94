/**
 * Sanitizer entry points
 *
 * Three ways into one reduction core:
 * - a parameter or return annotation of a callable
 * - a standalone hint (variable annotation, assertion)
 * - a child of an already reduced hint
 *
 * Each returns either a complete sane hint or a single diagnostic whose
 * message starts with the caller-supplied site label.
 */

import {
  HINT_SITE_PLACEHOLDER,
  type Hint,
  type HintDiagnostic,
  type RawHint,
  type Result,
  flatMap,
  map,
  mapError,
  ok,
  replaceSitePlaceholder,
} from "@hintwarden/hints";
import { coerceHintAny, coerceRootHint } from "./reduce/coerce.js";
import { reduceHint } from "./reduce/reduce-hint.js";
import {
  type CallableKind,
  reduceRestParameterHint,
  reduceReturnHint,
} from "./reduce/return-hint.js";
import { HINT_SANE_IGNORABLE, type HintSane } from "./sane/hint-sane.js";
import type { ResolutionSite } from "./site.js";

export const RETURN_SLOT = "return";

export type ParameterKind = "positional" | "optional" | "rest";

/**
 * Callable whose annotations are being sanitized. Coerced root hints are
 * written back into `annotations`, so later passes see the canonical form.
 */
export type CallableMeta = {
  readonly name: string;
  readonly kind: CallableKind;
  readonly annotations: Map<string, RawHint>;
};

const resolveDeferred = (
  site: ResolutionSite,
  hint: Hint
): Result<Hint, HintDiagnostic> =>
  hint.kind === "deferred" ? site.destringify(hint.expression) : ok(hint);

/**
 * Sanitize the annotation of `slotName` (a parameter name, or `RETURN_SLOT`).
 * Unannotated slots are ignorable.
 */
export const sanitizeRootHintForCallable = (
  site: ResolutionSite,
  callable: CallableMeta,
  slotName: string,
  parameterKind: ParameterKind = "positional",
  exceptionPrefix = HINT_SITE_PLACEHOLDER
): Result<HintSane, HintDiagnostic> => {
  const raw = callable.annotations.get(slotName);
  if (raw === undefined) return ok(HINT_SANE_IGNORABLE);

  const coerced = coerceRootHint(raw, site.runtime.interner);
  if (coerced.ok) callable.annotations.set(slotName, coerced.value);

  const shaped = flatMap(coerced, (hint): Result<Hint, HintDiagnostic> => {
    if (slotName === RETURN_SLOT) {
      return flatMap(resolveDeferred(site, hint), (resolved) =>
        reduceReturnHint(resolved, callable.kind, callable.name)
      );
    }
    if (parameterKind === "rest") {
      return map(resolveDeferred(site, hint), reduceRestParameterHint);
    }
    return ok(hint);
  });

  return mapError(
    flatMap(shaped, (hint) => reduceHint(hint, { site })),
    (diagnostic) => replaceSitePlaceholder(diagnostic, exceptionPrefix)
  );
};

/**
 * Sanitize a hint annotating no callable.
 */
export const sanitizeRootHintForStatement = (
  site: ResolutionSite,
  hint: RawHint,
  exceptionPrefix = HINT_SITE_PLACEHOLDER
): Result<HintSane, HintDiagnostic> =>
  mapError(
    flatMap(coerceRootHint(hint, site.runtime.interner), (coerced) =>
      reduceHint(coerced, { site })
    ),
    (diagnostic) => replaceSitePlaceholder(diagnostic, exceptionPrefix)
  );

/**
 * Sanitize a child hint of `parent`, cascading its substitution table,
 * recursion guard and applied overrides.
 */
export const sanitizeChildHint = (
  site: ResolutionSite,
  parent: HintSane,
  hint: Hint,
  exceptionPrefix = HINT_SITE_PLACEHOLDER
): Result<HintSane, HintDiagnostic> =>
  mapError(
    reduceHint(coerceHintAny(hint, site.runtime.interner), { site, parent }),
    (diagnostic) => replaceSitePlaceholder(diagnostic, exceptionPrefix)
  );
