/**
 * Slot-shape reductions applied to root hints before transient reduction
 *
 * - async callables return `Promise<T>`; the checked value is `T`
 * - generator callables return a generator-protocol template; the checked
 *   value is the generator object, checked against the bare template
 * - rest parameters are declared `Array<T>`; each element is checked
 *   against `T`
 */

import {
  ANY_HINT,
  ARRAY_TEMPLATE,
  ASYNC_GENERATOR_RETURN_TEMPLATES,
  type GenericHint,
  type Hint,
  type HintDiagnostic,
  PROMISE_TEMPLATE,
  READONLY_ARRAY_TEMPLATE,
  type Result,
  SYNC_GENERATOR_RETURN_TEMPLATES,
  error,
  hintError,
  hintRepr,
  ok,
} from "@hintwarden/hints";

export type CallableKind = "function" | "async" | "generator" | "asyncGenerator";

/**
 * Template a hint instantiates: `Map<K, V>` and `Map` both give `Map`.
 */
const templateOf = (hint: Hint): GenericHint | undefined => {
  if (hint.kind === "generic") return hint;
  if (hint.kind === "subscripted" && hint.origin.kind === "generic") {
    return hint.origin;
  }
  return undefined;
};

const reducePromiseHint = (
  hint: Hint,
  callableName: string
): Result<Hint, HintDiagnostic> => {
  if (hint.kind === "any") return ok(hint);
  if (templateOf(hint) === PROMISE_TEMPLATE) {
    return ok(hint.kind === "subscripted" ? (hint.args[0] ?? ANY_HINT) : ANY_HINT);
  }

  return error(
    hintError(
      "HWD1006",
      `async callable ${callableName}() return type hint ${hintRepr(hint)} not Promise<...>.`
    )
  );
};

const reduceGeneratorHint = (
  hint: Hint,
  callableName: string,
  templates: readonly GenericHint[]
): Result<Hint, HintDiagnostic> => {
  if (hint.kind === "any") return ok(hint);

  const template = templateOf(hint);
  if (template && templates.includes(template)) return ok(template);

  return error(
    hintError(
      "HWD1006",
      `generator callable ${callableName}() return type hint ${hintRepr(hint)} not one of ${templates.map(hintRepr).join(", ")}.`
    )
  );
};

export const reduceReturnHint = (
  hint: Hint,
  kind: CallableKind,
  callableName: string
): Result<Hint, HintDiagnostic> => {
  switch (kind) {
    case "function":
      return ok(hint);
    case "async":
      return reducePromiseHint(hint, callableName);
    case "generator":
      return reduceGeneratorHint(
        hint,
        callableName,
        SYNC_GENERATOR_RETURN_TEMPLATES
      );
    case "asyncGenerator":
      return reduceGeneratorHint(
        hint,
        callableName,
        ASYNC_GENERATOR_RETURN_TEMPLATES
      );
  }
};

/**
 * `...items: Array<T>` checks each item against `T`. Tuple rest hints are
 * left alone.
 */
export const reduceRestParameterHint = (hint: Hint): Hint => {
  const template = templateOf(hint);
  if (template !== ARRAY_TEMPLATE && template !== READONLY_ARRAY_TEMPLATE) {
    return hint;
  }
  return hint.kind === "subscripted" ? (hint.args[0] ?? ANY_HINT) : ANY_HINT;
};
