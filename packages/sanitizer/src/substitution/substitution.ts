/**
 * Substitution engine
 *
 * Maps the type parameters a template was declared with to the argument
 * hints it was subscripted by, validating arity and parameter bounds.
 *
 *   Box<T, U> subscripted by <number>  ->  { T: number }
 *
 * Results, failures included, are memoized per runtime context by the
 * identity of the subscripted hint and of both tuples.
 */

import {
  type Hint,
  type HintDiagnostic,
  type Result,
  type TypeParameterHint,
  error,
  hintError,
  hintRepr,
  hintTuplesIdentical,
  identityId,
  isPlainHint,
  isPlainSubtypeOf,
  ok,
} from "@hintwarden/hints";

/**
 * Immutable type parameter -> argument mapping. Never maps a parameter to
 * itself.
 */
export type SubstitutionTable = ReadonlyMap<TypeParameterHint, Hint>;

export const EMPTY_SUBSTITUTION_TABLE: SubstitutionTable = new Map();

/** `undefined` means "no table": nothing to substitute */
export type SubstitutionResult = Result<
  SubstitutionTable | undefined,
  HintDiagnostic
>;

export type SubstitutionCache = Map<string, SubstitutionResult>;

export const createSubstitutionCache = (): SubstitutionCache => new Map();

const cacheKey = (
  hint: Hint,
  typeParameters: readonly TypeParameterHint[],
  args: readonly Hint[]
): string =>
  [
    identityId(hint),
    typeParameters.map(identityId).join(","),
    args.map(identityId).join(","),
  ].join("|");

/**
 * Bound check of one singular parameter. Only plain arguments against plain
 * bounds are decidable here; everything else passes. Constraints are never
 * checked.
 */
const checkBound = (
  hint: Hint,
  param: TypeParameterHint,
  arg: Hint
): HintDiagnostic | undefined => {
  const bound = param.bound;
  if (
    !bound ||
    !isPlainHint(bound) ||
    !isPlainHint(arg) ||
    isPlainSubtypeOf(arg, bound)
  ) {
    return undefined;
  }

  return hintError(
    "HWD1002",
    `type hint ${hintRepr(hint)} type parameter ${param.name} subscripted by ${hintRepr(arg)} violating bound ${hintRepr(bound)}.`,
    [arg]
  );
};

const computeSubstitutionTable = (
  hint: Hint,
  typeParameters: readonly TypeParameterHint[],
  args: readonly Hint[]
): SubstitutionResult => {
  if (
    typeParameters.length === 0 ||
    hintTuplesIdentical(args, typeParameters)
  ) {
    return ok(undefined);
  }

  if (args.length === 0) {
    return error(
      hintError(
        "HWD1001",
        `type hint ${hintRepr(hint)} subscripted by no type arguments.`
      )
    );
  }

  if (args.length > typeParameters.length) {
    return error(
      hintError(
        "HWD1001",
        `type hint ${hintRepr(hint)} subscripted by ${args.length} type arguments but declares only ${typeParameters.length} type parameters.`
      )
    );
  }

  const table = new Map<TypeParameterHint, Hint>();
  args.forEach((arg, i) => {
    const param = typeParameters[i];
    if (param && arg !== param) table.set(param, arg);
  });

  for (const [param, arg] of table) {
    if (param.variadic) continue;
    const violation = checkBound(hint, param, arg);
    if (violation) return error(violation);
  }

  return ok(table);
};

/**
 * Build (or fetch the memoized) substitution table of `hint`, a template or
 * alias declared with `typeParameters` and subscripted by `args`.
 *
 * Parameters past the last argument stay unbound: partial instantiation is
 * not an error.
 */
export const buildSubstitutionTable = (
  cache: SubstitutionCache,
  hint: Hint,
  typeParameters: readonly TypeParameterHint[],
  args: readonly Hint[]
): SubstitutionResult => {
  const key = cacheKey(hint, typeParameters, args);
  const cached = cache.get(key);
  if (cached) return cached;

  const result = computeSubstitutionTable(hint, typeParameters, args);
  cache.set(key, result);
  return result;
};
