/**
 * Transient hint reduction
 *
 * Reduces one hint to the canonical form the check-code generator consumes.
 * Reduction is shallow: children of the result (union members, template
 * arguments) are reduced later, one by one, through `sanitizeChildHint`
 * with the result as their parent.
 */

import {
  type AliasHint,
  type ClassHint,
  type Hint,
  type HintDiagnostic,
  type RawHint,
  type Result,
  type SubscriptedHint,
  type TypeParameterHint,
  type UnionHint,
  error,
  flatMap,
  hintError,
  hintRepr,
  ok,
  stableHintKey,
  union,
} from "@hintwarden/hints";
import {
  HINT_SANE_IGNORABLE,
  type HintSane,
  createHintSane,
  withOverriddenName,
  withRecursableHint,
} from "../sane/hint-sane.js";
import type { ResolutionSite } from "../site.js";
import {
  type SubstitutionResult,
  buildSubstitutionTable,
} from "../substitution/substitution.js";
import { coerceRootHint } from "./coerce.js";

export type ReduceContext = {
  readonly site: ResolutionSite;
  readonly parent?: HintSane;
};

/**
 * Ancestry a nested reduction step runs under: the parent if any, else a
 * fresh model of the hint being expanded.
 */
const ancestryOf = (hint: Hint, ctx: ReduceContext): HintSane =>
  ctx.parent ?? createHintSane(hint);

const flattenUnionMembers = (members: readonly Hint[]): readonly Hint[] => {
  const seen = new Set<string>();
  const flattened: Hint[] = [];

  const visit = (member: Hint): void => {
    if (member.kind === "union") {
      member.members.forEach(visit);
      return;
    }
    const key = stableHintKey(member);
    if (seen.has(key)) return;
    seen.add(key);
    flattened.push(member);
  };

  members.forEach(visit);
  return flattened;
};

const reduceUnionHint = (
  hint: UnionHint,
  ctx: ReduceContext
): Result<HintSane, HintDiagnostic> => {
  const members = flattenUnionMembers(hint.members);

  if (members.some((member) => member.kind === "any")) {
    return ok(HINT_SANE_IGNORABLE);
  }

  const [first, ...rest] = members;
  if (!first) {
    return error(hintError("HWD1003", "type hint empty union unsupported."));
  }
  if (rest.length === 0) return reduceHint(first, ctx);

  const canonical =
    members.length === hint.members.length &&
    members.every((member, i) => member === hint.members[i])
      ? hint
      : ctx.site.runtime.interner.intern(union(members));
  return ok(createHintSane(canonical, ctx.parent));
};

const reduceTypeParameterHint = (
  hint: TypeParameterHint,
  ctx: ReduceContext
): Result<HintSane, HintDiagnostic> => {
  const ancestry = ancestryOf(hint, ctx);
  if (ancestry.recursableHints.has(hint)) {
    ctx.site.log(`type parameter ${hint.name} recurses; ignoring`);
    return ok(HINT_SANE_IGNORABLE);
  }

  const nested: ReduceContext = {
    ...ctx,
    parent: withRecursableHint(ancestry, hint),
  };

  const mapped = ancestry.typeArgToHint.get(hint);
  if (mapped) return reduceHint(mapped, nested);
  if (hint.bound) return reduceHint(hint.bound, nested);
  if (hint.constraints && hint.constraints.length > 0) {
    return reduceHint(union(hint.constraints), nested);
  }
  return ok(HINT_SANE_IGNORABLE);
};

const readAliasValue = (alias: AliasHint): Result<RawHint, HintDiagnostic> => {
  try {
    return ok(alias.value());
  } catch (cause) {
    return error(
      hintError(
        "HWD2003",
        `type alias ${alias.name} value unresolvable: ${cause instanceof Error ? cause.message : String(cause)}`
      )
    );
  }
};

const reduceAliasHint = (
  alias: AliasHint,
  args: readonly Hint[],
  subscripted: SubscriptedHint | undefined,
  ctx: ReduceContext
): Result<HintSane, HintDiagnostic> => {
  const ancestry = ancestryOf(alias, ctx);
  const guardKey: Hint = subscripted
    ? ctx.site.runtime.interner.intern(subscripted)
    : alias;
  if (ancestry.recursableHints.has(guardKey)) {
    ctx.site.log(`type alias ${alias.name} recurses; ignoring`);
    return ok(HINT_SANE_IGNORABLE);
  }

  const table: SubstitutionResult = subscripted
    ? buildSubstitutionTable(
        ctx.site.runtime.substitutions,
        subscripted,
        alias.typeParameters,
        args
      )
    : ok(undefined);

  return flatMap(table, (typeArgToHint) => {
    const carrier = withRecursableHint(
      createHintSane(alias, ancestry, typeArgToHint),
      guardKey
    );
    return flatMap(
      flatMap(readAliasValue(alias), (raw) =>
        coerceRootHint(raw, ctx.site.runtime.interner)
      ),
      (value) => reduceHint(value, { ...ctx, parent: carrier })
    );
  });
};

const reduceSubscriptedHint = (
  hint: SubscriptedHint,
  ctx: ReduceContext
): Result<HintSane, HintDiagnostic> => {
  const origin = hint.origin;

  switch (origin.kind) {
    case "generic":
      return flatMap(
        buildSubstitutionTable(
          ctx.site.runtime.substitutions,
          hint,
          origin.typeParameters,
          hint.args
        ),
        (table) => {
          if (table) {
            ctx.site.log(
              `${hintRepr(hint)} binds ${[...table]
                .map(([param, arg]) => `${param.name}=${hintRepr(arg)}`)
                .join(", ")}`
            );
          }
          return ok(createHintSane(origin, ctx.parent, table));
        }
      );

    case "alias":
      return reduceAliasHint(origin, hint.args, hint, ctx);

    case "forwardRef":
      return ok(createHintSane(hint, ctx.parent));
  }
};

const reduceClassHint = (
  hint: ClassHint,
  ctx: ReduceContext
): Result<HintSane, HintDiagnostic> => {
  const replacement = ctx.site.config.overrides.get(hint.name);
  const ancestry = ancestryOf(hint, ctx);
  if (replacement === undefined || ancestry.overriddenNames.has(hint.name)) {
    return ok(createHintSane(hint, ctx.parent));
  }

  ctx.site.log(`overriding ${hint.name} with ${JSON.stringify(replacement)}`);
  const nested: ReduceContext = {
    ...ctx,
    parent: withOverriddenName(ancestry, hint.name),
  };
  return flatMap(ctx.site.destringify(replacement), (overridden) =>
    reduceHint(overridden, nested)
  );
};

/**
 * Reduce one hint under the given parent model.
 */
export const reduceHint = (
  hint: Hint,
  ctx: ReduceContext
): Result<HintSane, HintDiagnostic> => {
  switch (hint.kind) {
    case "any":
      return ok(HINT_SANE_IGNORABLE);

    case "class":
      return reduceClassHint(hint, ctx);

    case "union":
      return reduceUnionHint(hint, ctx);

    case "typeParameter":
      return reduceTypeParameterHint(hint, ctx);

    case "subscripted":
      return reduceSubscriptedHint(hint, ctx);

    case "alias":
      return reduceAliasHint(hint, [], undefined, ctx);

    case "deferred":
      return flatMap(ctx.site.destringify(hint.expression), (resolved) =>
        reduceHint(resolved, ctx)
      );

    case "primitive":
    case "literal":
    case "tuple":
    case "generic":
    case "forwardRef":
      return ok(createHintSane(hint, ctx.parent));
  }
};
