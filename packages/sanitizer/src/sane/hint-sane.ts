/**
 * Sane hint - a reduced hint plus the context its children are reduced in
 *
 * Models are built per reduction step and never cached across sites. A child
 * model inherits its parent's recursion guard and applied overrides, and its
 * substitution table is the parent's overridden by its own (child wins).
 */

import { ANY_HINT, type Hint } from "@hintwarden/hints";
import {
  EMPTY_SUBSTITUTION_TABLE,
  type SubstitutionTable,
} from "../substitution/substitution.js";

export type HintSane = {
  readonly hint: Hint;
  readonly typeArgToHint: SubstitutionTable;
  /** Aliases and type parameters already being expanded on this path */
  readonly recursableHints: ReadonlySet<Hint>;
  /** Configuration overrides already applied on this path */
  readonly overriddenNames: ReadonlySet<string>;
};

const EMPTY_HINTS: ReadonlySet<Hint> = new Set();
const EMPTY_NAMES: ReadonlySet<string> = new Set();

export const HINT_SANE_IGNORABLE: HintSane = {
  hint: ANY_HINT,
  typeArgToHint: EMPTY_SUBSTITUTION_TABLE,
  recursableHints: EMPTY_HINTS,
  overriddenNames: EMPTY_NAMES,
};

export const isHintSaneIgnorable = (sane: HintSane): boolean =>
  sane.hint.kind === "any";

/**
 * Left-biased union: entries of `child` replace those of `parent`.
 */
export const mergeSubstitutionTables = (
  parent: SubstitutionTable,
  child: SubstitutionTable | undefined
): SubstitutionTable => {
  if (!child || child.size === 0) return parent;
  if (parent.size === 0) return child;
  return new Map([...parent, ...child]);
};

/**
 * Parameters a child table rebinds are no longer being expanded: the nested
 * instantiation `Array<Array<number>>` binds the same `T` afresh.
 */
const withoutRebound = (
  recursableHints: ReadonlySet<Hint>,
  typeArgToHint: SubstitutionTable | undefined
): ReadonlySet<Hint> => {
  if (!typeArgToHint || typeArgToHint.size === 0) return recursableHints;
  if (![...typeArgToHint.keys()].some((param) => recursableHints.has(param))) {
    return recursableHints;
  }
  return new Set(
    [...recursableHints].filter(
      (hint) => hint.kind !== "typeParameter" || !typeArgToHint.has(hint)
    )
  );
};

export const createHintSane = (
  hint: Hint,
  parent?: HintSane,
  typeArgToHint?: SubstitutionTable
): HintSane => ({
  hint,
  typeArgToHint: mergeSubstitutionTables(
    parent?.typeArgToHint ?? EMPTY_SUBSTITUTION_TABLE,
    typeArgToHint
  ),
  recursableHints: withoutRebound(
    parent?.recursableHints ?? EMPTY_HINTS,
    typeArgToHint
  ),
  overriddenNames: parent?.overriddenNames ?? EMPTY_NAMES,
});

export const withRecursableHint = (sane: HintSane, hint: Hint): HintSane => ({
  ...sane,
  recursableHints: new Set([...sane.recursableHints, hint]),
});

export const withOverriddenName = (sane: HintSane, name: string): HintSane => ({
  ...sane,
  overriddenNames: new Set([...sane.overriddenNames, name]),
});
