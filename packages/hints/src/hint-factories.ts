/**
 * Hint factories
 *
 * Class hints are memoized per constructor: downstream caches key on hint
 * identity, so the same constructor must always yield the same hint object.
 */

import type {
  AliasHint,
  AnyHint,
  ClassHint,
  DeferredHint,
  ForwardRefHint,
  GenericHint,
  Hint,
  HintClass,
  LiteralHint,
  LiteralValue,
  PrimitiveHint,
  PrimitiveName,
  RawHint,
  SubscriptedHint,
  TupleHint,
  TypeParameterHint,
  UnionHint,
} from "./hint-types.js";

export const ANY_HINT: AnyHint = { kind: "any" };

export const PRIMITIVE_HINTS: Readonly<Record<PrimitiveName, PrimitiveHint>> =
  {
    string: { kind: "primitive", name: "string" },
    number: { kind: "primitive", name: "number" },
    boolean: { kind: "primitive", name: "boolean" },
    bigint: { kind: "primitive", name: "bigint" },
    symbol: { kind: "primitive", name: "symbol" },
  };

export const primitive = (name: PrimitiveName): PrimitiveHint =>
  PRIMITIVE_HINTS[name];

const classHints = new WeakMap<HintClass, ClassHint>();

export const classHint = (ctor: HintClass, name?: string): ClassHint => {
  const existing = classHints.get(ctor);
  if (existing) return existing;

  const hint: ClassHint = {
    kind: "class",
    name: name ?? ctor.name,
    ctor,
  };
  classHints.set(ctor, hint);
  return hint;
};

export const literal = (value: LiteralValue): LiteralHint => ({
  kind: "literal",
  value,
});

export const union = (members: readonly Hint[]): UnionHint => ({
  kind: "union",
  members: [...members],
});

export const tuple = (elements: readonly Hint[]): TupleHint => ({
  kind: "tuple",
  elements: [...elements],
});

export type TypeParameterOptions = {
  readonly bound?: Hint;
  readonly constraints?: readonly Hint[];
  readonly variadic?: boolean;
};

export const typeParameter = (
  name: string,
  options: TypeParameterOptions = {}
): TypeParameterHint => ({
  kind: "typeParameter",
  name,
  bound: options.bound,
  constraints: options.constraints ? [...options.constraints] : undefined,
  variadic: options.variadic ?? false,
});

export const generic = (
  name: string,
  typeParameters: readonly TypeParameterHint[],
  ctor?: HintClass
): GenericHint => ({
  kind: "generic",
  name,
  typeParameters: [...typeParameters],
  ctor,
});

export const alias = (
  name: string,
  typeParameters: readonly TypeParameterHint[],
  value: () => RawHint
): AliasHint => ({
  kind: "alias",
  name,
  typeParameters: [...typeParameters],
  value,
});

/**
 * Apply an origin to argument hints. Arity is not validated here; that is
 * the substitution engine's job at reduction time.
 */
export const subscript = (
  origin: GenericHint | AliasHint | ForwardRefHint,
  args: readonly Hint[]
): SubscriptedHint => ({
  kind: "subscripted",
  origin,
  args: [...args],
});

export const deferred = (expression: string): DeferredHint => ({
  kind: "deferred",
  expression,
});
