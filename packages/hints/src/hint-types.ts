/**
 * Hint model - the nodes of a type-specification tree
 *
 * Every hint is an immutable tagged value. The only mutable state reachable
 * from a hint is the resolution cell of a forward reference proxy, which is
 * filled lazily on the first type-relationship query.
 */

/**
 * Any runtime constructor usable as the right-hand side of `instanceof`.
 */
export type HintClass = abstract new (...args: never[]) => unknown;

export type Hint =
  | AnyHint
  | PrimitiveHint
  | ClassHint
  | LiteralHint
  | UnionHint
  | TupleHint
  | TypeParameterHint
  | GenericHint
  | AliasHint
  | SubscriptedHint
  | ForwardRefHint
  | DeferredHint;

export type HintKind = Hint["kind"];

/**
 * Raw hint as handed in by a metadata provider, before coercion.
 *
 * - string: symbolic forward reference expression (e.g. `"Box<User>"`)
 * - constructor: plain class
 * - array: legacy tuple-of-types union
 */
export type RawHint = Hint | string | HintClass | readonly RawHint[];

/**
 * Ignorable hint. Everything satisfies it.
 */
export type AnyHint = {
  readonly kind: "any";
};

export type PrimitiveName = "string" | "number" | "boolean" | "bigint" | "symbol";

/**
 * Plain checkable primitive type, satisfied by `typeof value === name`.
 */
export type PrimitiveHint = {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
};

/**
 * Plain checkable type backed by a runtime constructor.
 */
export type ClassHint = {
  readonly kind: "class";
  readonly name: string;
  readonly ctor: HintClass;
};

export type LiteralValue = string | number | boolean | bigint | null | undefined;

export type LiteralHint = {
  readonly kind: "literal";
  readonly value: LiteralValue;
};

export type UnionHint = {
  readonly kind: "union";
  readonly members: readonly Hint[];
};

export type TupleHint = {
  readonly kind: "tuple";
  readonly elements: readonly Hint[];
};

/**
 * Named placeholder declared by a template or alias.
 *
 * Singular parameters bind exactly one argument; variadic parameters bind a
 * trailing run of arguments and only take part in arity accounting.
 */
export type TypeParameterHint = {
  readonly kind: "typeParameter";
  readonly name: string;
  readonly bound?: Hint;
  readonly constraints?: readonly Hint[];
  readonly variadic: boolean;
};

/**
 * Template (unsubscripted generic), e.g. `Box` declared as `Box<T, U>`.
 */
export type GenericHint = {
  readonly kind: "generic";
  readonly name: string;
  readonly typeParameters: readonly TypeParameterHint[];
  /** Runtime constructor instances of this template are checked against */
  readonly ctor?: HintClass;
};

/**
 * Type alias, e.g. `type Pair<T> = [T, T]`.
 *
 * The value is produced lazily so aliases may refer to themselves or to
 * names declared after them.
 */
export type AliasHint = {
  readonly kind: "alias";
  readonly name: string;
  readonly typeParameters: readonly TypeParameterHint[];
  readonly value: () => RawHint;
};

/**
 * Template, alias or forward reference applied to argument hints.
 */
export type SubscriptedHint = {
  readonly kind: "subscripted";
  readonly origin: GenericHint | AliasHint | ForwardRefHint;
  readonly args: readonly Hint[];
};

/**
 * Forward reference proxy kind.
 *
 * - subscriptable: may later be applied to type arguments
 * - sealed: may not (the proxy behind an already subscripted reference)
 */
export type ForwardRefKind = "subscriptable" | "sealed";

/**
 * Lazily filled resolution state of a forward reference proxy.
 */
export type ForwardRefCell = {
  target?: HintClass;
  /** Module the target was found in, for reload invalidation */
  targetModule?: string;
  /** Declaring code unit, kept only for provenance */
  owner?: WeakRef<object>;
};

/**
 * Placeholder standing in for a name that was not yet defined when the hint
 * referring to it was destringified.
 */
export type ForwardRefHint = {
  readonly kind: "forwardRef";
  /** Relative (`User`) or absolute (`app.models.User`) referenced name */
  readonly name: string;
  /** Fully-qualified name of the declaring scope (`app.services`) */
  readonly scopeName: string;
  readonly refKind: ForwardRefKind;
  readonly cell: ForwardRefCell;
};

/**
 * Symbolic (string-form) hint awaiting destringification.
 */
export type DeferredHint = {
  readonly kind: "deferred";
  readonly expression: string;
};
