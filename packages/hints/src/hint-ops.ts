import type {
  ClassHint,
  Hint,
  HintClass,
  HintKind,
  LiteralValue,
  PrimitiveHint,
  PrimitiveName,
} from "./hint-types.js";

/**
 * Plain checkable type: the only hints that take part in bound checks.
 */
export type PlainHint = PrimitiveHint | ClassHint;

export const isPlainHint = (hint: Hint): hint is PlainHint =>
  hint.kind === "primitive" || hint.kind === "class";

const HINT_KINDS: ReadonlySet<string> = new Set<HintKind>([
  "any",
  "primitive",
  "class",
  "literal",
  "union",
  "tuple",
  "typeParameter",
  "generic",
  "alias",
  "subscripted",
  "forwardRef",
  "deferred",
]);

export const isHint = (value: unknown): value is Hint =>
  typeof value === "object" &&
  value !== null &&
  "kind" in value &&
  typeof value.kind === "string" &&
  HINT_KINDS.has(value.kind);

/**
 * Constructor guard: a function carrying an object prototype.
 * Arrow functions and bound functions have none and cannot back `instanceof`.
 */
export const isHintClass = (value: unknown): value is HintClass =>
  typeof value === "function" &&
  typeof value.prototype === "object" &&
  value.prototype !== null;

// ═══════════════════════════════════════════════════════════════════════════
// IDENTITY KEYS
// ═══════════════════════════════════════════════════════════════════════════

const identityIds = new WeakMap<object, number>();
let nextIdentityId = 1;

/**
 * Process-unique id of an object, stable for its lifetime.
 */
export const identityId = (value: object): number => {
  const existing = identityIds.get(value);
  if (existing !== undefined) return existing;

  const id = nextIdentityId++;
  identityIds.set(value, id);
  return id;
};

const literalKey = (value: LiteralValue): string =>
  value === null ? "null" : `${typeof value}:${String(value)}`;

/**
 * Structural key of a hint.
 *
 * Nominal leaves (constructors, type parameters, templates, aliases, proxies)
 * are keyed by identity, so two distinct classes sharing a name never collide.
 * Union members are order-insensitive.
 */
export const stableHintKey = (hint: Hint): string => {
  switch (hint.kind) {
    case "any":
      return "any";

    case "primitive":
      return `prim:${hint.name}`;

    case "class":
      return `class:${identityId(hint.ctor)}`;

    case "literal":
      return `lit:${literalKey(hint.value)}`;

    case "union":
      return `union:${hint.members
        .map(stableHintKey)
        .sort((a, b) => a.localeCompare(b))
        .join("|")}`;

    case "tuple":
      return `tuple:${hint.elements.map(stableHintKey).join(",")}`;

    case "typeParameter":
    case "generic":
    case "alias":
    case "forwardRef":
      return `${hint.kind}:${identityId(hint)}`;

    case "subscripted":
      return `sub:${stableHintKey(hint.origin)}<${hint.args
        .map(stableHintKey)
        .join(",")}>`;

    case "deferred":
      return `deferred:${JSON.stringify(hint.expression)}`;
  }
};

export const hintsEqual = (a: Hint, b: Hint): boolean =>
  a === b || stableHintKey(a) === stableHintKey(b);

/**
 * True when both tuples hold the same hint objects in the same order.
 */
export const hintTuplesIdentical = (
  a: readonly Hint[],
  b: readonly Hint[]
): boolean => a.length === b.length && a.every((hint, i) => hint === b[i]);

// ═══════════════════════════════════════════════════════════════════════════
// LABELS
// ═══════════════════════════════════════════════════════════════════════════

const literalRepr = (value: LiteralValue): string => {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
};

/**
 * Human-readable rendering of a hint, in TypeScript type syntax.
 */
export const hintRepr = (hint: Hint): string => {
  switch (hint.kind) {
    case "any":
      return "any";
    case "primitive":
    case "class":
    case "typeParameter":
    case "generic":
    case "alias":
      return hint.name;
    case "literal":
      return literalRepr(hint.value);
    case "union":
      return hint.members.map(hintRepr).join(" | ");
    case "tuple":
      return `[${hint.elements.map(hintRepr).join(", ")}]`;
    case "subscripted":
      return `${hintRepr(hint.origin)}<${hint.args.map(hintRepr).join(", ")}>`;
    case "forwardRef":
      return hint.name;
    case "deferred":
      return JSON.stringify(hint.expression);
  }
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPE RELATIONSHIPS
// ═══════════════════════════════════════════════════════════════════════════

const PRIMITIVE_WRAPPERS: Readonly<Record<PrimitiveName, unknown>> = {
  string: String,
  number: Number,
  boolean: Boolean,
  bigint: BigInt,
  symbol: Symbol,
};

const isPrimitiveName = (name: string): name is PrimitiveName =>
  name in PRIMITIVE_WRAPPERS;

export const isSubclassOf = (child: HintClass, base: HintClass): boolean =>
  child === base || child.prototype instanceof base;

/**
 * Subtype relation between plain hints.
 *
 * A primitive is a subtype of itself, of its wrapper class and of Object.
 */
export const isPlainSubtypeOf = (child: PlainHint, base: PlainHint): boolean => {
  if (child.kind === "primitive") {
    if (base.kind === "primitive") return child.name === base.name;
    return PRIMITIVE_WRAPPERS[child.name] === base.ctor || base.ctor === Object;
  }

  if (base.kind === "primitive") return false;
  return isSubclassOf(child.ctor, base.ctor);
};

/**
 * `isinstance`-style check of a value against a constructor.
 * Primitive values are matched against their wrapper constructors.
 */
export const isInstanceOfClass = (value: unknown, ctor: HintClass): boolean => {
  const type = typeof value;
  if (isPrimitiveName(type)) {
    return PRIMITIVE_WRAPPERS[type] === ctor || ctor === Object;
  }
  return value instanceof ctor;
};

export const isInstanceOfPlain = (value: unknown, hint: PlainHint): boolean =>
  hint.kind === "primitive"
    ? typeof value === hint.name
    : isInstanceOfClass(value, hint.ctor);
