/**
 * ForwardRefRegistry - factory and cache of forward reference proxies
 *
 * A proxy stands in for a name that was not yet defined when a string hint
 * referring to it was destringified. Proxies are memoized by
 * (scope name, referenced name, kind), so repeated fabrication yields the same
 * hint object and downstream identity-keyed caches keep working.
 *
 * Resolution is lazy: the first type-relationship query looks the name up in
 * the module registry and caches the constructor in the proxy's cell.
 */

import {
  type ForwardRefHint,
  type ForwardRefKind,
  type Hint,
  type HintClass,
  type HintDiagnostic,
  type Result,
  type SubscriptedHint,
  error,
  hintError,
  isHintClass,
  isInstanceOfClass,
  map,
  ok,
  subscript,
} from "@hintwarden/hints";
import { validateDottedIdentifier } from "./identifier.js";
import type { ModuleRegistry } from "./module-registry.js";

const refKey = (scopeName: string, name: string, refKind: ForwardRefKind) =>
  `${scopeName}\u0000${name}\u0000${refKind}`;

/**
 * Enclosing scopes of `a.b.C`, innermost first: `a.b.C`, `a.b`, `a`.
 */
const enclosingScopes = (scopeName: string): readonly string[] => {
  const segments = scopeName.split(".");
  return segments.map((_, i) => segments.slice(0, segments.length - i).join("."));
};

export class ForwardRefRegistry {
  private readonly refs = new Map<string, ForwardRefHint>();

  constructor(private readonly modules: ModuleRegistry) {}

  get size(): number {
    return this.refs.size;
  }

  /**
   * Create (or return the memoized) proxy for `name` referenced from
   * `scopeName`. Both names must be dotted identifiers.
   */
  make(
    refKind: ForwardRefKind,
    name: string,
    scopeName: string,
    owner?: object
  ): Result<ForwardRefHint, HintDiagnostic> {
    const key = refKey(scopeName, name, refKind);
    const existing = this.refs.get(key);
    if (existing) return ok(existing);

    const validName = validateDottedIdentifier(name, "Forward reference");
    if (!validName.ok) return validName;
    const validScope = validateDottedIdentifier(
      scopeName,
      `Forward reference ${JSON.stringify(name)} scope name`
    );
    if (!validScope.ok) return validScope;

    const ref: ForwardRefHint = {
      kind: "forwardRef",
      name,
      scopeName,
      refKind,
      cell: { owner: owner ? new WeakRef(owner) : undefined },
    };
    this.refs.set(key, ref);
    return ok(ref);
  }

  /**
   * `User<Address>` where `User` is a proxy: the arguments are applied to the
   * sealed proxy of the same name, which cannot be subscripted again.
   */
  subscript(
    ref: ForwardRefHint,
    args: readonly Hint[]
  ): Result<SubscriptedHint, HintDiagnostic> {
    if (ref.refKind === "sealed") {
      return error(
        hintError(
          "HWD1005",
          `forward reference ${JSON.stringify(ref.name)} already subscripted.`
        )
      );
    }

    return map(
      this.make("sealed", ref.name, ref.scopeName, ref.cell.owner?.deref()),
      (sealed) => subscript(sealed, args)
    );
  }

  /**
   * `models.User` where `models` is a proxy.
   */
  member(
    ref: ForwardRefHint,
    memberName: string
  ): Result<ForwardRefHint, HintDiagnostic> {
    return this.make(
      ref.refKind,
      `${ref.name}.${memberName}`,
      ref.scopeName,
      ref.cell.owner?.deref()
    );
  }

  /**
   * Resolve the proxy to the constructor it names, caching it in the cell.
   *
   * The name is tried as absolute first, then relative to each enclosing
   * scope of the declaring scope, innermost first.
   */
  resolve(ref: ForwardRefHint): Result<HintClass, HintDiagnostic> {
    const cached = ref.cell.target;
    if (cached) return ok(cached);

    const candidates = [
      ...(ref.name.includes(".") ? [ref.name] : []),
      ...enclosingScopes(ref.scopeName).map((scope) => `${scope}.${ref.name}`),
    ];

    for (const candidate of candidates) {
      const found = this.modules.lookupQualified(candidate);
      if (!found) continue;

      if (!isHintClass(found.value)) {
        return error(
          hintError(
            "HWD2004",
            `forward reference ${JSON.stringify(ref.name)} referent ${JSON.stringify(candidate)} not a class.`,
            [found.value]
          )
        );
      }

      ref.cell.target = found.value;
      ref.cell.targetModule = found.moduleName;
      return ok(found.value);
    }

    return error(
      hintError(
        "HWD2003",
        `forward reference ${JSON.stringify(ref.name)} unresolvable from scope ${JSON.stringify(ref.scopeName)}.`
      )
    );
  }

  isSatisfiedBy(
    ref: ForwardRefHint,
    value: unknown
  ): Result<boolean, HintDiagnostic> {
    return map(this.resolve(ref), (target) => isInstanceOfClass(value, target));
  }

  entries(): readonly ForwardRefHint[] {
    return [...this.refs.values()];
  }

  /**
   * Drop cached resolutions, all of them or only those resolved into
   * `moduleName`. Returns how many were dropped.
   */
  invalidate(moduleName?: string): number {
    let dropped = 0;
    for (const ref of this.refs.values()) {
      if (!ref.cell.target) continue;
      if (moduleName !== undefined && ref.cell.targetModule !== moduleName) {
        continue;
      }
      ref.cell.target = undefined;
      ref.cell.targetModule = undefined;
      dropped++;
    }
    return dropped;
  }

  clear(): void {
    this.refs.clear();
  }
}
