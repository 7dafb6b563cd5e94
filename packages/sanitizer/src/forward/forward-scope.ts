/**
 * ForwardScope - name resolution for string hints of one declaring scope
 *
 * Two tiers:
 * - seeded entries: the builtin namespace, then the declaring scope's bindings
 * - fabrication: a trusted lookup of a missing name creates a subscriptable
 *   forward reference proxy and caches it as a new entry
 *
 * Every name a lookup returns is recorded, so `minify()` can hand back only
 * the names a hint expression actually used.
 */

import {
  BUILTIN_SCOPE,
  type Hint,
  type HintDiagnostic,
  type Result,
  createDiagnostic,
  error,
  ok,
} from "@hintwarden/hints";
import type { ForwardRefRegistry } from "./forward-ref-registry.js";
import { validateDottedIdentifier } from "./identifier.js";
import { isTrusted } from "./trust.js";

export type ScopeSeed = Readonly<Record<string, Hint>>;

export class ForwardScope {
  private readonly entries: Map<string, Hint>;
  private readonly resolvedNames = new Set<string>();
  private ownerRef: WeakRef<object> | undefined;

  private constructor(
    readonly scopeName: string,
    private readonly refs: ForwardRefRegistry,
    seed: ScopeSeed,
    owner: object | undefined
  ) {
    this.entries = new Map([...BUILTIN_SCOPE, ...Object.entries(seed)]);
    this.ownerRef = owner ? new WeakRef(owner) : undefined;
  }

  static create(
    refs: ForwardRefRegistry,
    scopeName: string,
    seed: ScopeSeed = {},
    owner?: object
  ): Result<ForwardScope, HintDiagnostic> {
    const valid = validateDottedIdentifier(scopeName, "Forward scope name");
    if (!valid.ok) return valid;
    return ok(new ForwardScope(scopeName, refs, seed, owner));
  }

  get owner(): object | undefined {
    return this.ownerRef?.deref();
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Resolve `name`. Misses fabricate a proxy only for trusted callers;
   * anyone else gets a recoverable HWD2002.
   */
  lookup(name: string, trust?: symbol): Result<Hint, HintDiagnostic> {
    const seeded = this.entries.get(name);
    if (seeded) {
      this.resolvedNames.add(name);
      return ok(seeded);
    }

    const valid = validateDottedIdentifier(name, "Forward reference");
    if (!valid.ok) return valid;

    if (!isTrusted(trust)) {
      return error(
        createDiagnostic(
          "HWD2002",
          "warning",
          `Forward scope ${JSON.stringify(this.scopeName)} has no name ${JSON.stringify(name)}.`,
          undefined,
          "Only the sanitizer may defer undefined names"
        )
      );
    }

    const made = this.refs.make("subscriptable", name, this.scopeName, this.owner);
    if (!made.ok) return made;

    this.entries.set(name, made.value);
    this.resolvedNames.add(name);
    return made;
  }

  /**
   * New map of exactly the names resolved so far.
   */
  minify(): ReadonlyMap<string, Hint> {
    const minified = new Map<string, Hint>();
    for (const name of this.resolvedNames) {
      const hint = this.entries.get(name);
      if (hint) minified.set(name, hint);
    }
    return minified;
  }

  clear(): void {
    this.entries.clear();
    this.resolvedNames.clear();
    this.ownerRef = undefined;
  }
}

export const createForwardScope = (
  refs: ForwardRefRegistry,
  scopeName: string,
  seed?: ScopeSeed,
  owner?: object
): Result<ForwardScope, HintDiagnostic> =>
  ForwardScope.create(refs, scopeName, seed, owner);
