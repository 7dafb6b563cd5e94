/**
 * ResolutionSite - one annotated site being sanitized
 *
 * Groups what reduction needs beyond the hint itself: the runtime context,
 * the active configuration, and the declaring scope string hints are
 * destringified against. The forward scope is created on the first string
 * hint and torn down by `finish()`.
 */

import {
  type Hint,
  type HintClass,
  type HintDiagnostic,
  type Result,
  classHint,
  flatMap,
  hintRepr,
  map,
  ok,
} from "@hintwarden/hints";
import type { HintConfig } from "./config.js";
import { evaluateHintExpression } from "./forward/evaluate-hint.js";
import { ForwardScope, type ScopeSeed } from "./forward/forward-scope.js";
import { isIdentifier } from "./forward/identifier.js";
import { ENGINE_TRUST } from "./forward/trust.js";
import type { RuntimeContext } from "./runtime-context.js";

/** Identifiers the evaluator reads as type keywords rather than names */
const TYPE_KEYWORDS: ReadonlySet<string> = new Set([
  "any",
  "unknown",
  "never",
  "void",
  "undefined",
  "null",
  "true",
  "false",
  "this",
]);

const isPlainName = (text: string): boolean =>
  isIdentifier(text) && !TYPE_KEYWORDS.has(text);

export type ResolutionSiteOptions = {
  /** Fully-qualified declaring scope, e.g. `app.services.billing` */
  readonly scopeName?: string;
  /** Names visible at the site beyond the builtins */
  readonly scope?: ScopeSeed;
  /** Enclosing classes, outermost first */
  readonly classStack?: readonly HintClass[];
  /** Declaring code unit, kept weakly for provenance */
  readonly owner?: object;
};

export class ResolutionSite {
  readonly scopeName: string;
  private forwardScope: ForwardScope | undefined;

  constructor(
    readonly runtime: RuntimeContext,
    readonly config: HintConfig,
    private readonly options: ResolutionSiteOptions = {}
  ) {
    this.scopeName = options.scopeName ?? config.defaultScopeName;
  }

  log(message: string): void {
    if (this.config.verbose) {
      console.log(`[hintwarden] ${message}`);
    }
  }

  private getForwardScope(): Result<ForwardScope, HintDiagnostic> {
    if (this.forwardScope) return ok(this.forwardScope);

    const seed: Record<string, Hint> = {};
    for (const cls of this.options.classStack ?? []) {
      seed[cls.name] = classHint(cls);
    }
    Object.assign(seed, this.options.scope);

    return map(
      ForwardScope.create(
        this.runtime.forwardRefs,
        this.scopeName,
        seed,
        this.options.owner
      ),
      (scope) => {
        this.forwardScope = scope;
        return scope;
      }
    );
  }

  /**
   * Resolve a string hint. Bare names take a direct scope lookup; anything
   * else goes through the evaluator.
   */
  destringify(expression: string): Result<Hint, HintDiagnostic> {
    const name = expression.trim();
    const result = flatMap(this.getForwardScope(), (scope) =>
      isPlainName(name)
        ? scope.lookup(name, ENGINE_TRUST)
        : evaluateHintExpression(expression, scope, this.runtime.forwardRefs)
    );

    if (result.ok) {
      this.log(
        `${this.scopeName}: destringified ${JSON.stringify(expression)} to ${hintRepr(result.value)}`
      );
    }
    return result;
  }

  /**
   * Tear down the forward scope. Returns the names string hints at this site
   * actually resolved.
   */
  finish(): ReadonlyMap<string, Hint> {
    const scope = this.forwardScope;
    if (!scope) return new Map();

    const minified = scope.minify();
    scope.clear();
    this.forwardScope = undefined;
    return minified;
  }
}
