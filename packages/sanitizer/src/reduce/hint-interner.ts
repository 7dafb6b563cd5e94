/**
 * HintInterner - one canonical object per structurally equal composite hint
 *
 * Two spellings of `Array<number>` built at different sites intern to the
 * first one seen, so identity-keyed caches downstream hit across sites.
 */

import { type Hint, stableHintKey } from "@hintwarden/hints";

const isInternable = (hint: Hint): boolean =>
  hint.kind === "subscripted" ||
  hint.kind === "union" ||
  hint.kind === "tuple" ||
  hint.kind === "literal";

export class HintInterner {
  private readonly hints = new Map<string, Hint>();

  get size(): number {
    return this.hints.size;
  }

  intern(hint: Hint): Hint {
    if (!isInternable(hint)) return hint;

    const key = stableHintKey(hint);
    const existing = this.hints.get(key);
    if (existing) return existing;

    this.hints.set(key, hint);
    return hint;
  }

  clear(): void {
    this.hints.clear();
  }
}
