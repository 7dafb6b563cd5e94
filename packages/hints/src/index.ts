/**
 * hintwarden hints - hint model, builtin namespace, results and diagnostics
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type HintDiagnostic,
  HINT_SITE_PLACEHOLDER,
  createDiagnostic,
  hintError,
  replaceSitePlaceholder,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export type {
  Hint,
  HintKind,
  HintClass,
  RawHint,
  AnyHint,
  PrimitiveName,
  PrimitiveHint,
  ClassHint,
  LiteralValue,
  LiteralHint,
  UnionHint,
  TupleHint,
  TypeParameterHint,
  GenericHint,
  AliasHint,
  SubscriptedHint,
  ForwardRefKind,
  ForwardRefCell,
  ForwardRefHint,
  DeferredHint,
} from "./hint-types.js";

export * from "./hint-factories.js";
export * from "./hint-ops.js";
export * from "./builtins.js";
