/**
 * hintwarden sanitizer - hint reduction and forward reference resolution
 */

export {
  RETURN_SLOT,
  type ParameterKind,
  type CallableMeta,
  sanitizeRootHintForCallable,
  sanitizeRootHintForStatement,
  sanitizeChildHint,
} from "./sanitize.js";

export { ResolutionSite, type ResolutionSiteOptions } from "./site.js";

export {
  type RuntimeContext,
  createRuntimeContext,
  reloadModule,
  unloadModule,
} from "./runtime-context.js";

export {
  type HintSane,
  HINT_SANE_IGNORABLE,
  createHintSane,
  isHintSaneIgnorable,
  mergeSubstitutionTables,
} from "./sane/hint-sane.js";

export {
  type SubstitutionTable,
  type SubstitutionResult,
  type SubstitutionCache,
  EMPTY_SUBSTITUTION_TABLE,
  buildSubstitutionTable,
  createSubstitutionCache,
} from "./substitution/substitution.js";

export { type CallableKind } from "./reduce/return-hint.js";
export { HintInterner } from "./reduce/hint-interner.js";
export { coerceRawHint } from "./reduce/coerce.js";

export { ForwardRefRegistry } from "./forward/forward-ref-registry.js";
export {
  ModuleRegistry,
  type ModuleExports,
  type QualifiedLookup,
} from "./forward/module-registry.js";
export {
  ForwardScope,
  type ScopeSeed,
  createForwardScope,
} from "./forward/forward-scope.js";
export { evaluateHintExpression } from "./forward/evaluate-hint.js";
export { isIdentifier, isDottedIdentifier } from "./forward/identifier.js";

export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  DEFAULT_SCOPE_NAME,
  type HintConfig,
  type HintConfigOptions,
  type HintwardenConfigFile,
  loadConfig,
  findConfig,
  parseConfigFile,
  resolveConfig,
} from "./config.js";
