/**
 * Runtime context - the per-process state the sanitizer runs against
 *
 * Holds every cache explicitly instead of in module globals, so tests and
 * hosts can create isolated engines.
 */

import {
  ForwardRefRegistry,
} from "./forward/forward-ref-registry.js";
import {
  type ModuleExports,
  ModuleRegistry,
} from "./forward/module-registry.js";
import { HintInterner } from "./reduce/hint-interner.js";
import {
  type SubstitutionCache,
  createSubstitutionCache,
} from "./substitution/substitution.js";

export type RuntimeContext = {
  readonly modules: ModuleRegistry;
  readonly forwardRefs: ForwardRefRegistry;
  readonly substitutions: SubstitutionCache;
  readonly interner: HintInterner;
};

export const createRuntimeContext = (): RuntimeContext => {
  const modules = new ModuleRegistry();
  return {
    modules,
    forwardRefs: new ForwardRefRegistry(modules),
    substitutions: createSubstitutionCache(),
    interner: new HintInterner(),
  };
};

/**
 * Re-register a reloaded module and drop proxy resolutions that pointed
 * into its previous exports. Returns how many were dropped.
 */
export const reloadModule = (
  runtime: RuntimeContext,
  moduleName: string,
  exports: ModuleExports
): number => {
  runtime.modules.register(moduleName, exports);
  return runtime.forwardRefs.invalidate(moduleName);
};

/**
 * Forget an unloaded module. Proxies resolved into it resolve again on next
 * use, against whatever modules remain.
 */
export const unloadModule = (
  runtime: RuntimeContext,
  moduleName: string
): number => {
  if (!runtime.modules.unregister(moduleName)) return 0;
  return runtime.forwardRefs.invalidate(moduleName);
};
