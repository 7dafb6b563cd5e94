/**
 * ModuleRegistry - the loaded-module table forward references resolve against
 *
 * Modules are registered by dotted name with their export record. Qualified
 * names are resolved by the longest registered module prefix, then by a walk
 * through own members of the remaining segments (nested namespaces, static
 * class members).
 */

export type ModuleExports = Readonly<Record<string, unknown>>;

export type QualifiedLookup = {
  readonly moduleName: string;
  readonly value: unknown;
};

const memberOf = (container: unknown, key: string): unknown => {
  if (
    (typeof container === "object" && container !== null) ||
    typeof container === "function"
  ) {
    return Object.hasOwn(container, key)
      ? Reflect.get(container, key)
      : undefined;
  }
  return undefined;
};

export class ModuleRegistry {
  private readonly modules = new Map<string, ModuleExports>();

  register(moduleName: string, exports: ModuleExports): void {
    this.modules.set(moduleName, exports);
  }

  unregister(moduleName: string): boolean {
    return this.modules.delete(moduleName);
  }

  has(moduleName: string): boolean {
    return this.modules.has(moduleName);
  }

  get(moduleName: string): ModuleExports | undefined {
    return this.modules.get(moduleName);
  }

  /**
   * Resolve `pkg.mod.Outer.Inner` to the value it names, or undefined.
   * A bare module name resolves to nothing: modules are not hints.
   */
  lookupQualified(qualifiedName: string): QualifiedLookup | undefined {
    const segments = qualifiedName.split(".");

    for (let split = segments.length - 1; split > 0; split--) {
      const moduleName = segments.slice(0, split).join(".");
      const exports = this.modules.get(moduleName);
      if (!exports) continue;

      let value: unknown = exports;
      for (const segment of segments.slice(split)) {
        value = memberOf(value, segment);
        if (value === undefined) break;
      }
      if (value !== undefined) return { moduleName, value };
    }

    return undefined;
  }
}
