/**
 * Configuration loading and validation
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { Result } from "@hintwarden/hints";
import { isDottedIdentifier } from "./forward/identifier.js";

export const CONFIG_FILE_NAME = "hintwarden.json";

/**
 * Shape of hintwarden.json
 */
export type HintwardenConfigFile = {
  readonly $schema?: string;
  readonly verbose?: boolean;
  /** Class name -> replacement hint expression, e.g. `{ "Date": "Date | string" }` */
  readonly overrides?: Readonly<Record<string, string>>;
  readonly defaultScopeName?: string;
};

/**
 * Programmatic options, taking precedence over the file
 */
export type HintConfigOptions = {
  readonly verbose?: boolean;
  readonly overrides?: Readonly<Record<string, string>>;
  readonly defaultScopeName?: string;
};

/**
 * Active configuration read by the sanitizer
 */
export type HintConfig = {
  readonly verbose: boolean;
  readonly overrides: ReadonlyMap<string, string>;
  readonly defaultScopeName: string;
};

export const DEFAULT_SCOPE_NAME = "main";

export const DEFAULT_CONFIG: HintConfig = {
  verbose: false,
  overrides: new Map(),
  defaultScopeName: DEFAULT_SCOPE_NAME,
};

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseOverrides = (
  value: unknown
): Result<Readonly<Record<string, string>>, string> => {
  if (!isRecord(value)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'overrides' must be an object`,
    };
  }

  const overrides: Record<string, string> = {};
  for (const [name, expression] of Object.entries(value)) {
    if (!isDottedIdentifier(name)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: override key '${name}' is not an identifier`,
      };
    }
    if (typeof expression !== "string" || expression.trim() === "") {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: override '${name}' must be a non-empty hint expression`,
      };
    }
    overrides[name] = expression;
  }
  return { ok: true, value: overrides };
};

/**
 * Validate parsed JSON against the config file shape
 */
export const parseConfigFile = (
  value: unknown
): Result<HintwardenConfigFile, string> => {
  if (!isRecord(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const { $schema, verbose, overrides, defaultScopeName } = value;

  if ($schema !== undefined && typeof $schema !== "string") {
    return { ok: false, error: `${CONFIG_FILE_NAME}: '$schema' must be a string` };
  }
  if (verbose !== undefined && typeof verbose !== "boolean") {
    return { ok: false, error: `${CONFIG_FILE_NAME}: 'verbose' must be a boolean` };
  }
  if (
    defaultScopeName !== undefined &&
    (typeof defaultScopeName !== "string" || !isDottedIdentifier(defaultScopeName))
  ) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'defaultScopeName' must be a dotted identifier`,
    };
  }

  if (overrides === undefined) {
    return { ok: true, value: { $schema, verbose, defaultScopeName } };
  }

  const parsedOverrides = parseOverrides(overrides);
  if (!parsedOverrides.ok) return parsedOverrides;

  return {
    ok: true,
    value: { $schema, verbose, overrides: parsedOverrides.value, defaultScopeName },
  };
};

/**
 * Load hintwarden.json
 */
export const loadConfig = (
  configPath: string
): Result<HintwardenConfigFile, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfigFile(JSON.parse(content));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/** `dir` and each of its ancestors up to the filesystem root, nearest first */
const ancestors = (dir: string): readonly string[] => {
  const parent = dirname(dir);
  return parent === dir ? [dir] : [dir, ...ancestors(parent)];
};

/**
 * Nearest hintwarden.json at or above `startDir`, or null
 */
export const findConfig = (startDir: string): string | null =>
  ancestors(resolve(startDir))
    .map((dir) => join(dir, CONFIG_FILE_NAME))
    .find((configPath) => existsSync(configPath)) ?? null;

/**
 * Resolve the active configuration: options override the file, the file
 * overrides defaults. Override maps are merged key by key.
 */
export const resolveConfig = (
  fileConfig: HintwardenConfigFile = {},
  options: HintConfigOptions = {}
): HintConfig => ({
  verbose: options.verbose ?? fileConfig.verbose ?? DEFAULT_CONFIG.verbose,
  overrides: new Map([
    ...Object.entries(fileConfig.overrides ?? {}),
    ...Object.entries(options.overrides ?? {}),
  ]),
  defaultScopeName:
    options.defaultScopeName ??
    fileConfig.defaultScopeName ??
    DEFAULT_CONFIG.defaultScopeName,
});
