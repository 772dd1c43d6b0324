/**
 * Manifest Variables
 * Resolves `${ NAME }` placeholders in provider manifests.
 */

import { Config } from "@backstage/config";
import { MissingVariablesError } from "./errors";
import { isJsonObject } from "./manifest";

const VARIABLE_PATTERN = /\$\{\s*([A-Z0-9_]+)\s*\}/g;

// ============================================================================
// Variable Sources
// ============================================================================

export interface VariablesSource {
  /** Returns undefined when the variable is not set. */
  get(name: string): string | undefined;
}

export class StaticVariablesSource implements VariablesSource {
  private readonly values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  withVariable(name: string, value: string): StaticVariablesSource {
    this.values.set(name, value);
    return this;
  }
}

/**
 * Environment variables take precedence over the `providerInstaller.variables`
 * section of the app config.
 */
export class ConfigVariablesSource implements VariablesSource {
  constructor(
    private readonly variables: Record<string, string>,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  static fromConfig(
    config: Config,
    env: NodeJS.ProcessEnv = process.env,
  ): ConfigVariablesSource {
    return new ConfigVariablesSource(readConfigVariables(config), env);
  }

  get(name: string): string | undefined {
    return this.env[name] ?? this.variables[name];
  }
}

/**
 * Read `providerInstaller.variables` as a whole. Variable names such as
 * `EXP_1` are not valid config keys.
 */
export function readConfigVariables(config: Config): Record<string, string> {
  const section = config.getOptional("providerInstaller.variables");
  const variables: Record<string, string> = {};
  if (!isJsonObject(section)) {
    return variables;
  }
  for (const [name, value] of Object.entries(section)) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      variables[name] = String(value);
    }
  }
  return variables;
}

// ============================================================================
// Inspection and Substitution
// ============================================================================

/**
 * List the variables referenced by a manifest, each once, in order of first
 * appearance.
 */
export function inspectVariables(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(VARIABLE_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Replace every occurrence of the given variables. Nothing is replaced unless
 * all of them resolve.
 */
export function replaceVariables(
  text: string,
  variables: string[],
  source: VariablesSource,
): string {
  const values = new Map<string, string>();
  const missing: string[] = [];

  for (const name of variables) {
    const value = source.get(name);
    if (value === undefined) {
      missing.push(name);
      continue;
    }
    values.set(name, value);
  }

  if (missing.length > 0) {
    throw new MissingVariablesError(missing);
  }

  let result = text;
  for (const [name, value] of values) {
    const pattern = new RegExp(`\\$\\{\\s*${escapeRegExp(name)}\\s*\\}`, "g");
    result = result.replace(pattern, () => value);
  }
  return result;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
