import { errorMessage } from "../errors";
import type { FeatureFlags, FlagDefinition, FlagValue } from "../types";

export type FlagIssue = {
  flag: string;
  message: string;
};

export type ParsedFlags = {
  flags: FeatureFlags;
  issues: FlagIssue[];
};

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);
const FLAG_NAME = /^[A-Z][A-Z0-9_]*$/;

export function coerceFlag(definition: FlagDefinition, raw: string): FlagValue {
  const value = raw.trim();
  if (definition.type === "boolean") {
    const lower = value.toLowerCase();
    if (TRUE_WORDS.has(lower)) return true;
    if (FALSE_WORDS.has(lower)) return false;
    throw new Error(`expected a boolean, got "${raw}"`);
  }
  if (definition.type === "integer") {
    if (!/^-?\d+$/.test(value)) {
      throw new Error(`expected an integer, got "${raw}"`);
    }
    return Number.parseInt(value, 10);
  }
  if (definition.type === "real") {
    if (!/^-?\d+(\.\d+)?$/.test(value)) {
      throw new Error(`expected a number, got "${raw}"`);
    }
    return Number(value);
  }
  return value;
}

/**
 * Builds the frozen flag set for one run. Declared flags are coerced to their
 * type (falling back to their default when unset); any other upper-case
 * variable passes through as a string. A value that fails coercion is
 * reported and the flag treated as absent.
 */
export function parseFeatureFlags(
  env: Record<string, string | undefined>,
  definitions: FlagDefinition[]
): ParsedFlags {
  const flags: Record<string, FlagValue> = {};
  const issues: FlagIssue[] = [];
  const declared = new Set(definitions.map((definition) => definition.name));

  for (const [name, raw] of Object.entries(env)) {
    if (declared.has(name) || !FLAG_NAME.test(name) || raw === undefined || raw.trim() === "") {
      continue;
    }
    flags[name] = raw.trim();
  }

  for (const definition of definitions) {
    const raw = env[definition.name];
    if (raw === undefined || raw.trim() === "") {
      if (definition.default !== undefined) {
        flags[definition.name] = definition.default;
      }
      continue;
    }
    try {
      flags[definition.name] = coerceFlag(definition, raw);
    } catch (error) {
      issues.push({ flag: definition.name, message: errorMessage(error) });
    }
  }

  return { flags: Object.freeze(flags), issues };
}
