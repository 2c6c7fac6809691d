import { CatalogError } from "../errors";
import { deepEqual, isRecord } from "../formats/values";
import type {
  FeatureFlags,
  FlagValue,
  PlainValue,
  RequiredKeySpec,
  ResolvedKey,
  RuleCondition,
  ValueType
} from "../types";

const TOKEN = /{{\s*([A-Za-z0-9_]+)\s*}}/g;
const WHOLE_TOKEN = /^{{\s*([A-Za-z0-9_]+)\s*}}$/;

export type Resolution<T> = { ok: true; value: T } | { ok: false; missingFlag: string };

function sameFlagValue(actual: FlagValue, expected: FlagValue): boolean {
  return actual === expected || String(actual) === String(expected);
}

/** An absent flag never equals anything, so `notEquals` holds for it. */
export function conditionHolds(condition: RuleCondition, flags: FeatureFlags): boolean {
  const actual = flags[condition.flag];
  if ("present" in condition) {
    return (actual !== undefined) === condition.present;
  }
  if ("equals" in condition) {
    return actual !== undefined && sameFlagValue(actual, condition.equals);
  }
  return actual === undefined || !sameFlagValue(actual, condition.notEquals);
}

export function conditionsHold(conditions: RuleCondition[], flags: FeatureFlags): boolean {
  return conditions.every((condition) => conditionHolds(condition, flags));
}

/** Flag names referenced by `{{NAME}}` tokens anywhere inside `value`. */
export function referencedFlags(value: PlainValue | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return Array.from(value.matchAll(TOKEN), (match) => match[1]);
  }
  if (Array.isArray(value)) {
    return value.flatMap(referencedFlags);
  }
  if (isRecord(value)) {
    return Object.values(value).flatMap(referencedFlags);
  }
  return [];
}

/**
 * Substitutes flag tokens. A string that is exactly one token takes the flag's
 * typed value; tokens inside a longer string are interpolated as text.
 */
export function resolveValue(value: PlainValue, flags: FeatureFlags): Resolution<PlainValue> {
  if (typeof value === "string") {
    const whole = WHOLE_TOKEN.exec(value);
    if (whole) {
      const flagValue = flags[whole[1]];
      return flagValue === undefined ? { ok: false, missingFlag: whole[1] } : { ok: true, value: flagValue };
    }
    const missing = referencedFlags(value).find((name) => flags[name] === undefined);
    if (missing) {
      return { ok: false, missingFlag: missing };
    }
    return { ok: true, value: value.replace(TOKEN, (_token, name: string) => String(flags[name])) };
  }
  if (Array.isArray(value)) {
    const items: PlainValue[] = [];
    for (const item of value) {
      const resolved = resolveValue(item, flags);
      if (!resolved.ok) return resolved;
      items.push(resolved.value);
    }
    return { ok: true, value: items };
  }
  if (typeof value === "object") {
    const entries: Record<string, PlainValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const resolved = resolveValue(item, flags);
      if (!resolved.ok) return resolved;
      entries[key] = resolved.value;
    }
    return { ok: true, value: entries };
  }
  return { ok: true, value };
}

/** Returns null when the value cannot be represented as `type`. */
export function coerceValue(value: PlainValue, type: ValueType): PlainValue | null {
  if (type === "string") {
    return typeof value === "object" ? null : String(value);
  }
  if (type === "boolean") {
    if (typeof value === "boolean") return value;
    if (value === "true" || value === 1) return true;
    if (value === "false" || value === 0) return false;
    return null;
  }
  const number = typeof value === "number" ? value : typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
  if (!Number.isFinite(number)) {
    return null;
  }
  if (type === "integer") {
    return Number.isInteger(number) ? number : null;
  }
  return number;
}

export function resolveKey(spec: RequiredKeySpec, flags: FeatureFlags): Resolution<ResolvedKey> {
  const op = spec.op ?? "set";
  if (op === "present") {
    return { ok: true, value: { path: spec.path, op } };
  }
  if (spec.value === undefined) {
    throw new CatalogError(`Required key ${spec.path} has no value for op "${op}".`);
  }
  const resolved = resolveValue(spec.value, flags);
  if (!resolved.ok) {
    return resolved;
  }
  let value = resolved.value;
  if (spec.type) {
    const coerced = coerceValue(value, spec.type);
    if (coerced === null) {
      // the flag holds something this key cannot take
      return { ok: false, missingFlag: referencedFlags(spec.value)[0] ?? spec.path };
    }
    value = coerced;
  }
  if (op === "set" && spec.type) {
    return { ok: true, value: { path: spec.path, op, value, type: spec.type } };
  }
  return { ok: true, value: { path: spec.path, op, value } };
}

/**
 * Merges keys in the order given. A later `set` on a path replaces the earlier
 * one in place; `include` values accumulate; repeated `present` keys collapse.
 */
export function mergeKeys(keys: ResolvedKey[]): ResolvedKey[] {
  const merged = new Map<string, ResolvedKey>();
  const includes: ResolvedKey[] = [];
  for (const key of keys) {
    if (key.op === "include") {
      const duplicate = includes.some(
        (existing) => existing.op === "include" && existing.path === key.path && deepEqual(existing.value, key.value)
      );
      if (!duplicate) {
        includes.push(key);
        merged.set(`include:${key.path}:${includes.length}`, key);
      }
      continue;
    }
    merged.set(`${key.op}:${key.path}`, key);
  }
  return Array.from(merged.values());
}
