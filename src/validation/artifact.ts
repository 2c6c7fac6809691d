import { errorMessage } from "../errors";
import { getFormat, jsonFormat } from "../formats";
import type { FormatPlugin } from "../formats";
import { deepEqual, sameKind } from "../formats/values";
import type { ArtifactDefinition, Inspection, MissingKey, ResolvedKey } from "../types";
import { validateJson } from "./validate";

export type ParsedArtifact = { ok: true; model: unknown } | { ok: false; detail: string };

/**
 * Parses `bytes` with the artifact's format plugin. JSON artifacts that name a
 * schema must also satisfy it.
 */
export function parseArtifact(artifact: ArtifactDefinition, bytes: Buffer): ParsedArtifact {
  if (artifact.format === "json" && artifact.schema) {
    let value: unknown;
    try {
      value = jsonFormat.parse(bytes).value;
    } catch (error) {
      return { ok: false, detail: errorMessage(error) };
    }
    const result = validateJson(artifact.schema, value);
    if (!result.valid) {
      return { ok: false, detail: `schema ${artifact.schema}: ${result.errors.join("; ")}` };
    }
  }
  try {
    return { ok: true, model: getFormat(artifact.format).parse(bytes) };
  } catch (error) {
    return { ok: false, detail: errorMessage(error) };
  }
}

export function validateSyntax(artifact: ArtifactDefinition, bytes: Buffer): boolean {
  return parseArtifact(artifact, bytes).ok;
}

/** Returns why `key` is not satisfied by `model`, or null when it is. */
export function checkKey(plugin: FormatPlugin<unknown>, model: unknown, key: ResolvedKey): MissingKey | null {
  const reading = plugin.read(model, key.path);
  if (!reading.found) {
    return key.op === "present" ? { path: key.path, reason: "absent" } : { path: key.path, reason: "absent", expected: key.value };
  }
  if (key.op === "present") {
    return null;
  }
  const actual = reading.value;
  if (key.op === "include") {
    if (!Array.isArray(actual)) {
      return { path: key.path, reason: "type-mismatch", expected: key.value, actual };
    }
    return actual.some((item) => deepEqual(item, key.value))
      ? null
      : { path: key.path, reason: "value-mismatch", expected: key.value, actual };
  }
  const equal = plugin.matches ? plugin.matches(actual, key.value) : deepEqual(actual, key.value);
  if (equal) {
    return null;
  }
  return {
    path: key.path,
    reason: sameKind(actual, key.value) ? "value-mismatch" : "type-mismatch",
    expected: key.value,
    actual
  };
}

export function missingKeysInModel(plugin: FormatPlugin<unknown>, model: unknown, keys: ResolvedKey[]): MissingKey[] {
  const missing: MissingKey[] = [];
  for (const key of keys) {
    try {
      const problem = checkKey(plugin, model, key);
      if (problem) {
        missing.push(problem);
      }
    } catch (error) {
      missing.push({ path: key.path, reason: "absent", actual: errorMessage(error) });
    }
  }
  return missing;
}

/** Empty list means every key is satisfied. A syntactically invalid artifact reports every key. */
export function validateRequiredKeys(artifact: ArtifactDefinition, keys: ResolvedKey[], bytes: Buffer): MissingKey[] {
  const parsed = parseArtifact(artifact, bytes);
  if (!parsed.ok) {
    return keys.map((key) => ({ path: key.path, reason: "absent" }));
  }
  return missingKeysInModel(getFormat(artifact.format), parsed.model, keys);
}

/** Syntax always runs before keys, so corruption and missing keys stay distinct. */
export function inspectArtifact(artifact: ArtifactDefinition, keys: ResolvedKey[], bytes: Buffer | null): Inspection {
  if (bytes === null) {
    return { status: "missing" };
  }
  const parsed = parseArtifact(artifact, bytes);
  if (!parsed.ok) {
    return { status: "corrupted", detail: parsed.detail };
  }
  const missing = missingKeysInModel(getFormat(artifact.format), parsed.model, keys);
  return missing.length > 0 ? { status: "unsatisfied", missing } : { status: "valid" };
}

export function describeInspection(inspection: Inspection): string {
  switch (inspection.status) {
    case "valid":
      return "valid";
    case "missing":
      return "missing";
    case "corrupted":
      return `corrupted (${inspection.detail})`;
    case "unsatisfied":
      return `missing keys: ${inspection.missing.map(describeMissingKey).join("; ")}`;
  }
}

export function describeMissingKey(missing: MissingKey): string {
  if (missing.reason === "absent") {
    return `${missing.path} is absent`;
  }
  const expected = JSON.stringify(missing.expected);
  const actual = JSON.stringify(missing.actual);
  return missing.reason === "type-mismatch"
    ? `${missing.path} has the wrong type (expected ${expected}, found ${actual})`
    : `${missing.path} is ${actual}, expected ${expected}`;
}
