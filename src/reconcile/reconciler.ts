import { KeySynthesisError, ReconciliationFailure, RequirementUnsatisfiable } from "../errors";
import { getFormat } from "../formats";
import type { FormatPlugin } from "../formats";
import { loadTemplate, renderTemplate } from "../templates/render";
import type {
  ArtifactDefinition,
  ArtifactSource,
  FeatureFlags,
  ReconcileStrategy,
  ResolvedKey
} from "../types";
import { checkKey, describeInspection, inspectArtifact, parseArtifact } from "../validation/artifact";

export type Acquire = (url: string, source: ArtifactSource) => Promise<Buffer>;

export type ReconcileInput = {
  artifact: ArtifactDefinition;
  keys: ResolvedKey[];
  /** Current bytes on disk, null when absent. */
  current: Buffer | null;
  flags: FeatureFlags;
  /** Last known good content, used only when the artifact has neither template nor source. */
  backup?: Buffer | null;
  acquire: Acquire;
};

export type ReconcileOutcome = {
  bytes: Buffer;
  strategy: ReconcileStrategy;
  notes: string[];
};

/** Writes only the keys the model does not already satisfy, in order. */
export function applyKeys(plugin: FormatPlugin<unknown>, model: unknown, keys: ResolvedKey[]): unknown {
  let next = model;
  for (const key of keys) {
    if (checkKey(plugin, next, key)) {
      next = plugin.write(next, key);
    }
  }
  return next;
}

export function templateData(flags: FeatureFlags, plugin: FormatPlugin<unknown>): Record<string, string> {
  const data: Record<string, string> = {};
  for (const [name, value] of Object.entries(flags)) {
    data[name] = plugin.escapeTemplateValue(String(value));
  }
  return data;
}

async function templateBase(input: ReconcileInput, plugin: FormatPlugin<unknown>): Promise<Buffer> {
  const { artifact, flags } = input;
  if (artifact.source) {
    const url = flags[artifact.source.flag];
    if (url === undefined || url === "") {
      throw new RequirementUnsatisfiable(artifact.source.flag, artifact.id);
    }
    return input.acquire(String(url), artifact.source);
  }
  if (artifact.template) {
    return Buffer.from(renderTemplate(loadTemplate(artifact.template), templateData(flags, plugin)), "utf-8");
  }
  if (input.backup) {
    return input.backup;
  }
  throw new ReconciliationFailure(`No template, source or backup to rebuild ${artifact.id} from.`, artifact.id);
}

/**
 * Produces bytes that pass syntax and key validation for `keys`.
 *
 * A parseable artifact is patched in place first. When it is absent, corrupted,
 * or the patch does not validate, the artifact is rebuilt from its template
 * (or downloaded source) and the keys are applied to that. Throws
 * ReconciliationFailure when neither path yields a valid artifact; acquisition
 * and missing-flag errors propagate as their own types.
 */
export async function reconcileArtifact(input: ReconcileInput): Promise<ReconcileOutcome> {
  const { artifact, keys } = input;
  const plugin = getFormat(artifact.format);
  const notes: string[] = [];

  if (input.current) {
    const parsed = parseArtifact(artifact, input.current);
    if (parsed.ok) {
      try {
        const bytes = plugin.serialize(applyKeys(plugin, parsed.model, keys));
        const check = inspectArtifact(artifact, keys, bytes);
        if (check.status === "valid") {
          return { bytes, strategy: "patch", notes };
        }
        notes.push(`patch result ${describeInspection(check)}`);
      } catch (error) {
        if (!(error instanceof KeySynthesisError)) {
          throw error;
        }
        notes.push(`patch: ${error.message}`);
      }
    } else {
      notes.push(`discarded corrupted content: ${parsed.detail}`);
    }
  }

  const base = await templateBase(input, plugin);
  const parsed = parseArtifact(artifact, base);
  if (!parsed.ok) {
    const origin = artifact.source ? "Downloaded content" : "Template";
    throw new ReconciliationFailure(`${origin} for ${artifact.id} is invalid: ${parsed.detail}`, artifact.id);
  }
  let bytes: Buffer;
  try {
    bytes = plugin.serialize(applyKeys(plugin, parsed.model, keys));
  } catch (error) {
    if (error instanceof KeySynthesisError) {
      throw new ReconciliationFailure(`Cannot produce ${error.keyPath} in ${artifact.id}: ${error.message}`, artifact.id);
    }
    throw error;
  }
  const check = inspectArtifact(artifact, keys, bytes);
  if (check.status !== "valid") {
    throw new ReconciliationFailure(`Rebuilt ${artifact.id} is still invalid: ${describeInspection(check)}`, artifact.id);
  }
  return { bytes, strategy: "template", notes };
}
