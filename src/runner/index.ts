import { downloadWithRetry } from "../acquisition/download";
import type { DownloadOptions } from "../acquisition/download";
import type { ReconcilerConfig } from "../config";
import {
  AcquisitionError,
  ReconciliationFailure,
  RequirementUnsatisfiable,
  SyntaxCorruption,
  errorMessage
} from "../errors";
import { reconcileArtifact } from "../reconcile/reconciler";
import type { Acquire } from "../reconcile/reconciler";
import { ArtifactStore } from "../store/artifact-store";
import type {
  ArtifactDefinition,
  ArtifactState,
  FeatureFlags,
  Inspection,
  PlannedArtifact,
  ReconcileStrategy,
  ReconciliationResult,
  ResolvedKey,
  ResultFailure
} from "../types";
import { describeInspection, inspectArtifact, validateSyntax } from "../validation/artifact";
import type { ToolchainLint } from "../validation/toolchain";
import { resolveArtifactPath } from "../workspace";

export type RunMode = "reconcile" | "check";

export type RunnerOptions = {
  projectRoot: string;
  flags: FeatureFlags;
  mode?: RunMode;
  store?: ArtifactStore;
  network?: ReconcilerConfig["network"];
  /** Replaces the HTTP download used for artifacts with a `source`. */
  acquire?: Acquire;
  fetchImpl?: DownloadOptions["fetchImpl"];
  sleep?: DownloadOptions["sleep"];
  lint?: ToolchainLint;
  log?: (line: string) => void;
};

type ResultDraft = {
  artifact: ArtifactDefinition;
  path: string;
  transitions: ArtifactState[];
};

function finish(
  draft: ResultDraft,
  outcome: ReconciliationResult["outcome"],
  details: {
    backupCreated?: string | null;
    strategy?: ReconcileStrategy | null;
    errors?: string[];
    failure?: ResultFailure | null;
  } = {}
): ReconciliationResult {
  const transitions: ArtifactState[] = [...draft.transitions, outcome, "reported"];
  return Object.freeze({
    artifactId: draft.artifact.id,
    path: draft.path,
    outcome,
    valid: outcome !== "failed",
    repaired: outcome === "reconciled",
    backupCreated: details.backupCreated ?? null,
    strategy: details.strategy ?? null,
    errors: Object.freeze([...(details.errors ?? [])]),
    failure: details.failure ?? null,
    policy: draft.artifact.policy,
    transitions: Object.freeze(transitions)
  });
}

export function failureFromError(error: unknown): ResultFailure {
  if (error instanceof RequirementUnsatisfiable) {
    return { kind: "requirement-unsatisfiable", flag: error.flag };
  }
  if (error instanceof AcquisitionError) {
    return { kind: "acquisition" };
  }
  if (error instanceof SyntaxCorruption) {
    return { kind: "syntax-corruption" };
  }
  return { kind: "reconciliation" };
}

function defaultAcquire(options: RunnerOptions): Acquire {
  return (url, source) =>
    downloadWithRetry(url, {
      attempts: options.network?.attempts,
      baseDelayMs: options.network?.base_delay_ms,
      timeoutMs: options.network?.timeout_ms,
      minBytes: source.minBytes,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
      onRetry: (attempt, reason, delayMs) =>
        options.log?.(`  retry ${attempt} for ${source.flag} in ${delayMs}ms: ${reason}`)
    });
}

/** Newest backup that still parses; input for artifacts with no template or source. */
function lastKnownGood(
  store: ArtifactStore,
  artifact: ArtifactDefinition,
  filePath: string,
  backupDir: string | undefined
): Buffer | null {
  if (artifact.template || artifact.source) {
    return null;
  }
  for (const backup of store.listBackups(filePath, backupDir)) {
    const bytes = store.read(backup);
    if (validateSyntax(artifact, bytes)) {
      return bytes;
    }
  }
  return null;
}

function inspectionErrors(inspection: Inspection, filePath: string): string[] {
  if (inspection.status === "corrupted") {
    return [new SyntaxCorruption(`corrupted: ${inspection.detail}`, filePath).message];
  }
  return [describeInspection(inspection)];
}

/**
 * Takes one artifact through
 * unchecked → validating → valid | invalid → reconciling → reconciled | failed → reported.
 * Never throws: every failure becomes the returned result.
 */
export async function runArtifact(planned: PlannedArtifact, options: RunnerOptions): Promise<ReconciliationResult> {
  const { artifact, requirement } = planned;
  const store = options.store ?? new ArtifactStore();
  const log = options.log ?? (() => undefined);
  const draft: ResultDraft = { artifact, path: artifact.path, transitions: ["unchecked", "validating"] };

  let filePath: string;
  let backupDir: string | undefined;
  try {
    filePath = resolveArtifactPath(options.projectRoot, artifact.path);
    backupDir = artifact.backupDir ? resolveArtifactPath(options.projectRoot, artifact.backupDir) : undefined;
  } catch (error) {
    draft.transitions.push("invalid", "reconciling");
    return finish(draft, "failed", { errors: [errorMessage(error)], failure: { kind: "reconciliation" } });
  }

  if (!requirement.satisfiable) {
    const error = new RequirementUnsatisfiable(requirement.missingFlag, artifact.id);
    draft.transitions.push("invalid", "reconciling");
    return finish(draft, "failed", { errors: [error.message], failure: failureFromError(error) });
  }

  const keys: ResolvedKey[] = requirement.keys;
  let current: Buffer | null;
  try {
    current = store.readIfExists(filePath);
  } catch (error) {
    draft.transitions.push("invalid", "reconciling");
    return finish(draft, "failed", { errors: [errorMessage(error)], failure: { kind: "reconciliation" } });
  }

  const inspection = inspectArtifact(artifact, keys, current);
  if (inspection.status === "valid") {
    return finish(draft, "valid");
  }
  draft.transitions.push("invalid");
  const found = inspectionErrors(inspection, filePath);

  if (options.mode === "check") {
    return finish(draft, "failed", {
      errors: found,
      failure: { kind: inspection.status === "corrupted" ? "syntax-corruption" : "validation" }
    });
  }

  draft.transitions.push("reconciling");
  let bytes: Buffer;
  let strategy: ReconcileStrategy;
  try {
    const outcome = await reconcileArtifact({
      artifact,
      keys,
      current,
      flags: options.flags,
      backup: lastKnownGood(store, artifact, filePath, backupDir),
      acquire: options.acquire ?? defaultAcquire({ ...options, log })
    });
    for (const note of outcome.notes) {
      log(`  ${artifact.id}: ${note}`);
    }
    bytes = outcome.bytes;
    strategy = outcome.strategy;
  } catch (error) {
    return finish(draft, "failed", { errors: [...found, errorMessage(error)], failure: failureFromError(error) });
  }

  let backupCreated: string | null = null;
  try {
    backupCreated = store.backup(filePath, backupDir);
    store.write(filePath, bytes);
  } catch (error) {
    return finish(draft, "failed", {
      backupCreated,
      errors: [...found, `write failed: ${errorMessage(error)}`],
      failure: { kind: "reconciliation" }
    });
  }

  // One re-validation pass over what actually landed on disk.
  draft.transitions.push("reconciled", "validating");
  let recheck: Inspection;
  try {
    recheck = inspectArtifact(artifact, keys, store.readIfExists(filePath));
  } catch (error) {
    recheck = { status: "corrupted", detail: errorMessage(error) };
  }
  if (recheck.status !== "valid") {
    const failure = new ReconciliationFailure(
      `written ${artifact.id} failed re-validation: ${describeInspection(recheck)}`,
      artifact.id
    );
    try {
      if (backupCreated) {
        store.restore(backupCreated, filePath);
      } else {
        store.remove(filePath);
      }
    } catch (error) {
      return finish(draft, "failed", {
        backupCreated,
        errors: [...found, failure.message, `restore failed: ${errorMessage(error)}`],
        failure: failureFromError(failure)
      });
    }
    return finish(draft, "failed", { backupCreated, errors: [...found, failure.message], failure: failureFromError(failure) });
  }

  const mismatch = options.lint?.(artifact, filePath) ?? null;
  if (mismatch) {
    log(`  ${artifact.id}: ${mismatch.message}`);
  }
  return finish(draft, "reconciled", { backupCreated, strategy });
}

/** One acquisition per URL and size floor for a whole run. A rejected download is reused, not retried. */
export function shareAcquisitions(acquire: Acquire): Acquire {
  const pending = new Map<string, Promise<Buffer>>();
  return (url, source) => {
    const key = `${url} ${source.minBytes ?? 1}`;
    let download = pending.get(key);
    if (!download) {
      download = acquire(url, source);
      pending.set(key, download);
    }
    return download;
  };
}

/** Runs the plan strictly in order. One artifact's failure never stops the rest. */
export async function runReconciliation(plan: PlannedArtifact[], options: RunnerOptions): Promise<ReconciliationResult[]> {
  const store = options.store ?? new ArtifactStore();
  const acquire = shareAcquisitions(options.acquire ?? defaultAcquire(options));
  const results: ReconciliationResult[] = [];
  for (const planned of plan) {
    results.push(await runArtifact(planned, { ...options, store, acquire }));
  }
  return results;
}
