export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function printError(code: string, message: string): void {
  console.log(formatError(code, message));
}

/**
 * Network acquisition gave up after its retries. Recoverable only where the
 * artifact policy allows the run to continue without the file.
 */
export class AcquisitionError extends Error {
  readonly kind = "acquisition" as const;

  constructor(
    message: string,
    readonly url: string,
    readonly attempts: number
  ) {
    super(message);
    this.name = "AcquisitionError";
  }
}

export class SyntaxCorruption extends Error {
  readonly kind = "syntax-corruption" as const;

  constructor(message: string, readonly path: string) {
    super(message);
    this.name = "SyntaxCorruption";
  }
}

export class RequirementUnsatisfiable extends Error {
  readonly kind = "requirement-unsatisfiable" as const;

  constructor(readonly flag: string, readonly artifactId: string) {
    super(`Required flag ${flag} is not set (needed by ${artifactId}).`);
    this.name = "RequirementUnsatisfiable";
  }
}

/** Downstream toolchain rejected a file this engine considered valid. Logged only. */
export class ToolchainMismatch extends Error {
  readonly kind = "toolchain-mismatch" as const;

  constructor(message: string, readonly path: string, readonly tool: string) {
    super(message);
    this.name = "ToolchainMismatch";
  }
}

/** Reconciler could not produce a valid artifact from either patch or template. */
export class ReconciliationFailure extends Error {
  readonly kind = "reconciliation" as const;

  constructor(message: string, readonly artifactId: string) {
    super(message);
    this.name = "ReconciliationFailure";
  }
}

export class NotFoundError extends Error {
  constructor(readonly path: string) {
    super(`File not found: ${path}`);
    this.name = "NotFoundError";
  }
}

/** A value named by a required key cannot be synthesized by the format. */
export class KeySynthesisError extends Error {
  constructor(message: string, readonly keyPath: string) {
    super(message);
    this.name = "KeySynthesisError";
  }
}

export class CatalogError extends Error {
  constructor(message: string, readonly problems: string[] = []) {
    super(problems.length > 0 ? `${message}\n${problems.join("\n")}` : message);
    this.name = "CatalogError";
  }
}

export class DependencyCycleError extends CatalogError {
  constructor(readonly cycle: string[]) {
    super(`Dependency cycle in artifact index: ${cycle.join(" -> ")}`);
    this.name = "DependencyCycleError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
