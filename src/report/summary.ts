import type { ArtifactStore } from "../store/artifact-store";
import type { ReconciliationResult, RunReport } from "../types";

export type ReportOptions = {
  /** Warn-policy failures become fatal. */
  strict: boolean;
};

export function isFatal(result: ReconciliationResult, options: ReportOptions): boolean {
  return result.outcome === "failed" && (result.policy.kind === "abort" || options.strict);
}

function failureReason(result: ReconciliationResult): string {
  const reason = result.errors[result.errors.length - 1] ?? "unknown failure";
  return result.failure?.flag && !reason.includes(result.failure.flag)
    ? `${reason} (missing flag ${result.failure.flag})`
    : reason;
}

export function buildRunReport(results: ReconciliationResult[], options: ReportOptions): RunReport {
  const fatal = results.filter((result) => isFatal(result, options));
  const warnings: string[] = [];
  for (const result of results) {
    if (result.outcome === "failed" && result.policy.kind === "warn" && !options.strict) {
      warnings.push(`${result.artifactId}: ${result.policy.consequence}`);
    }
  }
  return {
    results,
    fatal,
    warnings,
    exitCode: fatal.length > 0 ? 1 : 0,
    firstFatalReason: fatal.length > 0 ? `${fatal[0].artifactId}: ${failureReason(fatal[0])}` : null
  };
}

/** One CI log line per artifact. */
export function describeResult(result: ReconciliationResult, options: ReportOptions): string {
  if (result.outcome === "valid") {
    return `[ok]       ${result.artifactId}: valid`;
  }
  if (result.outcome === "reconciled") {
    const backup = result.backupCreated ? `, backup ${result.backupCreated}` : "";
    return `[repaired] ${result.artifactId}: repaired (${result.strategy ?? "patch"})${backup}`;
  }
  const severity = isFatal(result, options) ? "fatal" : "warn";
  return `[failed]   ${result.artifactId}: failed (${severity}): ${failureReason(result)}`;
}

export function formatReport(report: RunReport, options: ReportOptions & { generatedAt?: Date }): string {
  const lines = [
    "Configuration reconciliation report",
    `Generated: ${(options.generatedAt ?? new Date()).toISOString()}`,
    `Result: ${report.exitCode === 0 ? "PASS" : "FAIL"} (exit ${report.exitCode})`,
    "",
    ...report.results.map((result) => describeResult(result, options))
  ];
  const details = report.results.filter((result) => result.outcome === "failed" && result.errors.length > 1);
  if (details.length > 0) {
    lines.push("", "Details:");
    for (const result of details) {
      for (const error of result.errors) {
        lines.push(`- ${result.artifactId}: ${error}`);
      }
    }
  }
  if (report.warnings.length > 0) {
    lines.push("", "Warnings:", ...report.warnings.map((warning) => `- ${warning}`));
  }
  if (report.firstFatalReason) {
    lines.push("", `FIRST FATAL: ${report.firstFatalReason}`);
  }
  return `${lines.join("\n")}\n`;
}

export function writeReport(store: ArtifactStore, filePath: string, text: string): void {
  store.write(filePath, text);
}
