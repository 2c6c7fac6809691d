import type { DownloadOptions } from "../acquisition/download";
import { CatalogError, errorMessage, printError } from "../errors";
import { buildRunReport, describeResult, formatReport, writeReport } from "../report/summary";
import { resolvePlan } from "../resolver";
import { runReconciliation } from "../runner";
import { ArtifactStore } from "../store/artifact-store";
import { createPlutilLint } from "../validation/toolchain";
import { withRunLock } from "../workspace";
import type { PlannedArtifact, ReconciliationResult } from "../types";
import { openSession } from "./session";
import type { Session } from "./session";

export type ReconcileCommandOptions = {
  env?: Record<string, string | undefined>;
  fetchImpl?: DownloadOptions["fetchImpl"];
  sleep?: DownloadOptions["sleep"];
  store?: ArtifactStore;
};

/** Full run: resolve, validate, reconcile, report. Resolves to the process exit code. */
export async function runReconcile(options: ReconcileCommandOptions = {}): Promise<number> {
  let session: Session;
  try {
    session = openSession(options.env);
  } catch (error) {
    printError(error instanceof CatalogError ? "RCN-1001" : "RCN-1002", errorMessage(error));
    return 1;
  }
  for (const issue of session.flagIssues) {
    printError("RCN-1101", `Flag ${issue.flag} ignored: ${issue.message}`);
  }

  let plan: PlannedArtifact[];
  try {
    plan = resolvePlan(session.catalog, session.flags, { platforms: session.platforms });
  } catch (error) {
    printError("RCN-1001", errorMessage(error));
    return 1;
  }
  console.log(`Reconciling ${plan.length} artifact(s) in ${session.projectRoot}`);

  const store = options.store ?? new ArtifactStore();
  const { config, projectRoot, flags } = session;
  const ordered = plan;
  let results: ReconciliationResult[];
  try {
    results = await withRunLock(projectRoot, () =>
      runReconciliation(ordered, {
        projectRoot,
        flags,
        store,
        network: config.network,
        fetchImpl: options.fetchImpl,
        sleep: options.sleep,
        lint: config.toolchain.lint ? createPlutilLint() : undefined,
        log: (line) => console.log(line)
      })
    );
  } catch (error) {
    printError("RCN-1201", errorMessage(error));
    return 1;
  }

  const reportOptions = { strict: session.strict };
  const report = buildRunReport(results, reportOptions);
  for (const result of results) {
    console.log(describeResult(result, reportOptions));
  }
  for (const warning of report.warnings) {
    console.log(`Warning: ${warning}`);
  }
  try {
    writeReport(store, session.reportPath, formatReport(report, reportOptions));
    console.log(`Report: ${session.reportPath}`);
  } catch (error) {
    printError("RCN-1301", `Could not write report: ${errorMessage(error)}`);
  }
  if (report.firstFatalReason) {
    printError("RCN-2001", `Build must stop. ${report.firstFatalReason}`);
  }
  return report.exitCode;
}
