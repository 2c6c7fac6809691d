import { CatalogError, errorMessage, printError } from "../errors";
import { describeResult } from "../report/summary";
import { resolvePlan } from "../resolver";
import { runReconciliation } from "../runner";
import type { ArtifactStore } from "../store/artifact-store";
import type { PlannedArtifact } from "../types";
import { openSession } from "./session";
import type { Session } from "./session";

export type CheckCommandOptions = {
  env?: Record<string, string | undefined>;
  store?: ArtifactStore;
};

/** Validation only. Nothing is downloaded or written; any invalid artifact fails the check. */
export async function runCheck(options: CheckCommandOptions = {}): Promise<number> {
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

  const results = await runReconciliation(plan, {
    projectRoot: session.projectRoot,
    flags: session.flags,
    mode: "check",
    store: options.store
  });
  const reportOptions = { strict: session.strict };
  let invalid = 0;
  for (const result of results) {
    console.log(describeResult(result, reportOptions));
    if (result.outcome === "failed") {
      invalid += 1;
      for (const error of result.errors) {
        console.log(`  - ${error}`);
      }
    }
  }
  if (invalid > 0) {
    printError("RCN-2002", `${invalid} of ${results.length} artifact(s) need reconciliation.`);
    return 1;
  }
  console.log(`All ${results.length} artifact(s) are valid.`);
  return 0;
}
