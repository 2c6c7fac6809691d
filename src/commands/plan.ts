import { CatalogError, errorMessage, printError } from "../errors";
import { resolvePlan } from "../resolver";
import type { PlannedArtifact, ResolvedKey } from "../types";
import { openSession } from "./session";
import type { Session } from "./session";

function describeKey(key: ResolvedKey): string {
  if (key.op === "present") {
    return `${key.path} present`;
  }
  return `${key.path} ${key.op === "include" ? "includes" : "="} ${JSON.stringify(key.value)}`;
}

export function formatPlan(plan: PlannedArtifact[]): string[] {
  const lines: string[] = [];
  plan.forEach((planned, index) => {
    const { artifact, requirement } = planned;
    const policy = artifact.policy.kind === "abort" ? "abort" : "warn";
    lines.push(`${index + 1}. ${artifact.id} [${artifact.format}, ${policy}] ${artifact.path}`);
    if (requirement.rules.length > 0) {
      lines.push(`   rules: ${requirement.rules.join(", ")}`);
    }
    if (!requirement.satisfiable) {
      lines.push(`   unsatisfiable: flag ${requirement.missingFlag} is not set`);
      return;
    }
    for (const key of requirement.keys) {
      lines.push(`   - ${describeKey(key)}`);
    }
  });
  return lines;
}

export function runPlan(env?: Record<string, string | undefined>): number {
  let session: Session;
  try {
    session = openSession(env);
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
  console.log(`Plan for ${session.projectRoot} (${session.platforms.join(", ")}): ${plan.length} artifact(s)`);
  formatPlan(plan).forEach((line) => console.log(line));
  return 0;
}
