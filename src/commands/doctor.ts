import { loadCatalog } from "../catalog";
import { parseFeatureFlags } from "../catalog/feature-flags";
import { CatalogError, DependencyCycleError, errorMessage, printError } from "../errors";
import { commandAvailable } from "../platform/process-exec";
import { validateTemplates } from "../templates/validate";
import type { Catalog } from "../types";

export type DoctorOptions = {
  env?: Record<string, string | undefined>;
  probe?: (command: string) => boolean;
};

/** Static checks on the shipped tables, templates, host tools and the current environment. */
export function runDoctor(options: DoctorOptions = {}): number {
  let failures = 0;
  let catalog: Catalog | null = null;
  try {
    catalog = loadCatalog();
    console.log(
      `Catalog: ${catalog.flags.length} flags, ${catalog.artifacts.length} artifacts, ${catalog.rules.length} rules`
    );
  } catch (error) {
    if (error instanceof DependencyCycleError) {
      failures += 1;
      printError("RCN-1001", `Dependency cycle: ${error.cycle.join(" -> ")}`);
    } else if (error instanceof CatalogError && error.problems.length > 0) {
      failures += error.problems.length;
      printError("RCN-1001", error.message.split("\n")[0]);
      error.problems.forEach((problem) => printError("RCN-1001", problem));
    } else {
      failures += 1;
      printError("RCN-1001", errorMessage(error));
    }
  }

  const templateResult = validateTemplates(catalog ? new Set(catalog.flags.map((flag) => flag.name)) : undefined);
  if (!templateResult.valid) {
    failures += templateResult.errors.length;
    printError("RCN-1003", "Template validation failed:");
    templateResult.errors.forEach((error) => printError("RCN-1003", error));
  }

  if (catalog) {
    const { issues } = parseFeatureFlags(options.env ?? process.env, catalog.flags);
    if (issues.length > 0) {
      failures += issues.length;
      issues.forEach((issue) => printError("RCN-1101", `Flag ${issue.flag}: ${issue.message}`));
    }
  }

  const probe = options.probe ?? ((command: string) => commandAvailable(command));
  if (probe("plutil")) {
    console.log("plutil: available (plist lint enabled)");
  } else {
    console.log("plutil: not found (plist lint skipped)");
  }

  if (failures > 0) {
    printError("RCN-1004", `Doctor found ${failures} problem(s).`);
    return 1;
  }
  console.log("Catalog, templates and flags are valid.");
  return 0;
}
