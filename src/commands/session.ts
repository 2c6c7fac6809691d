import path from "path";
import { loadCatalog } from "../catalog";
import { parseFeatureFlags } from "../catalog/feature-flags";
import type { FlagIssue } from "../catalog/feature-flags";
import { loadConfig } from "../config";
import type { ReconcilerConfig } from "../config";
import { getFlags } from "../context/flags";
import type { Catalog, FeatureFlags, Platform } from "../types";
import { resolveProjectRoot } from "../workspace";

export type Session = {
  projectRoot: string;
  config: ReconcilerConfig;
  catalog: Catalog;
  flags: FeatureFlags;
  flagIssues: FlagIssue[];
  platforms: Platform[];
  strict: boolean;
  reportPath: string;
};

/** Everything a command needs, from CLI flags, the config file, the catalog and the environment. */
export function openSession(env: Record<string, string | undefined> = process.env): Session {
  const runtime = getFlags();
  const projectRoot = resolveProjectRoot(runtime.project);
  const config = loadConfig(projectRoot);
  const catalog = loadCatalog();
  const parsed = parseFeatureFlags(env, catalog.flags);
  return {
    projectRoot,
    config,
    catalog,
    flags: parsed.flags,
    flagIssues: parsed.issues,
    platforms: runtime.platforms,
    strict: runtime.strict || config.policy.strict,
    reportPath: path.resolve(projectRoot, runtime.report ?? config.report.path)
  };
}
