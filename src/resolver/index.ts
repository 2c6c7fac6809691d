import { DependencyCycleError } from "../errors";
import type {
  ArtifactDefinition,
  Catalog,
  FeatureFlags,
  PlannedArtifact,
  Platform,
  ReconciliationRequirement,
  RequirementRule,
  ResolvedKey,
  RuleCategory
} from "../types";
import { conditionsHold, mergeKeys, resolveKey } from "./values";

/** Earlier categories are applied first, so later ones win a collision. */
export const CATEGORY_ORDER: RuleCategory[] = ["identity", "security", "capability", "permission", "cosmetic"];

export type ResolveOptions = {
  platforms: Platform[];
};

function platformSelected(platform: ArtifactDefinition["platform"] | undefined, platforms: Platform[]): boolean {
  if (platform === undefined || platform === "shared") {
    return platforms.length > 0;
  }
  return platforms.includes(platform);
}

function findCycle(remaining: ArtifactDefinition[]): string[] {
  const byId = new Map(remaining.map((artifact) => [artifact.id, artifact]));
  const visiting: string[] = [];
  const done = new Set<string>();

  const visit = (id: string): string[] | null => {
    const at = visiting.indexOf(id);
    if (at >= 0) {
      return [...visiting.slice(at), id];
    }
    if (done.has(id)) {
      return null;
    }
    visiting.push(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      if (byId.has(dep)) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    visiting.pop();
    done.add(id);
    return null;
  };

  for (const artifact of remaining) {
    const cycle = visit(artifact.id);
    if (cycle) return cycle;
  }
  return remaining.map((artifact) => artifact.id);
}

/**
 * Kahn's algorithm; among artifacts that are ready at the same time, table
 * order decides. Dependencies outside `artifacts` are ignored.
 */
export function topologicalOrder(artifacts: ArtifactDefinition[]): ArtifactDefinition[] {
  const ids = new Set(artifacts.map((artifact) => artifact.id));
  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const artifact of artifacts) {
    const deps = Array.from(new Set(artifact.dependsOn)).filter((dep) => ids.has(dep));
    indegree.set(artifact.id, deps.length);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), artifact.id]);
    }
  }

  const ordered: ArtifactDefinition[] = [];
  const placed = new Set<string>();
  while (ordered.length < artifacts.length) {
    const next = artifacts.find((artifact) => !placed.has(artifact.id) && indegree.get(artifact.id) === 0);
    if (!next) {
      throw new DependencyCycleError(findCycle(artifacts.filter((artifact) => !placed.has(artifact.id))));
    }
    ordered.push(next);
    placed.add(next.id);
    for (const dependent of dependents.get(next.id) ?? []) {
      indegree.set(dependent, (indegree.get(dependent) ?? 0) - 1);
    }
  }
  return ordered;
}

export function activeRules(catalog: Catalog, artifact: ArtifactDefinition, flags: FeatureFlags, platforms: Platform[]): RequirementRule[] {
  const rules = catalog.rules.filter(
    (rule) =>
      rule.artifact === artifact.id &&
      platformSelected(rule.platform, platforms) &&
      conditionsHold(rule.when, flags)
  );
  const position = new Map(catalog.rules.map((rule, index) => [rule.id, index]));
  return rules.sort(
    (a, b) =>
      CATEGORY_ORDER.indexOf(a.category) - CATEGORY_ORDER.indexOf(b.category) ||
      (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0)
  );
}

/** Pure function of the flags: artifact content is never consulted. */
export function requirementFor(artifact: ArtifactDefinition, rules: RequirementRule[], flags: FeatureFlags): ReconciliationRequirement {
  const ruleIds = rules.map((rule) => rule.id);
  const keys: ResolvedKey[] = [];
  const specs = [...artifact.requiredKeys, ...rules.flatMap((rule) => rule.keys)];
  for (const spec of specs) {
    const resolved = resolveKey(spec, flags);
    if (!resolved.ok) {
      return { artifactId: artifact.id, satisfiable: false, missingFlag: resolved.missingFlag, rules: ruleIds };
    }
    keys.push(resolved.value);
  }
  return { artifactId: artifact.id, satisfiable: true, keys: mergeKeys(keys), rules: ruleIds };
}

/**
 * Ordered (artifact, requirement) pairs for one run. An artifact is selected
 * when its platform is and it has required keys of its own or an active rule.
 */
export function resolvePlan(catalog: Catalog, flags: FeatureFlags, options: ResolveOptions): PlannedArtifact[] {
  const candidates = new Map<string, RequirementRule[]>();
  const selected = catalog.artifacts.filter((artifact) => {
    if (!platformSelected(artifact.platform, options.platforms)) {
      return false;
    }
    const rules = activeRules(catalog, artifact, flags, options.platforms);
    candidates.set(artifact.id, rules);
    return artifact.requiredKeys.length > 0 || rules.length > 0;
  });
  return topologicalOrder(selected).map((artifact) => ({
    artifact,
    requirement: requirementFor(artifact, candidates.get(artifact.id) ?? [], flags)
  }));
}

/** Throws DependencyCycleError when the whole table cannot be ordered. */
export function assertAcyclic(catalog: Catalog): void {
  topologicalOrder(catalog.artifacts);
}
