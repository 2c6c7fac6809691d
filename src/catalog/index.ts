import fs from "fs";
import path from "path";
import { CatalogError, errorMessage } from "../errors";
import { getRepoRoot } from "../paths";
import { referencedFlags } from "../resolver/values";
import { topologicalOrder } from "../resolver";
import { templatesDir } from "../templates/render";
import type { ArtifactDefinition, Catalog, FlagDefinition, RequiredKeySpec, RequirementRule } from "../types";
import { validateJson } from "../validation/validate";

const INDEX_FILES = {
  flags: { file: "flag-index.json", schema: "flag-index.schema.json" },
  artifacts: { file: "artifact-index.json", schema: "artifact-index.schema.json" },
  rules: { file: "requirement-index.json", schema: "requirement-index.schema.json" }
} as const;

type RawArtifact = Omit<ArtifactDefinition, "dependsOn" | "requiredKeys"> & {
  dependsOn?: string[];
  requiredKeys?: RequiredKeySpec[];
};

type RawRule = Omit<RequirementRule, "when"> & { when?: RequirementRule["when"] };

function readIndex<T>(dir: string, entry: { file: string; schema: string }): T {
  const filePath = path.join(dir, entry.file);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new CatalogError(`Cannot read ${entry.file}: ${errorMessage(error)}`);
  }
  const result = validateJson(entry.schema, raw);
  if (!result.valid) {
    throw new CatalogError(`${entry.file} does not match ${entry.schema}`, result.errors);
  }
  return raw as T;
}

function duplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) repeated.add(value);
    seen.add(value);
  }
  return Array.from(repeated);
}

function checkKeyFlags(owner: string, keys: RequiredKeySpec[], flagNames: Set<string>, problems: string[]): void {
  for (const key of keys) {
    for (const flag of referencedFlags(key.value)) {
      if (!flagNames.has(flag)) {
        problems.push(`${owner}: key ${key.path} references undefined flag ${flag}`);
      }
    }
  }
}

/** Cross-reference checks the JSON Schemas cannot express. */
export function catalogProblems(catalog: Catalog, resourceRoot = getRepoRoot()): string[] {
  const problems: string[] = [];
  const flagNames = new Set(catalog.flags.map((flag) => flag.name));
  const artifacts = new Map(catalog.artifacts.map((artifact) => [artifact.id, artifact]));

  for (const name of duplicates(catalog.flags.map((flag) => flag.name))) {
    problems.push(`Duplicate flag: ${name}`);
  }
  for (const id of duplicates(catalog.artifacts.map((artifact) => artifact.id))) {
    problems.push(`Duplicate artifact: ${id}`);
  }
  for (const id of duplicates(catalog.rules.map((rule) => rule.id))) {
    problems.push(`Duplicate rule: ${id}`);
  }

  for (const artifact of catalog.artifacts) {
    for (const dep of artifact.dependsOn) {
      if (!artifacts.has(dep)) {
        problems.push(`Artifact ${artifact.id} depends on unknown artifact ${dep}`);
      }
    }
    if (artifact.source && !flagNames.has(artifact.source.flag)) {
      problems.push(`Artifact ${artifact.id} is sourced from undefined flag ${artifact.source.flag}`);
    }
    if (artifact.template && !fs.existsSync(path.join(resourceRoot, "templates", "artifacts", artifact.template))) {
      problems.push(`Artifact ${artifact.id} names missing template ${artifact.template}`);
    }
    if (artifact.schema && !fs.existsSync(path.join(resourceRoot, "schemas", artifact.schema))) {
      problems.push(`Artifact ${artifact.id} names missing schema ${artifact.schema}`);
    }
    if (artifact.format === "png" && !artifact.source) {
      problems.push(`Image artifact ${artifact.id} needs a source`);
    }
    checkKeyFlags(`Artifact ${artifact.id}`, artifact.requiredKeys, flagNames, problems);
  }

  for (const rule of catalog.rules) {
    const artifact = artifacts.get(rule.artifact);
    if (!artifact) {
      problems.push(`Rule ${rule.id} targets unknown artifact ${rule.artifact}`);
    } else if (rule.platform && artifact.platform !== "shared" && artifact.platform !== rule.platform) {
      problems.push(`Rule ${rule.id} is for ${rule.platform} but ${artifact.id} is ${artifact.platform}`);
    }
    for (const condition of rule.when) {
      if (!flagNames.has(condition.flag)) {
        problems.push(`Rule ${rule.id} tests undefined flag ${condition.flag}`);
      }
    }
    checkKeyFlags(`Rule ${rule.id}`, rule.keys, flagNames, problems);
  }
  return problems;
}

/**
 * Loads and checks the static tables under `dir` (templates/ by default).
 * Throws CatalogError, or DependencyCycleError when the artifact graph loops.
 */
export function loadCatalog(dir = templatesDir()): Catalog {
  const flags = readIndex<{ flags: FlagDefinition[] }>(dir, INDEX_FILES.flags).flags;
  const artifacts = readIndex<{ artifacts: RawArtifact[] }>(dir, INDEX_FILES.artifacts).artifacts.map(
    (artifact): ArtifactDefinition => ({
      ...artifact,
      dependsOn: artifact.dependsOn ?? [],
      requiredKeys: artifact.requiredKeys ?? []
    })
  );
  const rules = readIndex<{ rules: RawRule[] }>(dir, INDEX_FILES.rules).rules.map((rule): RequirementRule => ({
    ...rule,
    when: rule.when ?? []
  }));
  const catalog: Catalog = { flags, artifacts, rules };
  const problems = catalogProblems(catalog, path.dirname(dir));
  if (problems.length > 0) {
    throw new CatalogError("Catalog is inconsistent", problems);
  }
  topologicalOrder(catalog.artifacts);
  return catalog;
}
