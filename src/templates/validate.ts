import fs from "fs";
import path from "path";
import { errorMessage } from "../errors";
import { extractPlaceholders, templatesDir } from "./render";

type TemplateIndexEntry = {
  name: string;
  placeholders: string[];
};

type TemplateIndex = {
  templates: TemplateIndexEntry[];
};

function normalize(values: string[]): string[] {
  return Array.from(new Set(values)).sort();
}

/**
 * Cross-checks templates/template-index.json against templates/artifacts.
 * `knownFlags` lets the caller flag placeholders that no flag definition covers.
 */
export function validateTemplates(knownFlags?: Set<string>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const root = templatesDir();
  const indexPath = path.join(root, "template-index.json");
  const artifactsDir = path.join(root, "artifacts");

  if (!fs.existsSync(indexPath)) {
    return { valid: false, errors: ["Missing templates/template-index.json"] };
  }
  if (!fs.existsSync(artifactsDir)) {
    return { valid: false, errors: ["Missing templates/artifacts directory"] };
  }

  let index: TemplateIndex;
  try {
    index = JSON.parse(fs.readFileSync(indexPath, "utf-8")) as TemplateIndex;
  } catch (error) {
    return { valid: false, errors: [`Invalid templates/template-index.json: ${errorMessage(error)}`] };
  }
  const indexByName = new Map((index.templates ?? []).map((entry) => [entry.name, entry]));

  const templateFiles = fs
    .readdirSync(artifactsDir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
  const files = new Set(templateFiles);

  for (const entry of indexByName.values()) {
    if (!files.has(entry.name)) {
      errors.push(`Template index entry missing file: ${entry.name}`);
    }
  }

  for (const name of templateFiles) {
    const entry = indexByName.get(name);
    if (!entry) {
      errors.push(`Template file missing index entry: ${name}`);
      continue;
    }
    const content = fs.readFileSync(path.join(artifactsDir, name), "utf-8");
    const placeholders = normalize(extractPlaceholders(content));
    const indexed = normalize(entry.placeholders);
    if (indexed.join("|") !== placeholders.join("|")) {
      errors.push(
        `Template placeholder mismatch: ${name} (index=${indexed.join(", ")} file=${placeholders.join(", ")})`
      );
    }
    if (knownFlags) {
      for (const placeholder of placeholders) {
        if (!knownFlags.has(placeholder)) {
          errors.push(`Template ${name} uses undefined flag: ${placeholder}`);
        }
      }
    }
  }

  return { valid: errors.length === 0, errors };
}
