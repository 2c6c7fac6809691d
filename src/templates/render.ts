import fs from "fs";
import path from "path";
import { getRepoRoot } from "../paths";

const PLACEHOLDER = /{{\s*([a-zA-Z0-9_]+)\s*}}/g;

export function templatesDir(): string {
  return path.join(getRepoRoot(), "templates");
}

export function loadTemplate(name: string): string {
  const filePath = path.join(templatesDir(), "artifacts", name);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Template not found: ${name}`);
  }
  return fs.readFileSync(filePath, "utf-8");
}

export function extractPlaceholders(template: string): string[] {
  const placeholders = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    placeholders.add(match[1]);
  }
  return Array.from(placeholders);
}

export function renderTemplate(template: string, data: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (_token, key: string) => data[key] ?? "");
}
