import path from "path";

export function getRepoRoot(): string {
  const override = process.env.RECONCILER_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.resolve(__dirname, "..");
}
