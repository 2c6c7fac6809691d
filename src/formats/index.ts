import type { ArtifactFormat } from "../types";
import { jsonFormat } from "./json";
import { manifestFormat } from "./manifest";
import { plistFormat } from "./plist";
import { pngFormat } from "./png";
import { sourceFormat } from "./source";
import type { FormatPlugin } from "./types";

// Callers only hand a plugin models that the same plugin parsed.
const PLUGINS: Record<ArtifactFormat, FormatPlugin<unknown>> = {
  plist: plistFormat,
  json: jsonFormat,
  "android-manifest": manifestFormat,
  "generated-source": sourceFormat,
  png: pngFormat
};

export function getFormat(format: ArtifactFormat): FormatPlugin<unknown> {
  return PLUGINS[format];
}

export { jsonFormat, manifestFormat, plistFormat, pngFormat, sourceFormat };
export type { FormatPlugin, KeyReading } from "./types";
