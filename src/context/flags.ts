import type { Platform } from "../types";

export type RuntimeFlags = {
  project?: string;
  platforms: Platform[];
  report?: string;
  strict: boolean;
};

const ALL_PLATFORMS: Platform[] = ["android", "ios"];

const flags: RuntimeFlags = {
  project: undefined,
  platforms: [...ALL_PLATFORMS],
  report: undefined,
  strict: false
};

export function parsePlatformOption(value: string | undefined): Platform[] | null {
  const clean = (value ?? "all").trim().toLowerCase();
  if (clean === "all" || clean === "") {
    return [...ALL_PLATFORMS];
  }
  if (clean === "android" || clean === "ios") {
    return [clean];
  }
  return null;
}

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("project" in next) {
    flags.project = typeof next.project === "string" ? next.project : undefined;
  }
  if ("platforms" in next) {
    flags.platforms = Array.isArray(next.platforms) && next.platforms.length > 0 ? [...next.platforms] : [...ALL_PLATFORMS];
  }
  if ("report" in next) {
    flags.report = typeof next.report === "string" ? next.report : undefined;
  }
  if ("strict" in next) {
    flags.strict = Boolean(next.strict);
  }
}

export function getFlags(): RuntimeFlags {
  return { ...flags, platforms: [...flags.platforms] };
}
