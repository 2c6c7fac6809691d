import fs from "fs";
import path from "path";

export type ReconcilerConfig = {
  network: {
    attempts: number;
    base_delay_ms: number;
    timeout_ms: number;
  };
  report: {
    path: string;
  };
  policy: {
    strict: boolean;
  };
  toolchain: {
    lint: boolean;
  };
};

const CONFIG_FILE = "config-reconciler.yml";

export function configPath(projectRoot: string): string {
  const override = process.env.RECONCILER_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(projectRoot, CONFIG_FILE);
}

export function defaultConfig(): ReconcilerConfig {
  return {
    network: {
      attempts: 3,
      base_delay_ms: 1000,
      timeout_ms: 30000
    },
    report: {
      path: "config-reconciler-report.txt"
    },
    policy: {
      strict: false
    },
    toolchain: {
      lint: true
    }
  };
}

function clampInt(value: string, min: number, max: number): number | undefined {
  const parsed = Number.parseInt(value.trim(), 10);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return Math.min(max, Math.max(min, parsed));
}

function parseBool(value: string): boolean {
  return value.trim().toLowerCase() === "true";
}

type PartialConfig = {
  network?: Partial<ReconcilerConfig["network"]>;
  report?: Partial<ReconcilerConfig["report"]>;
  policy?: Partial<ReconcilerConfig["policy"]>;
  toolchain?: Partial<ReconcilerConfig["toolchain"]>;
};

function applyValue(result: PartialConfig, section: string, key: string, value: string): boolean {
  if (section === "network" && key === "attempts") {
    result.network = { ...result.network, attempts: clampInt(value, 1, 10) };
  } else if (section === "network" && key === "base_delay_ms") {
    result.network = { ...result.network, base_delay_ms: clampInt(value, 0, 60000) };
  } else if (section === "network" && key === "timeout_ms") {
    result.network = { ...result.network, timeout_ms: clampInt(value, 100, 600000) };
  } else if (section === "report" && key === "path") {
    result.report = { path: value.trim() };
  } else if (section === "policy" && key === "strict") {
    result.policy = { strict: parseBool(value) };
  } else if (section === "toolchain" && key === "lint") {
    result.toolchain = { lint: parseBool(value) };
  } else {
    return false;
  }
  return true;
}

export function parseSimpleYaml(raw: string): PartialConfig {
  const result: PartialConfig = {};
  let section = "";
  const lines = raw.split(/\r?\n/);
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(trimmed);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.+)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const value = valueMatch[2].replace(/^["']|["']$/g, "");
    applyValue(result, section, valueMatch[1], value);
  }
  return result;
}

function renderYaml(config: ReconcilerConfig): string {
  return [
    "# config-reconciler configuration",
    "network:",
    `  attempts: ${config.network.attempts}`,
    `  base_delay_ms: ${config.network.base_delay_ms}`,
    `  timeout_ms: ${config.network.timeout_ms}`,
    "report:",
    `  path: ${config.report.path}`,
    "policy:",
    `  strict: ${config.policy.strict ? "true" : "false"}`,
    "toolchain:",
    `  lint: ${config.toolchain.lint ? "true" : "false"}`,
    ""
  ].join("\n");
}

export function mergeConfig(base: ReconcilerConfig, input: PartialConfig): ReconcilerConfig {
  return {
    network: {
      attempts: input.network?.attempts ?? base.network.attempts,
      base_delay_ms: input.network?.base_delay_ms ?? base.network.base_delay_ms,
      timeout_ms: input.network?.timeout_ms ?? base.network.timeout_ms
    },
    report: {
      path: input.report?.path ? input.report.path : base.report.path
    },
    policy: {
      strict: typeof input.policy?.strict === "boolean" ? input.policy.strict : base.policy.strict
    },
    toolchain: {
      lint: typeof input.toolchain?.lint === "boolean" ? input.toolchain.lint : base.toolchain.lint
    }
  };
}

export function loadConfig(projectRoot: string): ReconcilerConfig {
  const defaults = defaultConfig();
  const file = configPath(projectRoot);
  if (!fs.existsSync(file)) {
    return defaults;
  }
  try {
    const raw = fs.readFileSync(file, "utf-8");
    return mergeConfig(defaults, parseSimpleYaml(raw));
  } catch {
    return defaults;
  }
}

export function saveConfig(projectRoot: string, config: ReconcilerConfig): string {
  const file = configPath(projectRoot);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(config), "utf-8");
  return file;
}

export function ensureConfig(projectRoot: string): ReconcilerConfig {
  const existing = loadConfig(projectRoot);
  if (!fs.existsSync(configPath(projectRoot))) {
    saveConfig(projectRoot, existing);
  }
  return existing;
}

export function updateConfigValue(projectRoot: string, key: string, value: string): ReconcilerConfig | null {
  const current = loadConfig(projectRoot);
  const [section, name] = key.trim().toLowerCase().split(".");
  if (!section || !name) {
    return null;
  }
  const patch: PartialConfig = {};
  if (!applyValue(patch, section, name, value)) {
    return null;
  }
  const next = mergeConfig(current, patch);
  saveConfig(projectRoot, next);
  return next;
}
