import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { configPath, defaultConfig, ensureConfig, loadConfig, mergeConfig, parseSimpleYaml, updateConfigValue } from "..";

describe("parseSimpleYaml", () => {
  it("reads known keys per section and clamps numbers", () => {
    const parsed = parseSimpleYaml(
      [
        "# comment",
        "network:",
        "  attempts: 40",
        "  base_delay_ms: 250",
        "  timeout_ms: \"5000\"",
        "report:",
        "  path: out/report.txt",
        "policy:",
        "  strict: TRUE",
        "toolchain:",
        "  lint: no",
        "unknown:",
        "  anything: 1"
      ].join("\n")
    );
    expect(parsed).toEqual({
      network: { attempts: 10, base_delay_ms: 250, timeout_ms: 5000 },
      report: { path: "out/report.txt" },
      policy: { strict: true },
      toolchain: { lint: false }
    });
  });

  it("ignores values outside a section", () => {
    expect(parseSimpleYaml("attempts: 2\n")).toEqual({});
  });
});

describe("mergeConfig", () => {
  it("keeps defaults for anything not given", () => {
    const merged = mergeConfig(defaultConfig(), { network: { timeout_ms: 100 } });
    expect(merged.network).toEqual({ attempts: 3, base_delay_ms: 1000, timeout_ms: 100 });
    expect(merged.report.path).toBe("config-reconciler-report.txt");
    expect(merged.toolchain.lint).toBe(true);
  });
});

describe("config file", () => {
  let dir: string;
  const previous = process.env.RECONCILER_CONFIG_PATH;

  beforeEach(() => {
    delete process.env.RECONCILER_CONFIG_PATH;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reconciler-config-"));
  });

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.RECONCILER_CONFIG_PATH;
    } else {
      process.env.RECONCILER_CONFIG_PATH = previous;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when no file exists and ensureConfig writes one", () => {
    expect(loadConfig(dir)).toEqual(defaultConfig());
    ensureConfig(dir);
    const written = fs.readFileSync(path.join(dir, "config-reconciler.yml"), "utf-8");
    expect(written).toContain("  attempts: 3\n");
    expect(loadConfig(dir)).toEqual(defaultConfig());
  });

  it("updates a single key and keeps the rest", () => {
    const updated = updateConfigValue(dir, "Network.Attempts", "5");
    expect(updated?.network.attempts).toBe(5);
    expect(loadConfig(dir).network).toEqual({ attempts: 5, base_delay_ms: 1000, timeout_ms: 30000 });
  });

  it("rejects unknown keys without writing", () => {
    expect(updateConfigValue(dir, "network.retries", "5")).toBeNull();
    expect(updateConfigValue(dir, "strict", "true")).toBeNull();
    expect(fs.existsSync(configPath(dir))).toBe(false);
  });

  it("honors RECONCILER_CONFIG_PATH", () => {
    const override = path.join(dir, "ci", "reconciler.yml");
    process.env.RECONCILER_CONFIG_PATH = override;
    expect(configPath(dir)).toBe(override);
    updateConfigValue(dir, "policy.strict", "true");
    expect(fs.readFileSync(override, "utf-8")).toContain("  strict: true\n");
  });
});
