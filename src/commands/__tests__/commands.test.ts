import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { loadCatalog } from "../../catalog";
import { parseFeatureFlags } from "../../catalog/feature-flags";
import { setFlags } from "../../context/flags";
import { resolvePlan } from "../../resolver";
import { runCheck } from "../check";
import { runDoctor } from "../doctor";
import { formatPlan, runPlan } from "../plan";
import { runReconcile } from "../reconcile";

const ENV = { APP_NAME: "Demo", PKG_NAME: "com.example.demo" };

describe("commands", () => {
  let root: string;
  let logSpy: MockInstance<typeof console.log>;
  const previousConfigPath = process.env.RECONCILER_CONFIG_PATH;

  function lines(): string[] {
    return logSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    delete process.env.RECONCILER_CONFIG_PATH;
    root = fs.mkdtempSync(path.join(os.tmpdir(), "reconciler-cmd-"));
    setFlags({ project: root, platforms: ["android"], report: undefined, strict: false });
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    setFlags({ project: undefined, platforms: ["android", "ios"], report: undefined, strict: false });
    if (previousConfigPath !== undefined) {
      process.env.RECONCILER_CONFIG_PATH = previousConfigPath;
    }
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe("plan", () => {
    it("prints the ordered artifacts for the selected platform", () => {
      expect(runPlan(ENV)).toBe(0);
      const output = lines();
      expect(output[0]).toBe(`Plan for ${root} (android): 7 artifact(s)`);
      expect(output).toContain("1. env-config [generated-source, abort] lib/config/env_config.dart");
      expect(output).toContain("2. android-manifest [android-manifest, abort] android/app/src/main/AndroidManifest.xml");
      expect(output).toContain("3. android-icon-mdpi [png, warn] android/app/src/main/res/mipmap-mdpi/ic_launcher.png");
    });

    it("marks artifacts whose flags are missing", () => {
      const catalog = loadCatalog();
      const flags = parseFeatureFlags({ PKG_NAME: "com.example.demo" }, catalog.flags).flags;
      const formatted = formatPlan(resolvePlan(catalog, flags, { platforms: ["android"] }));
      expect(formatted.slice(0, 3)).toEqual([
        "1. env-config [generated-source, abort] lib/config/env_config.dart",
        "   rules: env-identity, env-identity-android, env-feature-constants",
        "   unsatisfiable: flag APP_NAME is not set"
      ]);
    });
  });

  describe("check", () => {
    it("fails without writing anything when artifacts are missing", async () => {
      expect(await runCheck({ env: ENV })).toBe(1);
      expect(lines()).toContain("[RCN-2002] 7 of 7 artifact(s) need reconciliation.");
      expect(fs.readdirSync(root)).toEqual([]);
    });
  });

  describe("reconcile", () => {
    it("repairs what it can, warns for icons and writes the report", async () => {
      expect(await runReconcile({ env: ENV })).toBe(0);
      const output = lines();
      expect(output[0]).toBe(`Reconciling 7 artifact(s) in ${root}`);
      expect(output).toContain("[repaired] env-config: repaired (template)");
      expect(output).toContain("Warning: android-icon-mdpi: the launcher icon keeps its previous image");
      const reportPath = path.join(root, "config-reconciler-report.txt");
      expect(output).toContain(`Report: ${reportPath}`);
      expect(fs.readFileSync(reportPath, "utf-8").split("\n")[2]).toBe("Result: PASS (exit 0)");
      expect(fs.existsSync(path.join(root, ".config-reconciler.lock"))).toBe(false);

      logSpy.mockClear();
      expect(await runCheck({ env: ENV })).toBe(1);
      expect(lines()).toContain("[ok]       env-config: valid");
      expect(lines()).toContain("[RCN-2002] 5 of 7 artifact(s) need reconciliation.");
    });

    it("stops the build in strict mode", async () => {
      setFlags({ strict: true, report: "out/report.txt" });
      expect(await runReconcile({ env: ENV })).toBe(1);
      expect(lines()).toContain(
        "[RCN-2001] Build must stop. android-icon-mdpi: Required flag LOGO_URL is not set (needed by android-icon-mdpi)."
      );
      expect(fs.existsSync(path.join(root, "out", "report.txt"))).toBe(true);
    });

    it("rejects a project root that does not exist", async () => {
      const missing = path.join(root, "missing");
      setFlags({ project: missing });
      expect(await runReconcile({ env: ENV })).toBe(1);
      expect(lines()).toEqual([`[RCN-1002] Project root does not exist: ${missing}`]);
    });
  });

  describe("doctor", () => {
    it("passes on the shipped catalog and templates", () => {
      expect(runDoctor({ env: {}, probe: () => false })).toBe(0);
      expect(lines()).toEqual([
        "Catalog: 55 flags, 29 artifacts, 36 rules",
        "plutil: not found (plist lint skipped)",
        "Catalog, templates and flags are valid."
      ]);
    });

    it("counts flag values that cannot be coerced", () => {
      expect(runDoctor({ env: { IS_CAMERA: "maybe" }, probe: () => true })).toBe(1);
      expect(lines()).toEqual([
        "Catalog: 55 flags, 29 artifacts, 36 rules",
        '[RCN-1101] Flag IS_CAMERA: expected a boolean, got "maybe"',
        "plutil: available (plist lint enabled)",
        "[RCN-1004] Doctor found 1 problem(s)."
      ]);
    });
  });
});
