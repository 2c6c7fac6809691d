import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { ArtifactStore } from "../../store/artifact-store";
import type { FailurePolicy, ReconciliationResult } from "../../types";
import { buildRunReport, describeResult, formatReport, isFatal, writeReport } from "../summary";

const WARN: FailurePolicy = { kind: "warn", consequence: "the launcher icon keeps its previous image" };
const ABORT: FailurePolicy = { kind: "abort" };

function result(overrides: Partial<ReconciliationResult> & Pick<ReconciliationResult, "artifactId">): ReconciliationResult {
  return {
    path: `${overrides.artifactId}.txt`,
    outcome: "valid",
    valid: true,
    repaired: false,
    backupCreated: null,
    strategy: null,
    errors: [],
    failure: null,
    policy: ABORT,
    transitions: ["unchecked", "validating", "valid", "reported"],
    ...overrides
  };
}

const valid = result({ artifactId: "env-config" });
const repaired = result({
  artifactId: "ios-info-plist",
  outcome: "reconciled",
  repaired: true,
  strategy: "template",
  backupCreated: "/p/ios/Runner/Info.plist.backup.20240601_120000"
});
const iconTimeout = result({
  artifactId: "android-icon-mdpi",
  outcome: "failed",
  valid: false,
  policy: WARN,
  errors: ["missing", "Download failed after 3 attempts: timed out after 30000ms"],
  failure: { kind: "acquisition" }
});
const missingFlag = result({
  artifactId: "ios-icon-1024x1024-1x",
  outcome: "failed",
  valid: false,
  policy: ABORT,
  errors: ["missing", "Template for ios-icon-1024x1024-1x is invalid: no data"],
  failure: { kind: "requirement-unsatisfiable", flag: "LOGO_URL" }
});

describe("buildRunReport", () => {
  it("passes with warnings when only warn-policy artifacts fail", () => {
    const report = buildRunReport([valid, repaired, iconTimeout], { strict: false });
    expect(report.exitCode).toBe(0);
    expect(report.fatal).toEqual([]);
    expect(report.firstFatalReason).toBeNull();
    expect(report.warnings).toEqual(["android-icon-mdpi: the launcher icon keeps its previous image"]);
  });

  it("fails on the first abort-policy failure and names the missing flag", () => {
    const report = buildRunReport([iconTimeout, missingFlag], { strict: false });
    expect(report.exitCode).toBe(1);
    expect(report.fatal).toEqual([missingFlag]);
    expect(report.firstFatalReason).toBe(
      "ios-icon-1024x1024-1x: Template for ios-icon-1024x1024-1x is invalid: no data (missing flag LOGO_URL)"
    );
  });

  it("treats warn failures as fatal in strict mode", () => {
    expect(isFatal(iconTimeout, { strict: true })).toBe(true);
    const report = buildRunReport([valid, iconTimeout], { strict: true });
    expect(report.exitCode).toBe(1);
    expect(report.warnings).toEqual([]);
    expect(report.firstFatalReason).toBe(
      "android-icon-mdpi: Download failed after 3 attempts: timed out after 30000ms"
    );
  });
});

describe("formatReport", () => {
  it("renders one line per artifact, details, warnings and the first fatal reason", () => {
    const options = { strict: false, generatedAt: new Date(Date.UTC(2024, 5, 1, 12, 0, 0)) };
    const report = buildRunReport([valid, repaired, iconTimeout, missingFlag], options);
    expect(formatReport(report, options)).toBe(
      [
        "Configuration reconciliation report",
        "Generated: 2024-06-01T12:00:00.000Z",
        "Result: FAIL (exit 1)",
        "",
        "[ok]       env-config: valid",
        "[repaired] ios-info-plist: repaired (template), backup /p/ios/Runner/Info.plist.backup.20240601_120000",
        "[failed]   android-icon-mdpi: failed (warn): Download failed after 3 attempts: timed out after 30000ms",
        "[failed]   ios-icon-1024x1024-1x: failed (fatal): Template for ios-icon-1024x1024-1x is invalid: no data (missing flag LOGO_URL)",
        "",
        "Details:",
        "- android-icon-mdpi: missing",
        "- android-icon-mdpi: Download failed after 3 attempts: timed out after 30000ms",
        "- ios-icon-1024x1024-1x: missing",
        "- ios-icon-1024x1024-1x: Template for ios-icon-1024x1024-1x is invalid: no data",
        "",
        "Warnings:",
        "- android-icon-mdpi: the launcher icon keeps its previous image",
        "",
        "FIRST FATAL: ios-icon-1024x1024-1x: Template for ios-icon-1024x1024-1x is invalid: no data (missing flag LOGO_URL)",
        ""
      ].join("\n")
    );
  });

  it("does not repeat a flag the message already names", () => {
    const unsatisfied = result({
      artifactId: "env-config",
      outcome: "failed",
      valid: false,
      errors: ["Required flag APP_NAME is not set (needed by env-config)."],
      failure: { kind: "requirement-unsatisfiable", flag: "APP_NAME" }
    });
    expect(describeResult(unsatisfied, { strict: false })).toBe(
      "[failed]   env-config: failed (fatal): Required flag APP_NAME is not set (needed by env-config)."
    );
  });
});

describe("writeReport", () => {
  it("writes the report through the store", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "reconciler-report-"));
    try {
      const target = path.join(dir, "out", "report.txt");
      writeReport(new ArtifactStore(), target, "Result: PASS\n");
      expect(fs.readFileSync(target, "utf-8")).toBe("Result: PASS\n");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
