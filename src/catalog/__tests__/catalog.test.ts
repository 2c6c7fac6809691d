import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CatalogError, DependencyCycleError } from "../../errors";
import type { Catalog } from "../../types";
import { catalogProblems, loadCatalog } from "../index";

function writeTables(dir: string, tables: { flags: unknown[]; artifacts: unknown[]; rules: unknown[] }): void {
  fs.writeFileSync(path.join(dir, "flag-index.json"), JSON.stringify({ flags: tables.flags }));
  fs.writeFileSync(path.join(dir, "artifact-index.json"), JSON.stringify({ artifacts: tables.artifacts }));
  fs.writeFileSync(path.join(dir, "requirement-index.json"), JSON.stringify({ rules: tables.rules }));
}

describe("loadCatalog", () => {
  it("loads the shipped tables", () => {
    const catalog = loadCatalog();
    expect(catalog.flags).toHaveLength(55);
    expect(catalog.artifacts).toHaveLength(29);
    expect(catalog.rules).toHaveLength(36);
    expect(catalog.artifacts[0].id).toBe("env-config");
    expect(catalog.artifacts.find((artifact) => artifact.id === "ios-entitlements")?.requiredKeys).toEqual([]);
  });

  describe("with synthetic tables", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "reconciler-catalog-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    const artifact = (id: string, dependsOn: string[]) => ({
      id,
      path: `${id}.json`,
      format: "json",
      platform: "shared",
      policy: { kind: "abort" },
      dependsOn,
      requiredKeys: [{ path: "/id", value: id }]
    });

    it("detects dependency cycles and names the loop", () => {
      writeTables(dir, {
        flags: [],
        artifacts: [artifact("a", ["b"]), artifact("b", ["a"]), artifact("c", [])],
        rules: []
      });
      let caught: unknown;
      try {
        loadCatalog(dir);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(DependencyCycleError);
      expect(caught instanceof DependencyCycleError ? caught.cycle : []).toEqual(["a", "b", "a"]);
    });

    it("rejects tables that do not match their schema", () => {
      writeTables(dir, {
        flags: [{ name: "APP_NAME", type: "text" }],
        artifacts: [],
        rules: []
      });
      expect(() => loadCatalog(dir)).toThrow(CatalogError);
      expect(() => loadCatalog(dir)).toThrow("flag-index.json does not match flag-index.schema.json");
    });

    it("reports unreadable tables", () => {
      writeTables(dir, { flags: [], artifacts: [], rules: [] });
      fs.writeFileSync(path.join(dir, "artifact-index.json"), "{");
      expect(() => loadCatalog(dir)).toThrow(/^Cannot read artifact-index\.json: /);
    });
  });
});

describe("catalogProblems", () => {
  it("cross-checks references the schemas cannot express", () => {
    const catalog: Catalog = {
      flags: [
        { name: "APP_NAME", type: "string" },
        { name: "APP_NAME", type: "string" }
      ],
      artifacts: [
        {
          id: "icon",
          path: "icon.png",
          format: "png",
          platform: "ios",
          policy: { kind: "abort" },
          dependsOn: ["catalog"],
          template: "missing-template.png",
          requiredKeys: [{ path: "width", value: "{{ICON_SIZE}}" }]
        }
      ],
      rules: [
        {
          id: "label",
          category: "cosmetic",
          artifact: "icon",
          platform: "android",
          when: [{ flag: "IS_DARK", equals: true }],
          keys: []
        },
        { id: "ghost", category: "identity", artifact: "nowhere", when: [], keys: [] }
      ]
    };

    expect(catalogProblems(catalog)).toEqual([
      "Duplicate flag: APP_NAME",
      "Artifact icon depends on unknown artifact catalog",
      "Artifact icon names missing template missing-template.png",
      "Image artifact icon needs a source",
      "Artifact icon: key width references undefined flag ICON_SIZE",
      "Rule label is for android but icon is ios",
      "Rule label tests undefined flag IS_DARK",
      "Rule ghost targets unknown artifact nowhere"
    ]);
  });
});
