#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command } from "commander";
import { runCheck } from "./commands/check";
import { runDoctor } from "./commands/doctor";
import { runPlan } from "./commands/plan";
import { runReconcile } from "./commands/reconcile";
import { configPath, ensureConfig, updateConfigValue } from "./config";
import { parsePlatformOption, setFlags } from "./context/flags";
import { errorMessage, printError } from "./errors";
import { getRepoRoot } from "./paths";
import { resolveProjectRoot } from "./workspace";

const program = new Command();

function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const pkg = JSON.parse(fs.readFileSync(pkgPath, "utf-8")) as { version?: string };
    return pkg.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function projectRootOrExit(): string | null {
  try {
    return resolveProjectRoot();
  } catch (error) {
    printError("RCN-1002", errorMessage(error));
    process.exitCode = 1;
    return null;
  }
}

program
  .name("config-reconciler")
  .description("Validate and repair mobile build configuration before the build runs")
  .version(getVersion())
  .option("--project <dir>", "Project root (defaults to the current directory)")
  .option("--platform <name>", "Platforms to reconcile: android|ios|all", "all")
  .option("--report <path>", "Where to write the run report")
  .option("--strict", "Treat warn-policy failures as fatal");

program.hook("preAction", (thisCommand, actionCommand) => {
  const opts =
    typeof actionCommand.optsWithGlobals === "function" ? actionCommand.optsWithGlobals() : thisCommand.opts();
  const platforms = parsePlatformOption(typeof opts.platform === "string" ? opts.platform : undefined);
  if (!platforms) {
    printError("RCN-1002", `Invalid --platform value: ${String(opts.platform)}. Use android, ios or all.`);
    process.exit(1);
  }
  setFlags({
    project: typeof opts.project === "string" ? opts.project : undefined,
    platforms,
    report: typeof opts.report === "string" ? opts.report : undefined,
    strict: Boolean(opts.strict)
  });
});

program
  .command("reconcile")
  .description("Validate every selected artifact and repair what does not match the feature flags")
  .action(async () => {
    process.exitCode = await runReconcile();
  });

program
  .command("check")
  .description("Validate only; never writes. Exits 1 when any artifact needs reconciliation")
  .action(async () => {
    process.exitCode = await runCheck();
  });

program
  .command("plan")
  .description("Print the ordered artifacts and the keys each must satisfy")
  .action(() => {
    process.exitCode = runPlan();
  });

program
  .command("doctor")
  .description("Check the shipped catalog, templates, host tools and flag values")
  .action(() => {
    process.exitCode = runDoctor();
  });

const configCmd = program.command("config").description("Configuration commands");
configCmd
  .command("show")
  .description("Show effective config and config file path")
  .action(() => {
    const root = projectRootOrExit();
    if (!root) return;
    const config = ensureConfig(root);
    console.log(`Config file: ${configPath(root)}`);
    console.log(JSON.stringify(config, null, 2));
  });

configCmd
  .command("init")
  .description("Create config file with defaults if missing")
  .action(() => {
    const root = projectRootOrExit();
    if (!root) return;
    const config = ensureConfig(root);
    console.log(`Config ready: ${configPath(root)}`);
    console.log(`Report path: ${config.report.path}`);
  });

configCmd
  .command("set")
  .description("Set config value by key")
  .argument("<key>", "network.attempts|network.base_delay_ms|network.timeout_ms|report.path|policy.strict|toolchain.lint")
  .argument("<value>", "New value")
  .action((key: string, value: string) => {
    const root = projectRootOrExit();
    if (!root) return;
    const updated = updateConfigValue(root, key, value);
    if (!updated) {
      printError(
        "RCN-1005",
        "Invalid config key. Use network.attempts, network.base_delay_ms, network.timeout_ms, report.path, policy.strict, toolchain.lint."
      );
      process.exitCode = 1;
      return;
    }
    console.log(`Config updated: ${configPath(root)}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  printError("RCN-1002", errorMessage(error));
  process.exitCode = 1;
});
