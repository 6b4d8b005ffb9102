#!/usr/bin/env node
import { Command } from "commander";
import path from "path";
import fs from "fs";
import { ProvisionConfigSchema } from "../types/schemas";
import { expandHome, loadConfig } from "../config/settings";
import { errorMessage, isProvisioningError } from "../core/errors";
import { StackExports } from "../core/exports";
import { buildDependencyGraph, formatDependencyGraph } from "../core/graph";
import type { ProvisioningRun } from "../core/run";
import { createProvisioner, currentIdentity } from "../index";
import { remediationFor } from "../logging/error-handler";

const program = new Command();

/** Configuration problems exit with 2, everything else with 1. */
function fail(error: unknown): never {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(isProvisioningError(error) && error.kind === "configuration" ? 2 : 1);
}

function readConfig(configPath?: string) {
  try {
    return loadConfig(configPath);
  } catch (error) {
    fail(error);
  }
}

function printRun(run: ProvisioningRun): void {
  const report = run.report();
  console.log(report.success ? "✅ Homelab converged" : "❌ Homelab did not converge");
  console.log(`   Satisfied: ${report.succeeded.join(", ") || "none"}`);
  console.log(`   Changes: ${report.mutations}`);
  if (report.failed) {
    console.log(`   Failed: ${report.failed.id} [${report.failed.kind}] ${report.failed.message}`);
    console.log(`   💡 ${report.failed.retryable ? "Retryable: " : ""}${remediationFor(report.failed.kind)}`);
  }
  if (report.notAttempted.length > 0) {
    console.log(`   Not attempted: ${report.notAttempted.join(", ")}`);
  }
}

program
  .name("homelab-provision")
  .description("Provision a single-node k3s homelab and bootstrap GitOps")
  .version("0.3.0");

program
  .command("converge")
  .description("Install or upgrade the host and converge cluster objects")
  .option("-c, --config <path>", "Path to config file")
  .option("--outputs <path>", "Write stack outputs here instead of outputs_path")
  .option("--json", "Print the run report as JSON", false)
  .action(async (opts: { config?: string; outputs?: string; json: boolean }) => {
    const cfg = readConfig(opts.config);
    const { orchestrator, resources } = createProvisioner(cfg);

    const controller = new AbortController();
    const onInterrupt = () => {
      console.log("\n🛑 Interrupt received; stopping after the current resource...");
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    let run: ProvisioningRun;
    try {
      run = await orchestrator.converge(resources, { signal: controller.signal });
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }

    const outputsPath = path.resolve(expandHome(opts.outputs ?? cfg.outputs_path, currentIdentity().home));
    const exports = new StackExports();
    exports.merge(run.outputs);
    await exports.writeTo(outputsPath);

    if (opts.json) {
      console.log(JSON.stringify(run.report(), null, 2));
    } else {
      printRun(run);
      console.log(`📋 Outputs written to ${outputsPath}`);
    }
    if (!run.success) {
      process.exit(run.error?.kind === "configuration" ? 2 : 1);
    }
  });

program
  .command("plan")
  .description("Show what converge would change without mutating anything")
  .option("-c, --config <path>", "Path to config file")
  .option("--graph", "Print the dependency graph first", false)
  .action(async (opts: { config?: string; graph: boolean }) => {
    const cfg = readConfig(opts.config);
    const { orchestrator, resources } = createProvisioner(cfg, { lock: null });
    if (opts.graph) {
      console.log(formatDependencyGraph(buildDependencyGraph(resources)));
    }
    const entries = await orchestrator.plan(resources);

    const icons = { satisfied: "✅", install: "➕", upgrade: "🔄", create: "➕", update: "🔄", unknown: "❔" } as const;
    console.log("📋 Plan:");
    entries.forEach((entry) => {
      console.log(`   ${icons[entry.decision]} ${entry.id}: ${entry.decision}${entry.detail ? ` (${entry.detail})` : ""}`);
    });
  });

program
  .command("validate")
  .description("Validate configuration against schema")
  .option("-c, --config <path>", "Path to config file")
  .action((opts: { config?: string }) => {
    const cfg = readConfig(opts.config);
    console.log("✅ Configuration is valid.");
    console.log(`📦 k3s: ${cfg.runtime.version}`);
    console.log(`🎮 GPU toolkit: ${cfg.gpu.enabled ? cfg.gpu.toolkit_version : "disabled"}`);
    console.log(`🗂️ Namespaces: ${cfg.namespaces.map((ns) => ns.name).join(", ") || "none"}`);
    console.log(`💾 Volumes: ${cfg.storage.map((pv) => `${pv.name} (${pv.capacity})`).join(", ") || "none"}`);
    console.log(`🔁 GitOps: ${cfg.gitops.enabled ? `${cfg.gitops.version} in ${cfg.gitops.namespace}` : "disabled"}`);
  });

program
  .command("config:init")
  .description("Create a starter config")
  .option("-o, --output <path>", "Output path", "./homelab.yaml")
  .option("-f, --force", "Overwrite an existing file", false)
  .action((opts: { output: string; force: boolean }) => {
    const out = path.resolve(opts.output);
    if (fs.existsSync(out) && !opts.force) {
      fail(new Error(`${out} already exists; pass --force to overwrite`));
    }
    const sample = fs.readFileSync(path.resolve(__dirname, "../../examples/homelab.yaml"), "utf8");
    fs.writeFileSync(out, sample, "utf8");
    console.log(`✅ Wrote starter config to ${out}`);
  });

program
  .command("schema:emit")
  .description("Emit JSON Schema from Zod")
  .option("-o, --output <path>", "Output file", "./docs/config.schema.json")
  .action(async (opts: { output: string }) => {
    try {
      const { zodToJsonSchema } = await import("zod-to-json-schema");
      const schema = zodToJsonSchema(ProvisionConfigSchema, "ProvisionConfig");
      fs.mkdirSync(path.dirname(opts.output), { recursive: true });
      fs.writeFileSync(opts.output, JSON.stringify(schema, null, 2));
      console.log(`✅ Wrote JSON Schema to ${opts.output}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("outputs")
  .description("Print the outputs of the last run")
  .option("-c, --config <path>", "Path to config file")
  .action(async (opts: { config?: string }) => {
    const cfg = readConfig(opts.config);
    const file = path.resolve(expandHome(cfg.outputs_path, currentIdentity().home));
    try {
      const values = await StackExports.readFrom(file);
      Object.entries(values).forEach(([key, value]) => {
        console.log(`${key}: ${Array.isArray(value) ? value.join(", ") : value}`);
      });
    } catch (error) {
      fail(new Error(`No outputs at ${file}: ${errorMessage(error)}`));
    }
  });

program
  .command("pulumi:up")
  .description("Deploy the same graph through the Pulumi Automation API")
  .option("-c, --config <path>", "Path to config file")
  .option("--preview", "Preview only", false)
  .option("--stack <name>", "Pulumi stack name", "dev")
  .action(async (opts: { config?: string; preview: boolean; stack: string }) => {
    const cfg = readConfig(opts.config);
    const { runPulumi } = await import("../runner/pulumi-runner");
    console.log(`🚀 Deploying homelab to stack: ${opts.stack}`);
    try {
      await runPulumi(cfg, { preview: opts.preview, stack: opts.stack });
    } catch (error) {
      fail(error);
    }
  });

program
  .command("pulumi:destroy")
  .description("Destroy the Pulumi stack")
  .option("-c, --config <path>", "Path to config file")
  .option("--stack <name>", "Pulumi stack name", "dev")
  .action(async (opts: { config?: string; stack: string }) => {
    const cfg = readConfig(opts.config);
    const { runPulumi } = await import("../runner/pulumi-runner");
    try {
      await runPulumi(cfg, { destroy: true, stack: opts.stack });
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
