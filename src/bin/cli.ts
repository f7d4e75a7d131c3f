#!/usr/bin/env node
import { Command } from "commander";
import path from "path";
import fs from "fs";
import { readConfigFile, resolveConfigPath, sampleConfigPath } from "../config/loader";
import { SettingsManager } from "../config/settings";
import { buildNaclPlan } from "../core/planner";
import { describePlan } from "../core/plan-report";
import { ErrorHandler, ErrorLevel } from "../logging/error-handler";
import { runPulumi } from "../runner/pulumi-runner";

const program = new Command();

interface CommonOptions {
  config?: string;
  stack?: string;
}

function setup(opts: CommonOptions) {
  const settings = new SettingsManager({ configPath: opts.config, stack: opts.stack }).getConfig();
  const logger = new ErrorHandler(settings.logLevel);
  return { settings, logger };
}

async function withErrors(logger: ErrorHandler, action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.report(error);
    process.exitCode = 1;
  }
}

program
  .name("nacl")
  .description("Declarative AWS network ACL and rule management")
  .version("1.0.0");

program
  .command("config:init")
  .description("Create a starter config")
  .option("-o, --output <path>", "Output path", "./nacl.yaml")
  .action((opts: { output: string }) => {
    const { logger } = setup({});
    return withErrors(logger, () => {
      const out = path.resolve(opts.output);
      fs.copyFileSync(sampleConfigPath(), out);
      logger.log(ErrorLevel.INFO, `✅ Wrote starter config to ${out}`);
    });
  });

program
  .command("validate")
  .description("Validate configuration against schema")
  .option("-c, --config <path>", "Path to config file")
  .action((opts: CommonOptions) => {
    const { settings, logger } = setup(opts);
    return withErrors(logger, () => {
      const cfg = readConfigFile(resolveConfigPath(settings.configPath));
      buildNaclPlan(cfg);
      logger.log(ErrorLevel.INFO, "✅ Configuration is valid.");
    });
  });

program
  .command("plan")
  .description("Show the normalized rules and ACL selection without calling AWS")
  .option("-c, --config <path>", "Path to config file")
  .action((opts: CommonOptions) => {
    const { settings, logger } = setup(opts);
    return withErrors(logger, () => {
      const cfg = readConfigFile(resolveConfigPath(settings.configPath));
      describePlan(buildNaclPlan(cfg)).forEach((line) => console.log(line));
    });
  });

program
  .command("deploy")
  .description("Deploy the network ACL with Pulumi")
  .option("-c, --config <path>", "Path to config file")
  .option("--preview", "Preview only", false)
  .option("--stack <name>", "Pulumi stack name")
  .action((opts: CommonOptions & { preview: boolean }) => {
    const { settings, logger } = setup(opts);
    return withErrors(logger, async () => {
      const cfg = readConfigFile(resolveConfigPath(settings.configPath));
      logger.log(ErrorLevel.INFO, `🚀 Deploying network ACL ${cfg.name} to stack: ${settings.stack}`);
      await runPulumi(cfg, settings, { preview: opts.preview, logger });
    });
  });

program
  .command("destroy")
  .description("Destroy the network ACL and its rules")
  .option("-c, --config <path>", "Path to config file")
  .option("--stack <name>", "Pulumi stack name")
  .action((opts: CommonOptions) => {
    const { settings, logger } = setup(opts);
    return withErrors(logger, async () => {
      const cfg = readConfigFile(resolveConfigPath(settings.configPath));
      await runPulumi(cfg, settings, { destroy: true, logger });
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
