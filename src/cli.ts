#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import prompts from "prompts";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { createConfig, expandPath, getConfigPath, loadConfig } from "./config/index.js";
import { DeliveryUnavailableError, NoteNotFoundError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { PublishResult } from "./publish.js";
import { runSession } from "./session.js";
import { runInteractiveSetup } from "./setup/interactive.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

interface RootOptions {
  file?: string;
  config?: string;
  createConfig?: boolean;
  autoSend?: boolean;
  verbose?: boolean;
}

function printSummary(result: PublishResult): void {
  for (const delivery of result.deliveries) {
    if (delivery.status === "sent") {
      console.log(chalk.green(`✓ ${delivery.kind}`));
    } else if (delivery.status === "rejected") {
      console.log(chalk.red(`✗ ${delivery.kind} (HTTP ${delivery.httpStatus})`));
    }
  }

  if (result.archive.status === "sent") {
    console.log(chalk.green("✓ gist"));
  } else if (result.archive.status === "rejected") {
    console.log(chalk.red(`✗ gist (HTTP ${result.archive.httpStatus})`));
  }
}

async function confirmSend(): Promise<boolean> {
  const { send } = await prompts({
    type: "confirm",
    name: "send",
    message: "Send note?",
    initial: false,
  });
  return send === true;
}

const program = new Command();

program
  .name("notehook")
  .description("Write today's journal note and send it to your webhooks")
  .version(packageJson.version)
  .option("-b, --file <path>", "The note file to use (defaults to today's note)")
  .option("-c, --config <path>", "The config file to use", getConfigPath())
  .option("-C, --create-config", "Create the config file with defaults")
  .option("-a, --auto-send", "Send without asking")
  .option("-v, --verbose", "Log debug output")
  .action(async (options: RootOptions) => {
    const configPath = expandPath(options.config ?? getConfigPath());

    if (options.createConfig) {
      if (createConfig(configPath)) {
        console.log(chalk.green(`Created config: ${configPath}`));
      } else {
        console.log(chalk.yellow(`Config file already exists: ${configPath}`));
      }
      return;
    }

    const config = loadConfig(configPath);
    const logger = createLogger({
      level: options.verbose ? "debug" : "info",
      logFile: config.logFile ? expandPath(config.logFile) : undefined,
    });

    try {
      const result = await runSession(
        { config, file: options.file, autoSend: options.autoSend },
        { logger, confirmSend }
      );

      if (result.publish) {
        printSummary(result.publish);
      } else {
        console.log(chalk.dim(`Saved ${result.filePath}, not sent.`));
      }
    } catch (error) {
      if (error instanceof DeliveryUnavailableError || error instanceof NoteNotFoundError) {
        console.error(chalk.red(error.message));
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  });

program
  .command("init")
  .description("Create a config file with interactive setup")
  .option("-f, --force", "Overwrite existing configuration")
  .action(async (options: { force?: boolean }) => {
    const { config } = program.opts<RootOptions>();
    await runInteractiveSetup(expandPath(config ?? getConfigPath()), { force: options.force });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
