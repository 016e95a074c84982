#!/usr/bin/env node
import process from "node:process";
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { AggregationError } from "./errors.js";
import { logger, setLogFile, setLogLevel } from "./logger.js";
import { DEFAULT_OUTPUT_DIR, runAggregation } from "./run.js";
import { addSourceToConfig } from "./sourceIndex.js";

interface RunCommandOptions {
  config?: string;
  output: string;
  source: string[];
  debug: boolean;
  logFile?: string;
}

interface AddSourceCommandOptions {
  config: string;
}

const DEFAULT_CONFIG_PATH = "config/config.txt";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function main() {
  const program = new Command();
  program
    .name("sub-aggregator")
    .description("Merge proxy node lists from many sources into one base64 subscription")
    .version("0.1.0");

  program
    .command("run", { isDefault: true })
    .option("-c, --config <path>", "Config file (defaults to config/config.txt or config.txt)", process.env.SUB_AGGREGATOR_CONFIG)
    .option("-o, --output <dir>", "Output directory", process.env.SUB_AGGREGATOR_OUTPUT ?? DEFAULT_OUTPUT_DIR)
    .option("-s, --source <url>", "Extra source URL (repeatable)", collect, [])
    .option("--debug", "Enable debug logging", false)
    .option("--log-file <path>", "Also append log lines to this file", process.env.LOG_FILE)
    .action(async (opts: RunCommandOptions) => {
      if (opts.debug) {
        setLogLevel("debug");
      }
      setLogFile(opts.logFile);
      logger.info("Subscription aggregator starting", { output: opts.output });
      try {
        const config = await loadConfig({ configPath: opts.config, extraSources: opts.source });
        await runAggregation(config, { outputDir: opts.output });
      } catch (error) {
        if (error instanceof AggregationError) {
          logger.error("Run failed", { code: error.code, error: error.message });
          process.exitCode = 1;
          return;
        }
        throw error;
      }
    });

  program
    .command("add-source")
    .argument("<url>", "Source URL to register")
    .option("-c, --config <path>", "Config file to append to", process.env.SUB_AGGREGATOR_CONFIG ?? DEFAULT_CONFIG_PATH)
    .action(async (url: string, opts: AddSourceCommandOptions) => {
      try {
        const result = await addSourceToConfig({ configPath: opts.config, url });
        if (result.added) {
          logger.info("Source added", { url: result.url, config: result.configPath });
        } else {
          logger.info("Source already configured", { url: result.url, config: result.configPath });
        }
      } catch (error) {
        logger.error("Failed to add source", { error: error instanceof Error ? error.message : String(error) });
        process.exitCode = 1;
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  logger.error("Fatal error", { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
