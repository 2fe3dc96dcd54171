#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("rtmbot")
  .description("Slack real-time messaging bot engine")
  .version(APP_VERSION);

program
  .command("start")
  .description("Connect to Slack and run the bundled example bot")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { startRuntime } = await import("./commands/start");
    await startRuntime(options);
  });

const configCmd = program.command("config").description("Inspect configuration");

configCmd
  .command("validate")
  .description("Validate the configuration file")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { validateConfig } = await import("./commands/config");
    validateConfig(options.config);
  });

await program.parseAsync(process.argv);
