#!/usr/bin/env node

import dotenv from "dotenv";

dotenv.config();

import { Command } from "commander";
import { initCommand, runCommand } from "./commands/index.js";

const program = new Command();

program
    .name("meshstep")
    .description("Lockstep multi-agent coordination over composite network simulators")
    .version("0.1.0");

program
    .command("init")
    .description("Write a sample meshstep.config.json in the current directory")
    .option("-y, --yes", "Skip confirmation prompts")
    .action(initCommand);

program
    .command("run")
    .description("Run the orchestration described by a configuration file")
    .requiredOption("-c, --config <path>", "Path to the configuration JSON file")
    .option("--max-steps <number>", "Override max_steps for this run")
    .option("--seed <number>", "Override the run seed")
    .option("--db <path>", "Persist telemetry to this SQLite file")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(runCommand);

await program.parseAsync(process.argv);
