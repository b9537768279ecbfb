#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev -- gen feature auth`
 * - `npm run dev -- gen screen login --plan`
 * - `npm run dev -- gen repository user_profile --out ./playground`
 * - `npm run dev -- config init`
 * - `npm run dev -- config --state bloc`
 */
import process from "node:process";
import chalk from "chalk";
import prompts from "prompts";
import { ZodError } from "zod";
import { parseArgs, type CliCommand } from "./cli/args.js";
import { GEN_USAGE, USAGE, printFailure, printGenerated, printPlan, printValidationErrors, versionLine } from "./cli/ui/report.js";
import { ConfigError, initConfig, loadConfig, setStateManager } from "./config/loadConfig.js";
import { generate } from "./generator/operations.js";

const confirmOverwrite = async (configPath: string): Promise<boolean> => {
  console.log(chalk.yellow(`Config file already exists at ${configPath}`));
  const answer = await prompts({
    type: "confirm",
    name: "overwrite",
    message: "Do you want to overwrite it?",
    initial: false
  });
  return answer.overwrite === true;
};

const runGenerate = async (command: Extract<CliCommand, { kind: "generate" }>): Promise<void> => {
  const cwd = process.cwd();
  const config = await loadConfig(cwd);
  console.log(`Generating ${command.operation}: ${command.name}`);

  const result = await generate(command.operation, command.name, config, {
    rootDir: command.outDir ?? cwd,
    apply: !command.plan
  });

  if (!result.ok) {
    printFailure(result);
    process.exitCode = 1;
    return;
  }

  if (command.plan) {
    printPlan(result.plan);
    return;
  }
  printGenerated(result);
};

const runConfigInit = async (yes: boolean): Promise<void> => {
  const result = await initConfig(process.cwd(), {
    confirmOverwrite: yes ? async () => true : confirmOverwrite
  });

  if (!result.written) {
    console.log("Config initialization cancelled.");
    return;
  }
  console.log(chalk.green(`Created ${result.path}`));
  console.log("You can now edit this file to customize your preferences.");
};

const runConfigState = async (manager: string): Promise<void> => {
  const next = await setStateManager(manager, process.cwd());
  console.log(chalk.green(`State manager set to: ${next.defaultStateManager}`));
};

const run = async (command: CliCommand): Promise<void> => {
  switch (command.kind) {
    case "help":
      console.log(USAGE);
      return;
    case "version":
      console.log(versionLine());
      return;
    case "generate":
      await runGenerate(command);
      return;
    case "config-init":
      await runConfigInit(command.yes);
      return;
    case "config-state":
      await runConfigState(command.manager);
      return;
    case "invalid":
      console.error(chalk.red(`Error: ${command.message}`));
      console.error(command.showGenHelp ? GEN_USAGE : USAGE);
      process.exitCode = 1;
      return;
  }
};

const main = async (): Promise<void> => {
  try {
    await run(parseArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof ZodError) {
      printValidationErrors(error);
      process.exitCode = 1;
      return;
    }

    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exitCode = 1;
      return;
    }

    if (error instanceof Error) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }

    console.error("Unknown error");
    process.exitCode = 2;
  }
};

void main();
