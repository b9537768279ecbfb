import boxen from "boxen";
import chalk from "chalk";
import type { ZodError } from "zod";
import type { GenerateResult, Plan, PlanActionType } from "../../generator/types.js";
import { VERSION } from "../args.js";

export const USAGE = `stratagen - layered Flutter feature generator

Usage: stratagen <command> [arguments]

Available commands:
  gen feature <name>        Generate a full data / domain / presentation feature
  gen screen <name>         Generate a standalone screen (page + controller/bloc + binding)
  gen model <name>          Generate a model class in lib/shared/models
  gen usecase <name>        Generate a use case class in lib/shared/usecases
  gen repository <name>     Generate a repository interface and implementation
  config init               Write a .stratagenrc.json with the default settings
  config --state <manager>  Set the state manager (getx or bloc)

Options:
  --out <dir>               Output root for generated files (default: current directory)
  --plan                    Print what would be written without touching the disk
  -y, --yes                 Overwrite an existing config on "config init" without asking
  -h, --help                Show this help message
  -v, --version             Show version information

Examples:
  stratagen gen feature auth
  stratagen gen screen login --plan
  stratagen gen model user_profile
  stratagen config --state bloc`;

export const GEN_USAGE = `Available gen subcommands:
  feature <name>     Generate a full data / domain / presentation feature
  screen <name>      Generate a standalone screen
  model <name>       Generate a model class
  usecase <name>     Generate a use case class
  repository <name>  Generate repository interface and implementation`;

export const versionLine = (): string => `stratagen version ${VERSION}`;

export const summarizePlan = (plan: Plan): Record<PlanActionType, number> => {
  const counts: Record<PlanActionType, number> = { CREATE: 0, OVERWRITE: 0, SKIP: 0 };
  plan.actions.forEach((action) => {
    counts[action.type] += 1;
  });
  return counts;
};

export const formatPlanLines = (plan: Plan): string[] => {
  const counts = summarizePlan(plan);
  return [
    `Plan for: ${plan.rootDir}`,
    ...plan.actions.map((action) => `${action.type.padEnd(9)} ${action.path} (${action.reason})`),
    `Plan summary: create=${counts.CREATE}, overwrite=${counts.OVERWRITE}, skip=${counts.SKIP}`
  ];
};

export const printPlan = (plan: Plan): void => {
  formatPlanLines(plan).forEach((line) => console.log(line));
  console.log(chalk.dim("Dry run: no files written. Drop --plan to write them."));
};

export const printGenerated = (result: Extract<GenerateResult, { ok: true }>): void => {
  const body = [
    `${chalk.bold("Operation")}: ${result.operation}`,
    `${chalk.bold("Name")}: ${result.entityName}`,
    `${chalk.bold("Files")}: ${result.paths.length}`
  ].join("\n");

  console.log(
    boxen(body, {
      borderColor: "green",
      padding: { left: 1, right: 1, top: 0, bottom: 0 },
      title: "Generated",
      titleAlignment: "left"
    })
  );
  result.paths.forEach((path) => console.log(`  ${chalk.green("+")} ${path}`));

  if (result.operation === "model" || result.operation === "usecase" || result.operation === "repository") {
    console.log(chalk.dim(`Note: generated in the shared folder. For feature-scoped files use "stratagen gen feature <name>".`));
  }
};

export const printFailure = (result: Extract<GenerateResult, { ok: false }>): void => {
  console.error(chalk.red(`Error generating ${result.operation}: ${result.error.message}`));
  if (result.error.detail) {
    console.error(chalk.red(`  ${result.error.detail}`));
  }
};

export const printValidationErrors = (error: ZodError): void => {
  console.error(chalk.red("Config validation failed:"));
  error.issues.forEach((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    console.error(`- ${path}: ${issue.message}`);
  });
};
