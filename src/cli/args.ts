import type { Operation } from "../generator/types.js";

export const VERSION = "1.0.0";

const OPERATIONS: readonly Operation[] = ["feature", "screen", "model", "usecase", "repository"];

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "generate"; operation: Operation; name: string; outDir?: string; plan: boolean }
  | { kind: "config-init"; yes: boolean }
  | { kind: "config-state"; manager: string }
  | { kind: "invalid"; message: string; showGenHelp?: boolean };

const isOperation = (value: string): value is Operation => OPERATIONS.some((operation) => operation === value);

export const parseArgs = (argv: string[]): CliCommand => {
  const positionals: string[] = [];
  let help = false;
  let version = false;
  let plan = false;
  let yes = false;
  let outDir: string | undefined;
  let state: string | undefined;
  let stateFlag = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--out") {
      outDir = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--state") {
      stateFlag = true;
      state = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      help = true;
      continue;
    }
    if (arg === "-v" || arg === "--version") {
      version = true;
      continue;
    }
    if (arg === "--plan") {
      plan = true;
      continue;
    }
    if (arg === "-y" || arg === "--yes") {
      yes = true;
      continue;
    }

    positionals.push(arg);
  }

  if (help) return { kind: "help" };
  if (version) return { kind: "version" };

  const command: string | undefined = positionals[0];
  const subCommand: string | undefined = positionals[1];
  const name: string | undefined = positionals[2];
  if (!command) return { kind: "help" };

  if (command === "gen") {
    if (!subCommand) {
      return { kind: "invalid", message: "gen command requires a subcommand", showGenHelp: true };
    }
    if (!isOperation(subCommand)) {
      return { kind: "invalid", message: `Unknown gen subcommand: ${subCommand}`, showGenHelp: true };
    }
    if (name === undefined) {
      return { kind: "invalid", message: `${subCommand} requires a name` };
    }
    return { kind: "generate", operation: subCommand, name, outDir, plan };
  }

  if (command === "config") {
    if (stateFlag) {
      if (!state) {
        return { kind: "invalid", message: "--state requires a value (getx or bloc)" };
      }
      return { kind: "config-state", manager: state };
    }
    if (subCommand === "init") {
      return { kind: "config-init", yes };
    }
    if (!subCommand) {
      return { kind: "invalid", message: "config command requires a subcommand or flag" };
    }
    return { kind: "invalid", message: `Unknown config subcommand: ${subCommand}` };
  }

  return { kind: "invalid", message: `Unknown command: ${command}` };
};
