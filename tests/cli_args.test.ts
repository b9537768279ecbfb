import { describe, expect, test } from "vitest";
import { parseArgs } from "../src/cli/args.js";
import { formatPlanLines, summarizePlan } from "../src/cli/ui/report.js";
import type { Plan } from "../src/generator/types.js";

describe("parseArgs", () => {
  test("parses gen commands", () => {
    expect(parseArgs(["gen", "feature", "auth"])).toEqual({
      kind: "generate",
      operation: "feature",
      name: "auth",
      outDir: undefined,
      plan: false
    });
    expect(parseArgs(["gen", "screen", "login", "--out", "app", "--plan"])).toEqual({
      kind: "generate",
      operation: "screen",
      name: "login",
      outDir: "app",
      plan: true
    });
  });

  test("reports missing names and unknown subcommands", () => {
    expect(parseArgs(["gen", "feature"])).toEqual({ kind: "invalid", message: "feature requires a name" });
    expect(parseArgs(["gen"])).toEqual({ kind: "invalid", message: "gen command requires a subcommand", showGenHelp: true });
    expect(parseArgs(["gen", "widget", "card"])).toEqual({
      kind: "invalid",
      message: "Unknown gen subcommand: widget",
      showGenHelp: true
    });
  });

  test("parses config commands", () => {
    expect(parseArgs(["config", "init"])).toEqual({ kind: "config-init", yes: false });
    expect(parseArgs(["config", "init", "--yes"])).toEqual({ kind: "config-init", yes: true });
    expect(parseArgs(["config", "--state", "bloc"])).toEqual({ kind: "config-state", manager: "bloc" });
    expect(parseArgs(["config", "--state"])).toEqual({ kind: "invalid", message: "--state requires a value (getx or bloc)" });
    expect(parseArgs(["config", "reset"])).toEqual({ kind: "invalid", message: "Unknown config subcommand: reset" });
  });

  test("falls back to help, version and unknown commands", () => {
    expect(parseArgs([])).toEqual({ kind: "help" });
    expect(parseArgs(["gen", "feature", "auth", "-h"])).toEqual({ kind: "help" });
    expect(parseArgs(["--version"])).toEqual({ kind: "version" });
    expect(parseArgs(["deploy"])).toEqual({ kind: "invalid", message: "Unknown command: deploy" });
  });
});

describe("plan report", () => {
  const plan: Plan = {
    operation: "model",
    entityName: "user",
    rootDir: "/work",
    actions: [
      { type: "SKIP", path: "lib/shared/models", entryType: "dir", reason: "directory exists" },
      { type: "OVERWRITE", path: "lib/shared/models/user_model.dart", entryType: "file", reason: "unchanged", content: "" }
    ]
  };

  test("counts actions by type", () => {
    expect(summarizePlan(plan)).toEqual({ CREATE: 0, OVERWRITE: 1, SKIP: 1 });
  });

  test("formats one line per action", () => {
    expect(formatPlanLines(plan)).toEqual([
      "Plan for: /work",
      "SKIP      lib/shared/models (directory exists)",
      "OVERWRITE lib/shared/models/user_model.dart (unchanged)",
      "Plan summary: create=0, overwrite=1, skip=1"
    ]);
  });
});
