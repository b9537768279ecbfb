import { isAbsolute, resolve } from "node:path";
import type { Configuration } from "../config/schema.js";
import { createRenderContext } from "./context.js";
import { buildFileSet } from "./layout.js";
import { buildActionsForFileSet } from "./planUtils.js";
import type { Operation, Plan } from "./types.js";

export const resolveRootDir = (rootDir: string): string =>
  isAbsolute(rootDir) ? rootDir : resolve(process.cwd(), rootDir);

export const buildPlan = (operation: Operation, entityName: string, config: Configuration, rootDir: string): Plan => {
  const resolvedRoot = resolveRootDir(rootDir);
  const fileSet = buildFileSet(operation, createRenderContext(entityName, config));

  return {
    operation,
    entityName,
    rootDir: resolvedRoot,
    actions: buildActionsForFileSet(resolvedRoot, fileSet)
  };
};
