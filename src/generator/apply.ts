import { mkdir, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import type { DirAction, FileAction, GenerationError, Plan, PlanAction } from "./types.js";

export type ApplyResult = { ok: true; written: string[] } | { ok: false; error: GenerationError };

const isInside = (root: string, target: string): boolean => {
  const resolvedRoot = resolve(root);
  const resolvedTarget = resolve(target);
  if (resolvedTarget === resolvedRoot) return true;

  const rel = relative(resolvedRoot, resolvedTarget);
  return !isAbsolute(rel) && !rel.split(sep).includes("..");
};

const isDirAction = (action: PlanAction): action is DirAction => action.entryType === "dir";

const isFileAction = (action: PlanAction): action is FileAction => action.entryType === "file";

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const ioFailure = (action: PlanAction, error: unknown): GenerationError => ({
  code: "IO_FAILURE",
  message: `Failed to ${action.entryType === "dir" ? "create directory" : "write file"} ${action.path}`,
  path: action.path,
  detail: errorMessage(error)
});

/**
 * Creates every planned directory, then writes every planned file in plan order.
 * Stops at the first failure; files written before it stay on disk.
 */
export const applyPlan = async (plan: Plan, opts: { apply: boolean }): Promise<ApplyResult> => {
  const root = resolve(plan.rootDir);

  const outside = plan.actions.find((action) => !isInside(root, join(root, action.path)));
  if (outside) {
    return {
      ok: false,
      error: {
        code: "OUTSIDE_ROOT",
        message: `Refusing to write outside output directory: ${outside.path}`,
        path: outside.path
      }
    };
  }

  if (!opts.apply) {
    return { ok: true, written: [] };
  }

  for (const action of plan.actions.filter(isDirAction)) {
    try {
      await mkdir(join(root, action.path), { recursive: true });
    } catch (error) {
      return { ok: false, error: ioFailure(action, error) };
    }
  }

  const written: string[] = [];
  for (const action of plan.actions.filter(isFileAction)) {
    const target = join(root, action.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, action.content, "utf8");
    } catch (error) {
      return { ok: false, error: ioFailure(action, error) };
    }
    written.push(action.path);
  }

  return { ok: true, written };
};
