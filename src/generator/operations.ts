import type { Configuration } from "../config/schema.js";
import { applyPlan } from "./apply.js";
import { buildPlan } from "./plan.js";
import type { GenerateResult, GenerationError, Operation } from "./types.js";

export type GenerateOptions = {
  /** Output root the relative layout is placed under. Defaults to the working directory. */
  rootDir?: string;
  /** `false` builds the plan without touching the disk. */
  apply?: boolean;
};

export const validateEntityName = (
  entityName: string | undefined
): { ok: true; name: string } | { ok: false; error: GenerationError } => {
  const name = (entityName ?? "").trim();
  if (name.length === 0) {
    return { ok: false, error: { code: "INVALID_NAME", message: "Entity name must not be empty" } };
  }
  return { ok: true, name };
};

export const generate = async (
  operation: Operation,
  entityName: string,
  config: Configuration,
  opts: GenerateOptions = {}
): Promise<GenerateResult> => {
  const validated = validateEntityName(entityName);
  if (!validated.ok) {
    return { ok: false, operation, entityName, error: validated.error };
  }

  const apply = opts.apply ?? true;
  const plan = buildPlan(operation, validated.name, config, opts.rootDir ?? process.cwd());
  const applied = await applyPlan(plan, { apply });
  if (!applied.ok) {
    return { ok: false, operation, entityName: validated.name, error: applied.error };
  }

  const paths = apply
    ? applied.written
    : plan.actions.filter((action) => action.entryType === "file").map((action) => action.path);

  return { ok: true, operation, entityName: validated.name, paths, plan, applied: apply };
};

export const generateFeature = (entityName: string, config: Configuration, opts?: GenerateOptions): Promise<GenerateResult> =>
  generate("feature", entityName, config, opts);

export const generateScreen = (entityName: string, config: Configuration, opts?: GenerateOptions): Promise<GenerateResult> =>
  generate("screen", entityName, config, opts);

export const generateModel = (entityName: string, config: Configuration, opts?: GenerateOptions): Promise<GenerateResult> =>
  generate("model", entityName, config, opts);

export const generateUseCase = (entityName: string, config: Configuration, opts?: GenerateOptions): Promise<GenerateResult> =>
  generate("usecase", entityName, config, opts);

export const generateRepository = (
  entityName: string,
  config: Configuration,
  opts?: GenerateOptions
): Promise<GenerateResult> => generate("repository", entityName, config, opts);
