export { loadConfig, initConfig, setStateManager, ConfigError } from "./config/loadConfig.js";
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, configSchema } from "./config/schema.js";
export type { Configuration, StateManager } from "./config/schema.js";
export { toCamel, toPascal, toSnake } from "./generator/naming.js";
export { createRenderContext } from "./generator/context.js";
export { renderArtifact, renderScreenArtifact } from "./generator/catalog.js";
export { buildFileSet } from "./generator/layout.js";
export { buildPlan } from "./generator/plan.js";
export { applyPlan } from "./generator/apply.js";
export {
  generate,
  generateFeature,
  generateModel,
  generateRepository,
  generateScreen,
  generateUseCase
} from "./generator/operations.js";
export type { GenerateOptions } from "./generator/operations.js";
export type {
  ArtifactKind,
  FileSet,
  GenerateResult,
  GenerationError,
  Operation,
  Plan,
  DirAction,
  FileAction,
  PlanAction,
  PlanActionType,
  RenderContext,
  ScreenArtifactKind
} from "./generator/types.js";
