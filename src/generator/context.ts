import type { Configuration } from "../config/schema.js";
import { toCamel, toPascal, toSnake } from "./naming.js";
import type { EntityNames, ModelStyle, RenderContext, StateStyle } from "./types.js";

// Immutable wins over value equality; both off means plain classes.
export const resolveModelStyle = (config: Configuration): ModelStyle => {
  if (config.useImmutableModels) return "immutable";
  if (config.useValueEquality) return "valueEquality";
  return "plain";
};

export const resolveStateStyle = (config: Configuration): StateStyle =>
  config.defaultStateManager === "bloc" ? "eventDriven" : "reactive";

export const deriveNames = (entityName: string): EntityNames => ({
  pascal: toPascal(entityName),
  camel: toCamel(entityName),
  snake: toSnake(entityName)
});

export const createRenderContext = (entityName: string, config: Configuration): RenderContext => ({
  names: deriveNames(entityName),
  model: resolveModelStyle(config),
  state: resolveStateStyle(config),
  author: config.author
});
