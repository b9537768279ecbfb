import { z } from "zod";

export const CONFIG_FILE_NAME = ".stratagenrc.json";

export const STATE_MANAGERS = ["getx", "bloc"] as const;

export const stateManagerSchema = z.enum(STATE_MANAGERS);

export type StateManager = z.infer<typeof stateManagerSchema>;

export const configSchema = z.object({
  useImmutableModels: z.boolean().default(true),
  useValueEquality: z.boolean().default(false),
  defaultStateManager: stateManagerSchema.default("getx"),
  author: z.string().default("Developer")
});

export type Configuration = Readonly<z.infer<typeof configSchema>>;

export const DEFAULT_CONFIG: Configuration = Object.freeze(configSchema.parse({}));
