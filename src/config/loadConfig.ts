import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, configSchema, stateManagerSchema, type Configuration } from "./schema.js";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const configPathFor = (cwd: string): string => join(cwd, CONFIG_FILE_NAME);

const serializeConfig = (config: Configuration): string => `${JSON.stringify(config, null, 2)}\n`;

const parseJson = (text: string, configPath: string): unknown => {
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Malformed config file ${configPath}: ${reason}`, configPath);
  }
};

const parseConfigText = (text: string, configPath: string): Configuration =>
  Object.freeze(configSchema.parse(parseJson(text, configPath)));

const readRawConfig = async (configPath: string): Promise<Record<string, unknown>> => {
  if (!existsSync(configPath)) return {};

  const raw = parseJson(await readFile(configPath, "utf8"), configPath);
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`, configPath);
  }
  return { ...raw };
};

/**
 * Reads `.stratagenrc.json` from `cwd`. A missing file yields the defaults; malformed JSON
 * throws {@link ConfigError}; schema violations throw the `ZodError` from the schema.
 */
export const loadConfig = async (cwd: string = process.cwd()): Promise<Configuration> => {
  const configPath = configPathFor(cwd);
  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  const text = await readFile(configPath, "utf8");
  return parseConfigText(text, configPath);
};

export type InitConfigResult = {
  path: string;
  written: boolean;
};

export const initConfig = async (
  cwd: string,
  opts: { confirmOverwrite: (configPath: string) => Promise<boolean> }
): Promise<InitConfigResult> => {
  const configPath = configPathFor(cwd);

  if (existsSync(configPath)) {
    const confirmed = await opts.confirmOverwrite(configPath);
    if (!confirmed) {
      return { path: configPath, written: false };
    }
  }

  await writeFile(configPath, serializeConfig(DEFAULT_CONFIG), "utf8");
  return { path: configPath, written: true };
};

export const setStateManager = async (manager: string, cwd: string = process.cwd()): Promise<Configuration> => {
  const configPath = configPathFor(cwd);
  const parsed = stateManagerSchema.safeParse(manager.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`Invalid state manager "${manager}". Use "getx" or "bloc".`, configPath);
  }

  // The stored manager is replaced before validation so an invalid value can be repaired.
  const raw = await readRawConfig(configPath);
  const next: Configuration = Object.freeze(configSchema.parse({ ...raw, defaultStateManager: parsed.data }));
  await writeFile(configPath, serializeConfig(next), "utf8");
  return next;
};
