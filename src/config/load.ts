// config/load.ts
import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { AppConfig } from './schema.ts';
import { interpolateStrict } from './secret-interpolate.ts';
import { EnvSecretSource } from './secret-source.ts';

export const DEFAULT_CONFIG_FILE = 'logship.config.json';
export const CONFIG_ENV_VAR = 'LOGSHIP_CONFIG';

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

export async function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env) {
  const interpolated = await interpolateStrict(raw, { env: new EnvSecretSource(env) });
  // Zod validation after secrets are in place
  return AppConfig.parse(interpolated);
}

async function loadFile(path: string, label: string, env: NodeJS.ProcessEnv) {
  try {
    const configData: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return await parseConfig(configData, env);
  } catch (error) {
    throw new Error(`Failed to load ${label}: ${errorMessage(error)}`);
  }
}

/**
 * Resolves configuration, first match wins:
 * 1. an explicit file path
 * 2. logship.config.json in the working directory
 * 3. JSON in the LOGSHIP_CONFIG environment variable
 */
export async function loadConfig(filename?: string, options: LoadConfigOptions = {}) {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (filename) {
    const explicitConfigPath = isAbsolute(filename) ? filename : join(cwd, filename);
    if (existsSync(explicitConfigPath)) {
      return loadFile(explicitConfigPath, filename, env);
    }
    // If explicit filename provided but doesn't exist, continue to fallback options
  }

  const defaultConfigPath = join(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(defaultConfigPath)) {
    return loadFile(defaultConfigPath, DEFAULT_CONFIG_FILE, env);
  }

  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    try {
      const configData: unknown = JSON.parse(fromEnv);
      return await parseConfig(configData, env);
    } catch (error) {
      throw new Error(`Failed to parse ${CONFIG_ENV_VAR}: ${errorMessage(error)}`);
    }
  }

  throw new Error(
    filename
      ? `No configuration found. Tried: ${filename}, ${DEFAULT_CONFIG_FILE}, and ${CONFIG_ENV_VAR} environment variable.`
      : `No configuration found. Please provide ${DEFAULT_CONFIG_FILE}, set the ${CONFIG_ENV_VAR} environment variable, or specify a config file path.`,
  );
}
