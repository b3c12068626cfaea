// config/load.ts
import { readFileSync, existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import { AppConfig } from './schema.ts';
import { interpolateStrict } from './secret-interpolate.ts';
import { EnvSecretSource } from './secret-source.ts';

export const DEFAULT_CONFIG_FILE = 'config.peerstream.json';
export const CONFIG_ENV_VAR = 'PEERSTREAM_CONFIG';

/**
 * Interpolate ${env:VAR_NAME} tokens, then validate with zod.
 * Fails fast with a clear list of missing env vars.
 */
export async function resolveAndValidate(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Promise<AppConfig> {
  const interpolated = await interpolateStrict(raw, { env: new EnvSecretSource(env) });
  const parsed = AppConfig.safeParse(interpolated);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(['Invalid configuration:', ...issues].join('\n'));
  }
  return parsed.data;
}

async function loadFile(path: string, label: string, env: NodeJS.ProcessEnv): Promise<AppConfig> {
  try {
    const configData: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return await resolveAndValidate(configData, env);
  } catch (error) {
    throw new Error(
      `Failed to load ${label}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
}

export async function loadConfig(
  filename?: string,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<AppConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  // Priority 1: Explicitly provided file path (from command line args)
  if (filename) {
    const explicitConfigPath = isAbsolute(filename) ? filename : join(cwd, filename);
    if (existsSync(explicitConfigPath)) {
      return loadFile(explicitConfigPath, filename, env);
    }
    // If explicit filename provided but doesn't exist, continue to fallback options
  }

  // Priority 2: config.peerstream.json in current directory
  const defaultConfigPath = join(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(defaultConfigPath)) {
    return loadFile(defaultConfigPath, DEFAULT_CONFIG_FILE, env);
  }

  // Priority 3: PEERSTREAM_CONFIG environment variable
  const inline = env[CONFIG_ENV_VAR];
  if (inline) {
    let configData: unknown;
    try {
      configData = JSON.parse(inline);
    } catch (error) {
      throw new Error(
        `Failed to parse ${CONFIG_ENV_VAR}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    return resolveAndValidate(configData, env);
  }

  // No configuration found
  const errorMessage = filename
    ? `No configuration found. Tried: ${filename}, ${DEFAULT_CONFIG_FILE}, and ${CONFIG_ENV_VAR} environment variable.`
    : `No configuration found. Please provide ${DEFAULT_CONFIG_FILE}, set the ${CONFIG_ENV_VAR} environment variable, or specify a config file path.`;

  throw new Error(errorMessage);
}
