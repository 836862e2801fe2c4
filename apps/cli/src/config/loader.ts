import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { ZodError } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { TokentallyConfig, TokentallyConfigSchema } from './schema.js';

const CONFIG_FILES = [
  'tokentally.config.mjs',
  'tokentally.config.js',
  '.tokentallyrc.json',
  '.tokentallyrc',
];

export interface LoadConfigResult {
  config: TokentallyConfig;
  configPath: string | null;
}

function moduleExport(mod: unknown): unknown {
  if (mod && typeof mod === 'object' && 'default' in mod) {
    return mod.default;
  }
  return mod;
}

export async function loadConfig(cwd: string = process.cwd()): Promise<LoadConfigResult> {
  const configPath = getConfigPath(cwd);

  if (!configPath) {
    // No file: every setting at its default
    return {
      config: TokentallyConfigSchema.parse({}),
      configPath: null,
    };
  }

  try {
    if (configPath.endsWith('.json') || configPath.endsWith('.tokentallyrc')) {
      const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      return {
        config: TokentallyConfigSchema.parse(raw),
        configPath,
      };
    }

    const mod: unknown = await import(pathToFileURL(configPath).href);

    return {
      config: TokentallyConfigSchema.parse(moduleExport(mod)),
      configPath,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const validationError = fromZodError(error, {
        prefix: 'Configuration error',
        prefixSeparator: ': ',
      });
      throw new Error(`Invalid config in ${configPath}:\n\n${validationError.message}`, { cause: error });
    }

    if (error instanceof SyntaxError) {
      throw new Error(
        `Invalid JSON in ${configPath}: ${error.message}\n\nCheck for missing commas, trailing commas, or unquoted keys.`,
        { cause: error },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config from ${configPath}: ${message}`, { cause: error });
  }
}

export function getConfigPath(cwd: string = process.cwd()): string | null {
  for (const filename of CONFIG_FILES) {
    const fullPath = resolve(cwd, filename);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}
