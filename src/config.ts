import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, errorMessage, formatZodError, parseInitializer, type Initializer, type LogLevel } from '@cfgscript/core';

export const cliConfigSchema = z.object({
  /** Module roots, relative to the config file */
  moduleRoots: z.array(z.string().min(1)).default([]),
  logLevel: z.enum(LOG_LEVELS).optional(),
  /** Serializable initializers, applied in order */
  initializers: z.array(z.unknown()).default([]),
});

export interface CliConfig {
  /** Directory relative paths resolve against */
  baseDir: string;
  moduleRoots: string[];
  logLevel?: LogLevel;
  initializers: Initializer[];
}

export interface CliOptions {
  config?: string;
  json?: string;
}

/**
 * Validate a parsed config object
 */
export function parseCliConfig(data: unknown, baseDir: string): CliConfig {
  const parsed = cliConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid config: ${formatZodError(parsed.error)}`);
  }
  const { moduleRoots, logLevel, initializers } = parsed.data;
  const config: CliConfig = {
    baseDir,
    moduleRoots,
    initializers: initializers.map((value) => parseInitializer(value)),
  };
  if (logLevel !== undefined) config.logLevel = logLevel;
  return config;
}

function parseJson(content: string, origin: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new Error(`Failed to parse ${origin}: ${errorMessage(err)}`);
  }
}

/**
 * Load the config from `--config <path>` or `--json <string>` (exactly one)
 */
export function loadCliConfig(options: CliOptions, cwd: string = process.cwd()): CliConfig {
  if (options.config && options.json) {
    throw new Error('--config and --json cannot be used together');
  }

  if (options.config) {
    const filePath = path.resolve(cwd, options.config);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Config file not found: ${filePath}`);
    }
    const content = fs.readFileSync(filePath, 'utf-8');
    return parseCliConfig(parseJson(content, filePath), path.dirname(filePath));
  }

  if (options.json) {
    return parseCliConfig(parseJson(options.json, '--json'), cwd);
  }

  throw new Error('Provide either --config or --json');
}
