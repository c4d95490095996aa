/**
 * Perfscope Config
 *
 * Optional `perfscope.config.json` in the working directory, merged over
 * the defaults. PERFSCOPE_LOG_LEVEL overrides the configured log level.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { InputErrors, InputFileError, PerfscopeErrorCode } from '../errors/index.js';
import { isLogLevel } from '../logging/index.js';
import type { LogLevel } from '../logging/index.js';
import { DEFAULT_REPORT_FILE } from '../test-suite/policy.js';
import { formatIssues } from '../test-suite/raw-schema.js';

// ============================================================================
// Types
// ============================================================================

export interface OracleConfig {
  /** Per-query timeout in milliseconds; 0 disables it */
  queryTimeoutMs: number;
}

export interface ReportsConfig {
  /** Measurement report file used when none is given */
  defaultFile: string;
}

export interface OutputConfig {
  /** Directory relative artifact paths resolve against */
  dir: string;
}

export interface PerfscopeConfig {
  logLevel: LogLevel;
  oracle: OracleConfig;
  reports: ReportsConfig;
  output: OutputConfig;
}

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE = 'perfscope.config.json';
export const LOG_LEVEL_ENV = 'PERFSCOPE_LOG_LEVEL';

const ConfigFileSchema = z
  .object({
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    oracle: z.object({ queryTimeoutMs: z.number().int().nonnegative() }).strict().partial(),
    reports: z.object({ defaultFile: z.string().min(1) }).strict().partial(),
    output: z.object({ dir: z.string().min(1) }).strict().partial(),
  })
  .strict()
  .partial();

export function createDefaultConfig(): PerfscopeConfig {
  return {
    logLevel: 'info',
    oracle: { queryTimeoutMs: 10_000 },
    reports: { defaultFile: DEFAULT_REPORT_FILE },
    output: { dir: '.' },
  };
}

// ============================================================================
// Loading
// ============================================================================

export function parseConfig(json: string, source = CONFIG_FILE): PerfscopeConfig {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InputFileError(
      InputErrors.file(`${source} is not valid JSON (${error instanceof Error ? error.message : String(error)})`),
      PerfscopeErrorCode.INVALID_FILE,
      { filePath: source }
    );
  }

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    throw new InputFileError(
      InputErrors.file(`${source}: ${formatIssues(result.error)}`),
      PerfscopeErrorCode.INVALID_FILE,
      { filePath: source }
    );
  }

  const defaults = createDefaultConfig();
  const overrides = result.data;
  return {
    logLevel: overrides.logLevel ?? defaults.logLevel,
    oracle: { ...defaults.oracle, ...overrides.oracle },
    reports: { ...defaults.reports, ...overrides.reports },
    output: { ...defaults.output, ...overrides.output },
  };
}

/**
 * Apply environment overrides. An unknown level in the environment is ignored.
 */
export function applyEnvironment(config: PerfscopeConfig, env: NodeJS.ProcessEnv = process.env): PerfscopeConfig {
  const level = env[LOG_LEVEL_ENV];
  if (level !== undefined && isLogLevel(level)) {
    return { ...config, logLevel: level };
  }
  return config;
}

/**
 * Load the config from `cwd`, falling back to the defaults when there is
 * no config file.
 */
export async function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<PerfscopeConfig> {
  const configPath = path.join(cwd, CONFIG_FILE);

  let content: string | null = null;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw new InputFileError(
        InputErrors.file(`cannot read ${configPath} (${String(error)})`),
        PerfscopeErrorCode.INVALID_FILE,
        { filePath: configPath }
      );
    }
  }

  const config = content === null ? createDefaultConfig() : parseConfig(content, configPath);
  return applyEnvironment(config, env);
}

/**
 * Resolve an artifact path against the configured output directory
 */
export function resolveOutputPath(config: PerfscopeConfig, filePath: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, config.output.dir, filePath);
}
