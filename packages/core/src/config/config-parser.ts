import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import { DEFAULT_THRESHOLDS } from '../compare/classifier.js';
import { COMFORT_FADE_PREVIEW, DEFAULT_GITHUB_API_URL } from '../notify/github-notifier.js';
import type { PerfCompareConfig } from '../types/config.js';

export const CONFIG_FILE_NAME = '.perfcompare.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const ratio = (label: string) => z.number().positive(`${label} must be positive`);

const thresholdConfigSchema = z
  .object({
    regressionRatio: ratio('regressionRatio'),
    regressionAbsolute: z.number().min(0, 'regressionAbsolute must not be negative'),
    slowdownRatio: ratio('slowdownRatio'),
    speedupRatio: ratio('speedupRatio'),
    meanRatio: ratio('meanRatio'),
  })
  .refine((t) => t.speedupRatio <= t.slowdownRatio, {
    message: 'speedupRatio must not exceed slowdownRatio',
    path: ['speedupRatio'],
  });

const githubConfigSchema = z.object({
  apiUrl: z.string().url('apiUrl must be a URL'),
  repository: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, 'repository must look like "owner/repo"')
    .optional(),
  accept: z.string().min(1, 'accept must not be empty'),
});

const perfCompareConfigSchema = z.object({
  thresholds: thresholdConfigSchema,
  github: githubConfigSchema,
});

// --- Defaults ---

function defaultConfig(): PerfCompareConfig {
  return {
    thresholds: { ...DEFAULT_THRESHOLDS },
    github: {
      apiUrl: DEFAULT_GITHUB_API_URL,
      accept: COMFORT_FADE_PREVIEW,
    },
  };
}

/** Reference copy of the defaults; loaders hand out fresh copies. */
export const DEFAULT_CONFIG: Readonly<PerfCompareConfig> = Object.freeze(defaultConfig());

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function section(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    thresholds: {
      ...DEFAULT_CONFIG.thresholds,
      ...section(partial['thresholds']),
    },
    github: {
      ...DEFAULT_CONFIG.github,
      ...section(partial['github']),
    },
  };
}

/**
 * Validate a raw config object, filling in defaults for absent keys.
 */
export function parseConfig(raw: unknown): Result<PerfCompareConfig, ConfigError> {
  if (raw === null || raw === undefined) {
    return ok(defaultConfig());
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return err(new ConfigError('Config file is not a valid YAML object'));
  }

  const result = perfCompareConfigSchema.safeParse(applyDefaults(section(raw)));
  if (!result.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(result.error)}`));
  }
  return ok(result.data);
}

// --- Main ---

/**
 * Load `.perfcompare.yaml` from `rootDir`. A missing file yields the
 * defaults.
 */
export async function loadConfig(rootDir: string): Promise<Result<PerfCompareConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return ok(defaultConfig());
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new ConfigError(`Failed to read config file ${configPath}: ${message}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}
