/**
 * CLI Configuration
 *
 * Environment config (`.env` + process env) with command-line overrides on top.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import {
  ConfigurationError,
  loadConfig,
  resolveStagingConfig,
  type AppConfig,
  type StagingConfig,
} from '@mediastage/core';

/** Staging flags shared by commands that build a pipeline */
export interface StagingOptions {
  cacheDir?: string;
  maxSize?: string;
  largeThreshold?: string;
  prefetch?: boolean;
  concurrency?: string;
  /** `--no-ffmpeg` sets this to false */
  ffmpeg?: boolean;
}

const overridesSchema = z.object({
  cacheDir: z.string().trim().min(1).optional(),
  maxSize: z.coerce.number().nonnegative().optional(),
  largeThreshold: z.coerce.number().nonnegative().optional(),
  prefetch: z.boolean().optional(),
  concurrency: z.coerce.number().int().min(1).max(32).optional(),
  ffmpeg: z.boolean().default(true),
});

function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

/**
 * Turn command-line flags into staging overrides
 *
 * @throws ConfigurationError naming the offending flags
 */
export function resolveOverrides(options: StagingOptions, cwd: string = process.cwd()): Partial<StagingConfig> {
  const parseResult = overridesSchema.safeParse(options);

  if (!parseResult.success) {
    throw new ConfigurationError(
      parseResult.error.issues.map((issue) => `${toFlag(issue.path.join('.'))}: ${issue.message}`)
    );
  }

  const parsed = parseResult.data;
  const overrides: Partial<StagingConfig> = {};

  if (parsed.cacheDir !== undefined) {
    overrides.cacheDir = resolve(cwd, parsed.cacheDir);
  }
  if (parsed.maxSize !== undefined) {
    overrides.maxVideoSizeMb = parsed.maxSize;
  }
  if (parsed.largeThreshold !== undefined) {
    overrides.largeVideoThresholdMb = parsed.largeThreshold;
  }
  if (parsed.prefetch !== undefined) {
    overrides.prefetchAll = parsed.prefetch;
  }
  if (parsed.concurrency !== undefined) {
    overrides.maxConcurrentDownloads = parsed.concurrency;
  }
  if (!parsed.ffmpeg) {
    overrides.useFfmpeg = false;
  }

  return overrides;
}

/**
 * @throws ConfigurationError
 */
export function loadCliConfig(
  options: StagingOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const config = loadConfig(env, cwd);

  return {
    ...config,
    staging: resolveStagingConfig({ ...config.staging, ...resolveOverrides(options, cwd) }),
  };
}
