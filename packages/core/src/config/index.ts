/**
 * Configuration
 *
 * Environment-driven settings for the acquisition pipeline, validated with zod.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { KindFlags, MediaKind, MediaPost } from '../types/media.js';

/** Upper bound for the large-video threshold */
export const MAX_LARGE_VIDEO_THRESHOLD_MB = 100;

export interface StagingConfig {
  /** 0 = unlimited */
  maxVideoSizeMb: number;
  /** 0 = every video counts as large */
  largeVideoThresholdMb: number;
  /** Kinds the large threshold applies to */
  largeMediaKinds: MediaKind[];
  cacheDir: string;
  prefetchAll: boolean;
  maxConcurrentDownloads: number;
  useFfmpeg: boolean;
  ffmpegPath: string;
  probeTimeoutMs: number;
  fetchTimeoutMs: number;
  segmentTimeoutMs: number;
  segmentConcurrency: number;
}

export interface ProxyConfig {
  url?: string;
  platforms: Record<string, KindFlags>;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  staging: StagingConfig;
  proxy: ProxyConfig;
}

export const DEFAULT_STAGING_CONFIG: StagingConfig = {
  maxVideoSizeMb: 0,
  largeVideoThresholdMb: MAX_LARGE_VIDEO_THRESHOLD_MB,
  largeMediaKinds: ['video'],
  cacheDir: resolve(process.cwd(), 'cache'),
  prefetchAll: false,
  maxConcurrentDownloads: 3,
  useFfmpeg: true,
  ffmpegPath: 'ffmpeg',
  probeTimeoutMs: 10_000,
  fetchTimeoutMs: 300_000,
  segmentTimeoutMs: 30_000,
  segmentConcurrency: 4,
};

/**
 * Merge overrides onto the defaults and enforce invariants
 *
 * @throws ConfigurationError
 */
export function resolveStagingConfig(overrides: Partial<StagingConfig> = {}): StagingConfig {
  const merged: StagingConfig = { ...DEFAULT_STAGING_CONFIG, ...overrides };
  const issues: string[] = [];

  if (merged.maxVideoSizeMb < 0) {
    issues.push('maxVideoSizeMb must be >= 0');
  }
  if (merged.largeVideoThresholdMb < 0) {
    issues.push('largeVideoThresholdMb must be >= 0');
  }
  if (!Number.isInteger(merged.maxConcurrentDownloads) || merged.maxConcurrentDownloads < 1) {
    issues.push('maxConcurrentDownloads must be a positive integer');
  }
  if (!Number.isInteger(merged.segmentConcurrency) || merged.segmentConcurrency < 1) {
    issues.push('segmentConcurrency must be a positive integer');
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return {
    ...merged,
    largeVideoThresholdMb: Math.min(merged.largeVideoThresholdMb, MAX_LARGE_VIDEO_THRESHOLD_MB),
  };
}

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

const booleanFromEnv = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
    .transform((value) => TRUTHY.has(value));

const numberFromEnv = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().nonnegative());

const integerFromEnv = (fallback: string, min: number, max: number) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().min(min).max(max));

const kindListFromEnv = z
  .string()
  .default('video')
  .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean))
  .pipe(z.array(z.enum(['video', 'image'])));

/**
 * `twitter:video+image,weibo:image` → per-platform proxy flags
 */
const proxyPlatformsFromEnv = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const platforms: Record<string, KindFlags> = {};

    for (const entry of value.split(',').map((part) => part.trim()).filter(Boolean)) {
      const [platform, kinds = 'video+image'] = entry.split(':').map((part) => part.trim());
      if (!platform) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid proxy entry "${entry}"` });
        continue;
      }

      const flags: KindFlags = { video: false, image: false };
      for (const kind of kinds.split('+').map((part) => part.trim().toLowerCase())) {
        if (kind === 'video' || kind === 'image') {
          flags[kind] = true;
        } else {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown media kind "${kind}" in "${entry}"` });
        }
      }
      platforms[platform.toLowerCase()] = flags;
    }

    return platforms;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Size policy
  MEDIASTAGE_MAX_VIDEO_SIZE_MB: numberFromEnv('0'),
  MEDIASTAGE_LARGE_VIDEO_THRESHOLD_MB: numberFromEnv(String(MAX_LARGE_VIDEO_THRESHOLD_MB)),
  MEDIASTAGE_LARGE_MEDIA_KINDS: kindListFromEnv,

  // Cache & downloads
  MEDIASTAGE_CACHE_DIR: z.string().min(1).default('./cache'),
  MEDIASTAGE_PREFETCH_ALL: booleanFromEnv('false'),
  MEDIASTAGE_MAX_CONCURRENT_DOWNLOADS: integerFromEnv('3', 1, 32),
  MEDIASTAGE_PROBE_TIMEOUT_MS: integerFromEnv('10000', 100, 600_000),
  MEDIASTAGE_FETCH_TIMEOUT_MS: integerFromEnv('300000', 1000, 3_600_000),

  // Segmented streams
  MEDIASTAGE_USE_FFMPEG: booleanFromEnv('true'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),

  // Proxy
  MEDIASTAGE_PROXY_URL: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.string().url().optional()),
  MEDIASTAGE_PROXY_PLATFORMS: proxyPlatformsFromEnv,
});

/**
 * Load `.env` into process.env (existing variables win)
 */
export function loadDotenv(path: string = resolve(process.cwd(), '.env')): void {
  dotenvConfig({ path });
}

/**
 * Validate environment variables into an AppConfig
 *
 * @throws ConfigurationError
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigurationError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    staging: resolveStagingConfig({
      maxVideoSizeMb: parsed.MEDIASTAGE_MAX_VIDEO_SIZE_MB,
      largeVideoThresholdMb: parsed.MEDIASTAGE_LARGE_VIDEO_THRESHOLD_MB,
      largeMediaKinds: parsed.MEDIASTAGE_LARGE_MEDIA_KINDS,
      cacheDir: resolve(cwd, parsed.MEDIASTAGE_CACHE_DIR),
      prefetchAll: parsed.MEDIASTAGE_PREFETCH_ALL,
      maxConcurrentDownloads: parsed.MEDIASTAGE_MAX_CONCURRENT_DOWNLOADS,
      probeTimeoutMs: parsed.MEDIASTAGE_PROBE_TIMEOUT_MS,
      fetchTimeoutMs: parsed.MEDIASTAGE_FETCH_TIMEOUT_MS,
      useFfmpeg: parsed.MEDIASTAGE_USE_FFMPEG,
      ffmpegPath: parsed.FFMPEG_PATH,
    }),
    proxy: {
      url: parsed.MEDIASTAGE_PROXY_URL,
      platforms: parsed.MEDIASTAGE_PROXY_PLATFORMS,
    },
  };
}

/**
 * Turn per-platform proxy toggles into the post's proxy selection.
 * Flags the parser already set are kept.
 */
export function applyProxyPolicy(post: MediaPost, proxy: ProxyConfig): MediaPost {
  const flags = proxy.platforms[post.platform.toLowerCase()];
  const url = post.proxy.url ?? proxy.url;

  return {
    ...post,
    proxy: {
      url,
      video: post.proxy.video || (flags?.video ?? false),
      image: post.proxy.image || (flags?.image ?? false),
    },
  };
}
