/**
 * Media ID
 *
 * `{platform}_{id}_{runToken}`: names the cache files of one post.
 */

import { createHash } from 'node:crypto';
import { sanitizeFilename } from '@mediastage/utils';

const NUMERIC_ID = /\d{5,}/g;

/**
 * Last run of 5+ digits in the URL path, if any
 */
export function extractNumericId(sourceUrl: string): string | null {
  const path = URL.canParse(sourceUrl) ? new URL(sourceUrl).pathname : sourceUrl;
  const matches = path.match(NUMERIC_ID);
  return matches?.[matches.length - 1] ?? null;
}

export function createRunToken(now: number = Date.now()): string {
  return now.toString(36);
}

export function createMediaId(platform: string, sourceUrl: string, runToken: string): string {
  const id = extractNumericId(sourceUrl)
    ?? createHash('md5').update(sourceUrl).digest('hex').slice(0, 8);
  const safePlatform = sanitizeFilename(platform).replace(/\s+/g, '_') || 'unknown';
  return `${safePlatform}_${id}_${runToken}`;
}
