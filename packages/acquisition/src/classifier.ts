/**
 * Media Type Classification
 *
 * Decide from the URL alone whether a candidate is an image, a plain video
 * file or a segmented (HLS) stream. No network access.
 */

import type { MediaKind } from '@mediastage/core';
import { getExtension, stripQueryAndFragment } from '@mediastage/utils';

export type MediaUrlKind = MediaKind | 'segmented';

export type DetectionSource = 'playlist' | 'extension' | 'pattern' | 'default';

export interface MediaUrlDetection {
  kind: MediaUrlKind;
  /** Which rule decided */
  source: DetectionSource;
}

export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'webp', 'bmp', 'svg', 'avif', 'heic'] as const;

export const VIDEO_EXTENSIONS = ['mp4', 'mkv', 'mov', 'avi', 'flv', 'f4v', 'webm', 'wmv', 'm4v'] as const;

// Extension tokens embedded mid-URL, e.g. `/pic_jpg_1/` or `video.mp4_720`
const IMAGE_PATTERN = /[._!-](jpg|jpeg|png|gif|webp|bmp|svg|avif|heic)(_|\d|$)/;
const VIDEO_PATTERN = /[._!-](mp4|mkv|mov|avi|flv|f4v|webm|wmv|m4v|3gp|ts)(_|\d|$)/;

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/avif': 'avif',
  'image/heic': 'heic',
  'image/bmp': 'bmp',
  'image/svg+xml': 'svg',
  'video/mp4': 'mp4',
  'video/webm': 'webm',
  'video/quicktime': 'mov',
  'video/x-matroska': 'mkv',
  'video/x-flv': 'flv',
  'video/x-msvideo': 'avi',
  'video/mp2t': 'ts',
};

function endsWithExtension(path: string, ext: string): boolean {
  if (path.endsWith(`.${ext}`)) {
    return true;
  }
  if (!path.endsWith(ext)) {
    return false;
  }
  // Bare token: `/gif`, `_mp4`, but not `/giftmp4`-style words
  const before = path.charAt(path.length - ext.length - 1);
  return before === '' || !/[a-z]/.test(before);
}

/**
 * Classify a media URL and report which rule decided
 */
export function detectMediaUrl(url: string): MediaUrlDetection {
  const lower = url.trim().toLowerCase();

  if (lower.includes('.m3u8')) {
    return { kind: 'segmented', source: 'playlist' };
  }

  const path = stripQueryAndFragment(lower);

  if (IMAGE_EXTENSIONS.some((ext) => endsWithExtension(path, ext))) {
    return { kind: 'image', source: 'extension' };
  }
  if (VIDEO_EXTENSIONS.some((ext) => endsWithExtension(path, ext))) {
    return { kind: 'video', source: 'extension' };
  }

  if (IMAGE_PATTERN.test(lower)) {
    return { kind: 'image', source: 'pattern' };
  }
  if (VIDEO_PATTERN.test(lower)) {
    return { kind: 'video', source: 'pattern' };
  }

  return { kind: 'video', source: 'default' };
}

/**
 * Classify a media URL: `segmented`, `image` or `video` (the fallback)
 */
export function classifyMediaUrl(url: string): MediaUrlKind {
  return detectMediaUrl(url).kind;
}

/**
 * Pick a file extension for a cached download
 */
export function inferExtension(url: string, kind: MediaKind, contentType?: string): string {
  if (contentType) {
    const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
    const fromType = CONTENT_TYPE_EXTENSIONS[mime];
    if (fromType) {
      return fromType;
    }
  }

  const fromUrl = getExtension(pathnameOf(url));
  const known: readonly string[] = kind === 'image' ? IMAGE_EXTENSIONS : VIDEO_EXTENSIONS;
  if (known.includes(fromUrl)) {
    return fromUrl;
  }

  return kind === 'image' ? 'jpg' : 'mp4';
}

function pathnameOf(url: string): string {
  return URL.canParse(url) ? new URL(url).pathname : stripQueryAndFragment(url);
}
