/**
 * HLS Playlist Parsing
 */

import { InvalidMediaResponseError } from '@mediastage/core';

export interface HlsVariant {
  uri: string;
  bandwidth: number;
}

export type HlsPlaylist =
  | { type: 'master'; variants: HlsVariant[] }
  | {
      type: 'media';
      /** `#EXT-X-MAP` init segment (fMP4 streams) */
      initSegment: string | null;
      segments: string[];
      /** `#EXT-X-KEY` with a method other than NONE */
      encrypted: boolean;
    };

const ATTRIBUTE = /([A-Z0-9-]+)=("[^"]*"|[^,]*)/g;

export function parseAttributes(list: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of list.matchAll(ATTRIBUTE)) {
    const [, name, raw] = match;
    if (name !== undefined && raw !== undefined) {
      attributes[name] = raw.replace(/^"|"$/g, '');
    }
  }
  return attributes;
}

function resolveUri(uri: string, baseUrl: string): string {
  return new URL(uri, baseUrl).toString();
}

/**
 * Parse a master or media playlist. URIs are resolved against `baseUrl`.
 *
 * @throws InvalidMediaResponseError when the text is not a playlist
 */
export function parseHlsPlaylist(text: string, baseUrl: string): HlsPlaylist {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  if (lines[0] !== '#EXTM3U') {
    throw new InvalidMediaResponseError(baseUrl, 'not an HLS playlist');
  }

  const variants: HlsVariant[] = [];
  const segments: string[] = [];
  let initSegment: string | null = null;
  let encrypted = false;
  let pendingBandwidth: number | null = null;

  for (const line of lines.slice(1)) {
    if (line.startsWith('#EXT-X-STREAM-INF:')) {
      const bandwidth = Number(parseAttributes(line.slice('#EXT-X-STREAM-INF:'.length))['BANDWIDTH']);
      pendingBandwidth = Number.isFinite(bandwidth) ? bandwidth : 0;
    } else if (line.startsWith('#EXT-X-MAP:')) {
      const uri = parseAttributes(line.slice('#EXT-X-MAP:'.length))['URI'];
      if (uri) {
        initSegment = resolveUri(uri, baseUrl);
      }
    } else if (line.startsWith('#EXT-X-KEY:')) {
      const method = parseAttributes(line.slice('#EXT-X-KEY:'.length))['METHOD'] ?? 'NONE';
      if (method.toUpperCase() !== 'NONE') {
        encrypted = true;
      }
    } else if (!line.startsWith('#')) {
      if (pendingBandwidth !== null) {
        variants.push({ uri: resolveUri(line, baseUrl), bandwidth: pendingBandwidth });
        pendingBandwidth = null;
      } else {
        segments.push(resolveUri(line, baseUrl));
      }
    }
  }

  if (variants.length > 0) {
    return { type: 'master', variants };
  }
  if (segments.length === 0) {
    throw new InvalidMediaResponseError(baseUrl, 'playlist has no segments');
  }
  return { type: 'media', initSegment, segments, encrypted };
}

/**
 * Highest-bandwidth variant; first one on ties
 */
export function selectBestVariant(variants: readonly HlsVariant[]): HlsVariant | null {
  let best: HlsVariant | null = null;
  for (const variant of variants) {
    if (!best || variant.bandwidth > best.bandwidth) {
      best = variant;
    }
  }
  return best;
}
