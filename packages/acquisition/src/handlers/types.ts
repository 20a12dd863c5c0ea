/**
 * Handler Contract
 */

import type { MediaCandidate, MediaKind } from '@mediastage/core';

export interface FetchTarget {
  cacheDir: string;
  /** `{mediaId}_{ordinal}`; the handler picks the extension */
  stem: string;
}

export interface HandlerRequest {
  headers?: Record<string, string>;
  proxy?: string;
  signal?: AbortSignal;
}

export interface FetchedFile {
  filePath: string;
  sizeMb: number;
}

/**
 * Downloads one candidate into the cache.
 * Failures are thrown as `MediaStageError` subclasses; no partial file
 * is left behind.
 */
export interface MediaHandler {
  fetch(
    candidate: MediaCandidate,
    kind: MediaKind,
    target: FetchTarget,
    request: HandlerRequest
  ): Promise<FetchedFile>;
}

export function rangeHeaders(
  candidate: MediaCandidate,
  headers: Record<string, string> | undefined
): Record<string, string> | undefined {
  return candidate.tag === 'range' ? { ...headers, range: 'bytes=0-' } : headers;
}
