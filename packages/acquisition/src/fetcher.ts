/**
 * Candidate Fetcher
 *
 * Downloads one slot into the cache, trying its candidates in order.
 * Handler errors are converted into `Failure` values here; nothing
 * escapes `fetchSlot`.
 */

import type { Failure, FetchResult, MediaSlot } from '@mediastage/core';
import {
  AccessDeniedError,
  CommandExecutionError,
  InvalidMediaResponseError,
  ShutdownError,
  SizeExceededError,
  TransportError,
} from '@mediastage/core';
import {
  bytesToMb,
  createLogger,
  errorMessage,
  findFileByStem,
  getFileSizeBytes,
  isErrnoException,
} from '@mediastage/utils';
import { classifyMediaUrl } from './classifier.js';
import type { MediaHandler } from './handlers/types.js';
import type { LifecycleManager } from './lifecycle.js';

const log = createLogger({ component: 'fetcher' });

export interface FetchRequest {
  mediaId: string;
  /** Position across the whole post, videos first */
  ordinal: number;
  headers?: Record<string, string>;
  proxy?: string;
  signal?: AbortSignal;
}

export interface FetcherHandlers {
  file: MediaHandler;
  segmented: MediaHandler;
}

export function cacheStem(mediaId: string, ordinal: number): string {
  return `${mediaId}_${ordinal}`;
}

/**
 * Classify a thrown error into a `Failure`
 */
export function toFailure(error: unknown): Failure {
  const message = errorMessage(error);

  if (error instanceof AccessDeniedError) {
    return { kind: 'access-denied', message };
  }
  if (error instanceof InvalidMediaResponseError) {
    return { kind: 'invalid-media-response', message };
  }
  if (error instanceof SizeExceededError) {
    return { kind: 'size-exceeded', message };
  }
  if (error instanceof CommandExecutionError) {
    return { kind: 'remux-failed', message };
  }
  if (error instanceof ShutdownError) {
    return { kind: 'cancelled', message };
  }
  if (error instanceof TransportError) {
    return { kind: 'transport', message };
  }
  if (isErrnoException(error) && error.syscall !== undefined) {
    return { kind: 'io', message };
  }
  return { kind: 'transport', message };
}

export class CandidateFetcher {
  constructor(
    private readonly handlers: FetcherHandlers,
    private readonly lifecycle: LifecycleManager,
    private readonly cacheDir: string
  ) {}

  async fetchSlot(slot: MediaSlot, request: FetchRequest): Promise<FetchResult> {
    const base = { kind: slot.kind, index: slot.index, ordinal: request.ordinal };

    if (this.isCancelled(request)) {
      return this.failed(base, false, { kind: 'cancelled', message: 'Shutdown in progress' });
    }

    const stem = cacheStem(request.mediaId, request.ordinal);

    try {
      const cached = await findFileByStem(this.cacheDir, stem);
      if (cached) {
        log.debug({ filePath: cached }, 'Reusing cached file');
        return {
          ...base,
          success: true,
          filePath: cached,
          sizeMb: bytesToMb(await getFileSizeBytes(cached)),
          url: null,
          forbidden: false,
        };
      }
    } catch (error) {
      return this.failed(base, false, { kind: 'io', message: errorMessage(error) });
    }

    let forbidden = false;
    let firstFailure: Failure | null = null;

    for (const candidate of slot.candidates) {
      if (this.isCancelled(request)) {
        return this.failed(base, forbidden, { kind: 'cancelled', message: 'Shutdown in progress' });
      }

      const segmented = candidate.tag === 'segmented' || classifyMediaUrl(candidate.url) === 'segmented';
      const handler = segmented ? this.handlers.segmented : this.handlers.file;

      try {
        const file = await handler.fetch(
          candidate,
          slot.kind,
          { cacheDir: this.cacheDir, stem },
          { headers: request.headers, proxy: request.proxy, signal: request.signal }
        );
        return { ...base, success: true, filePath: file.filePath, sizeMb: file.sizeMb, url: candidate.url, forbidden };
      } catch (error) {
        if (this.isCancelled(request)) {
          return this.failed(base, forbidden, { kind: 'cancelled', message: 'Shutdown in progress' });
        }

        const failure = toFailure(error);
        if (failure.kind === 'access-denied') {
          forbidden = true;
        }
        firstFailure ??= failure;
        log.debug({ url: candidate.url, failure: failure.kind, error: failure.message }, 'Candidate failed');
      }
    }

    log.warn({ kind: slot.kind, index: slot.index, candidates: slot.candidates.length }, 'All candidates failed');
    return this.failed(base, forbidden, firstFailure ?? { kind: 'transport', message: 'No candidate succeeded' });
  }

  private isCancelled(request: FetchRequest): boolean {
    return this.lifecycle.isShuttingDown || request.signal?.aborted === true;
  }

  private failed(
    base: Pick<FetchResult, 'kind' | 'index' | 'ordinal'>,
    forbidden: boolean,
    failure: Failure
  ): FetchResult {
    return { ...base, success: false, filePath: null, sizeMb: null, url: null, forbidden, failure };
  }
}
