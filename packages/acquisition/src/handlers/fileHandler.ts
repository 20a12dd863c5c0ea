/**
 * Plain File Handler
 *
 * One GET, validated like a probe, streamed straight into the cache.
 */

import { join } from 'node:path';
import type { MediaCandidate, MediaKind } from '@mediastage/core';
import {
  AccessDeniedError,
  InvalidMediaResponseError,
  SizeExceededError,
} from '@mediastage/core';
import {
  IncompleteTransferError,
  bytesToMb,
  createLogger,
  writeStreamAtomic,
} from '@mediastage/utils';
import { inferExtension } from '../classifier.js';
import { inspectMediaResponse } from '../probe.js';
import type { HttpTransport } from '../transport.js';
import {
  rangeHeaders,
  type FetchTarget,
  type FetchedFile,
  type HandlerRequest,
  type MediaHandler,
} from './types.js';

const log = createLogger({ component: 'file-handler' });

export interface FileHandlerOptions {
  timeoutMs: number;
}

function declaredLength(headers: Record<string, string>): number | undefined {
  const value = headers['content-length']?.trim();
  return value && /^\d+$/.test(value) ? Number(value) : undefined;
}

export class FileHandler implements MediaHandler {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: FileHandlerOptions
  ) {}

  async fetch(
    candidate: MediaCandidate,
    kind: MediaKind,
    target: FetchTarget,
    request: HandlerRequest
  ): Promise<FetchedFile> {
    const url = candidate.url;
    const response = await this.transport.request(url, {
      method: 'GET',
      headers: rangeHeaders(candidate, request.headers),
      proxy: request.proxy,
      timeoutMs: this.options.timeoutMs,
      signal: request.signal,
    });

    try {
      if (response.status === 403) {
        throw new AccessDeniedError(url);
      }

      const inspection = await inspectMediaResponse(response, {
        allowPartial: candidate.tag === 'range',
        sniffBody: true,
      });
      if (inspection.verdict !== 'media') {
        throw new InvalidMediaResponseError(url, inspection.reason);
      }

      const extension = inferExtension(url, kind, response.headers['content-type']);
      const filePath = join(target.cacheDir, `${target.stem}.${extension}`);
      const expectedBytes = declaredLength(response.headers);

      let written: number;
      try {
        written = await writeStreamAtomic(filePath, inspection.body, { expectedBytes });
      } catch (error) {
        if (error instanceof IncompleteTransferError) {
          throw new SizeExceededError(error.message, {
            url,
            expectedBytes: error.expectedBytes,
            receivedBytes: error.receivedBytes,
          });
        }
        throw error;
      }

      log.debug({ url, filePath, bytes: written }, 'File downloaded');
      return { filePath, sizeMb: bytesToMb(written) };
    } finally {
      await response.discard();
    }
  }
}
