/**
 * Segmented Stream Handler
 *
 * Resolves a master playlist to its best variant, downloads the segments
 * into a private work directory and joins them into one file: remuxed to
 * mp4 by ffmpeg, or byte-concatenated when ffmpeg is disabled. Encrypted
 * streams are handed to ffmpeg as a remote input.
 */

import { randomUUID } from 'node:crypto';
import { rm, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { MediaCandidate, MediaKind } from '@mediastage/core';
import { AccessDeniedError, InvalidMediaResponseError } from '@mediastage/core';
import {
  bytesToMb,
  concatFiles,
  createLogger,
  ensureDir,
  getFileSizeBytes,
  moveFile,
  writeStreamAtomic,
} from '@mediastage/utils';
import { ConcurrencyLimiter } from '../limiter.js';
import type { HttpTransport } from '../transport.js';
import { buildConcatList, type Remuxer } from './ffmpeg.js';
import { parseHlsPlaylist, selectBestVariant, type HlsPlaylist } from './playlist.js';
import type { FetchTarget, FetchedFile, HandlerRequest, MediaHandler } from './types.js';

const log = createLogger({ component: 'hls-handler' });

/** Master → variant indirections followed before giving up */
const MAX_VARIANT_HOPS = 3;

type MediaPlaylist = Extract<HlsPlaylist, { type: 'media' }>;

export interface HlsHandlerOptions {
  useFfmpeg: boolean;
  /** Per playlist or segment request */
  timeoutMs: number;
  segmentConcurrency: number;
}

interface SegmentFile {
  url: string;
  name: string;
}

export class HlsHandler implements MediaHandler {
  constructor(
    private readonly transport: HttpTransport,
    private readonly remuxer: Remuxer,
    private readonly options: HlsHandlerOptions
  ) {}

  async fetch(
    candidate: MediaCandidate,
    _kind: MediaKind,
    target: FetchTarget,
    request: HandlerRequest
  ): Promise<FetchedFile> {
    const { url, playlist } = await this.resolveMediaPlaylist(candidate.url, request);

    if (playlist.encrypted && !this.options.useFfmpeg) {
      throw new InvalidMediaResponseError(url, 'encrypted stream requires ffmpeg');
    }

    const workDir = join(target.cacheDir, `${target.stem}_${randomUUID().slice(0, 8)}.work`);
    await ensureDir(workDir);

    try {
      if (playlist.encrypted) {
        await this.remuxer.execute(
          this.remuxer.buildStreamCopyCommand(url, 'output.mp4', request),
          { cwd: workDir, signal: request.signal }
        );
        return await this.place(join(workDir, 'output.mp4'), target, 'mp4');
      }

      const files = await this.downloadSegments(playlist, workDir, request);
      log.debug({ url, segments: files.length }, 'Segments downloaded');

      if (this.options.useFfmpeg) {
        return await this.remux(files, playlist.initSegment !== null, workDir, target, request);
      }
      return await this.concatenate(files, playlist.initSegment !== null, workDir, target);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async resolveMediaPlaylist(
    startUrl: string,
    request: HandlerRequest
  ): Promise<{ url: string; playlist: MediaPlaylist }> {
    let url = startUrl;

    for (let hop = 0; hop <= MAX_VARIANT_HOPS; hop++) {
      const playlist = parseHlsPlaylist(await this.fetchText(url, request), url);
      if (playlist.type === 'media') {
        return { url, playlist };
      }

      const best = selectBestVariant(playlist.variants);
      if (!best) {
        break;
      }
      log.debug({ url, variant: best.uri, bandwidth: best.bandwidth }, 'Selected variant');
      url = best.uri;
    }

    throw new InvalidMediaResponseError(startUrl, 'no media playlist reachable');
  }

  private async fetchText(url: string, request: HandlerRequest): Promise<string> {
    const response = await this.transport.request(url, {
      method: 'GET',
      headers: request.headers,
      proxy: request.proxy,
      timeoutMs: this.options.timeoutMs,
      signal: request.signal,
    });

    try {
      this.assertOk(url, response.status);
      const chunks: Uint8Array[] = [];
      for await (const chunk of response.body) {
        chunks.push(chunk);
      }
      return Buffer.concat(chunks).toString('utf8');
    } finally {
      await response.discard();
    }
  }

  /**
   * Download every segment with bounded concurrency. The first failure
   * aborts the rest.
   */
  private async downloadSegments(
    playlist: MediaPlaylist,
    workDir: string,
    request: HandlerRequest
  ): Promise<string[]> {
    const segmentExt = playlist.initSegment ? 'm4s' : 'ts';
    const sources: SegmentFile[] = playlist.segments.map((url, i) => ({
      url,
      name: `seg_${String(i).padStart(5, '0')}.${segmentExt}`,
    }));
    if (playlist.initSegment) {
      sources.unshift({ url: playlist.initSegment, name: 'init.mp4' });
    }

    const limiter = new ConcurrencyLimiter(this.options.segmentConcurrency);
    const controller = new AbortController();
    const signal = request.signal ? AbortSignal.any([request.signal, controller.signal]) : controller.signal;
    let firstError: unknown = null;
    let failed = false;

    await Promise.all(
      sources.map((source) =>
        limiter
          .run(() => this.downloadSegment(source, workDir, { ...request, signal }), signal)
          .catch((error: unknown) => {
            if (!failed) {
              failed = true;
              firstError = error;
              controller.abort(error);
            }
          })
      )
    );

    if (failed) {
      throw firstError;
    }
    return sources.map((source) => join(workDir, source.name));
  }

  private async downloadSegment(
    source: SegmentFile,
    workDir: string,
    request: HandlerRequest
  ): Promise<void> {
    const response = await this.transport.request(source.url, {
      method: 'GET',
      headers: request.headers,
      proxy: request.proxy,
      timeoutMs: this.options.timeoutMs,
      signal: request.signal,
    });

    try {
      this.assertOk(source.url, response.status, true);
      await writeStreamAtomic(join(workDir, source.name), response.body);
    } finally {
      await response.discard();
    }
  }

  private async remux(
    files: string[],
    hasInit: boolean,
    workDir: string,
    target: FetchTarget,
    request: HandlerRequest
  ): Promise<FetchedFile> {
    let entries = files.map((file) => basename(file));

    if (hasInit) {
      // fMP4 fragments only parse with the init segment in front
      await writeStreamAtomic(join(workDir, 'joined.mp4'), concatFiles(files));
      entries = ['joined.mp4'];
    }

    await writeFile(join(workDir, 'list.txt'), buildConcatList(entries));
    await this.remuxer.execute(
      this.remuxer.buildConcatCommand('list.txt', 'output.mp4'),
      { cwd: workDir, signal: request.signal }
    );

    return this.place(join(workDir, 'output.mp4'), target, 'mp4');
  }

  private async concatenate(
    files: string[],
    hasInit: boolean,
    workDir: string,
    target: FetchTarget
  ): Promise<FetchedFile> {
    const extension = hasInit ? 'mp4' : 'ts';
    const joined = join(workDir, `joined.${extension}`);
    await writeStreamAtomic(joined, concatFiles(files));
    return this.place(joined, target, extension);
  }

  private async place(source: string, target: FetchTarget, extension: string): Promise<FetchedFile> {
    const filePath = join(target.cacheDir, `${target.stem}.${extension}`);
    await moveFile(source, filePath);
    return { filePath, sizeMb: bytesToMb(await getFileSizeBytes(filePath)) };
  }

  private assertOk(url: string, status: number, allowPartial = false): void {
    if (status === 403) {
      throw new AccessDeniedError(url);
    }
    if (status !== 200 && !(allowPartial && status === 206)) {
      throw new InvalidMediaResponseError(url, `HTTP ${status}`);
    }
  }
}
