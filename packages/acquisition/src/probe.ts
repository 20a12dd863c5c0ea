/**
 * Size & Validity Probe
 *
 * Checks a candidate before any transfer is committed: is it reachable,
 * is it media rather than an error page, and how large is it.
 *
 * HEAD is tried first. A failed HEAD, a status other than 200/403 or a
 * missing content type cannot be judged from headers alone, so a GET
 * follows whose body is sniffed and then discarded.
 */

import type { MediaCandidate, MediaSlot, ProbeResult } from '@mediastage/core';
import { bytesToMb, createLogger, errorMessage } from '@mediastage/utils';
import { classifyMediaUrl } from './classifier.js';
import type { LifecycleManager } from './lifecycle.js';
import type { HttpMethod, HttpResponse, HttpTransport } from './transport.js';

const log = createLogger({ component: 'probe' });

/** Bytes read when the content type is missing */
export const SNIFF_BYTES = 64;

const ERROR_MARKERS = ['{', '[', '<!doctype', '<html', '<error'];

export interface ProbeRequest {
  headers?: Record<string, string>;
  proxy?: string;
  signal?: AbortSignal;
}

export interface SlotProbeResult extends ProbeResult {
  /** Some candidate answered 403 */
  forbidden: boolean;
}

export type ResponseInspection =
  | { verdict: 'media'; body: AsyncIterable<Uint8Array> }
  | { verdict: 'invalid'; reason: string }
  | { verdict: 'inconclusive'; reason: string };

export interface InspectOptions {
  /** Accept 206 as well as 200 */
  allowPartial: boolean;
  /** Read a prefix when the content type is missing (never for HEAD) */
  sniffBody: boolean;
}

/**
 * True when the first bytes look like a JSON or HTML/XML error document
 */
export function looksLikeErrorPayload(prefix: Uint8Array): boolean {
  const text = Buffer.from(prefix).toString('utf8').trimStart().toLowerCase();
  return ERROR_MARKERS.some((marker) => text.startsWith(marker));
}

/**
 * Read up to `size` bytes without losing them: the returned body replays
 * the prefix and continues with the rest of the stream.
 */
export async function peekBody(
  body: AsyncIterable<Uint8Array>,
  size: number
): Promise<{ prefix: Uint8Array; body: AsyncIterable<Uint8Array> }> {
  const iterator = body[Symbol.asyncIterator]();
  const buffered: Uint8Array[] = [];
  let length = 0;
  let exhausted = false;

  while (length < size) {
    const next = await iterator.next();
    if (next.done) {
      exhausted = true;
      break;
    }
    buffered.push(next.value);
    length += next.value.byteLength;
  }

  async function* replay(): AsyncGenerator<Uint8Array> {
    yield* buffered;
    if (exhausted) {
      return;
    }
    for (;;) {
      const next = await iterator.next();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  }

  return { prefix: Buffer.concat(buffered).subarray(0, size), body: replay() };
}

/**
 * Judge whether a response carries media. 403 is left to the caller.
 */
export async function inspectMediaResponse(
  response: HttpResponse,
  options: InspectOptions
): Promise<ResponseInspection> {
  const okStatus = response.status === 200 || (options.allowPartial && response.status === 206);
  if (!okStatus) {
    return { verdict: 'inconclusive', reason: `HTTP ${response.status}` };
  }

  const contentType = (response.headers['content-type'] ?? '').trim().toLowerCase();
  if (contentType.startsWith('application/json') || contentType.startsWith('text/')) {
    return { verdict: 'invalid', reason: `non-media content type ${contentType}` };
  }
  if (contentType) {
    return { verdict: 'media', body: response.body };
  }

  if (!options.sniffBody) {
    return { verdict: 'inconclusive', reason: 'missing content type' };
  }

  const { prefix, body } = await peekBody(response.body, SNIFF_BYTES);
  if (prefix.byteLength === 0) {
    return { verdict: 'invalid', reason: 'empty body' };
  }
  if (looksLikeErrorPayload(prefix)) {
    return { verdict: 'invalid', reason: 'error payload' };
  }
  return { verdict: 'media', body };
}

/**
 * Size from `Content-Range` total, then `Content-Length`; null if neither
 */
export function extractSizeMb(headers: Record<string, string>): number | null {
  const range = headers['content-range'];
  if (range) {
    const total = /\/\s*(\d+)\s*$/.exec(range)?.[1];
    if (total !== undefined) {
      return bytesToMb(Number(total));
    }
  }

  const length = headers['content-length'];
  if (length !== undefined && /^\d+$/.test(length.trim())) {
    return bytesToMb(Number(length));
  }

  return null;
}

export interface MediaProbeOptions {
  timeoutMs: number;
}

export class MediaProbe {
  constructor(
    private readonly transport: HttpTransport,
    private readonly lifecycle: LifecycleManager,
    private readonly options: MediaProbeOptions
  ) {}

  /**
   * Probe one candidate. Never throws.
   */
  async probe(candidate: MediaCandidate, request: ProbeRequest = {}): Promise<ProbeResult> {
    const url = candidate.url;
    if (this.lifecycle.isShuttingDown) {
      return { status: 'skipped', sizeMb: null, url };
    }

    const segmented = candidate.tag === 'segmented' || classifyMediaUrl(url) === 'segmented';
    const ranged = candidate.tag === 'range';
    const headers = ranged ? { ...request.headers, range: 'bytes=0-' } : request.headers;

    try {
      const fromHead = await this.tryHead(url, headers, request, { segmented, ranged });
      if (fromHead) {
        return { ...fromHead, url };
      }
      if (this.lifecycle.isShuttingDown) {
        return { status: 'skipped', sizeMb: null, url };
      }

      const get = await this.send(url, 'GET', headers, request);
      try {
        const fromGet: Omit<ProbeResult, 'url'> =
          (await this.judge(get, { segmented, ranged, sniffBody: true })) ?? { status: 'invalid', sizeMb: null };
        return { ...fromGet, url };
      } finally {
        await get.discard();
      }
    } catch (error) {
      if (this.lifecycle.isShuttingDown) {
        return { status: 'skipped', sizeMb: null, url };
      }
      log.debug({ url, error: errorMessage(error) }, 'Probe could not reach candidate');
      return { status: 'unreachable', sizeMb: null, url };
    }
  }

  /**
   * Walk the slot's candidates: the first `ok` or `unreachable` wins,
   * otherwise the first candidate's failure is reported.
   */
  async probeSlot(slot: MediaSlot, request: ProbeRequest = {}): Promise<SlotProbeResult> {
    let firstFailure: ProbeResult | null = null;
    let forbidden = false;

    for (const candidate of slot.candidates) {
      const result = await this.probe(candidate, request);
      if (result.status === 'forbidden') {
        forbidden = true;
      }
      if (result.status === 'ok' || result.status === 'unreachable' || result.status === 'skipped') {
        return { ...result, forbidden };
      }
      firstFailure ??= result;
    }

    const failure: ProbeResult = firstFailure ?? { status: 'invalid', sizeMb: null, url: slot.candidates[0].url };
    log.debug({ kind: slot.kind, index: slot.index, status: failure.status }, 'No usable candidate');
    return { ...failure, forbidden };
  }

  /**
   * HEAD verdict, or null when HEAD failed or could not settle the question
   */
  private async tryHead(
    url: string,
    headers: Record<string, string> | undefined,
    request: ProbeRequest,
    mode: { segmented: boolean; ranged: boolean }
  ): Promise<Omit<ProbeResult, 'url'> | null> {
    try {
      const head = await this.send(url, 'HEAD', headers, request);
      await head.discard();
      return await this.judge(head, { ...mode, sniffBody: false });
    } catch (error) {
      log.debug({ url, error: errorMessage(error) }, 'HEAD failed, retrying with GET');
      return null;
    }
  }

  private send(
    url: string,
    method: HttpMethod,
    headers: Record<string, string> | undefined,
    request: ProbeRequest
  ): Promise<HttpResponse> {
    return this.transport.request(url, {
      method,
      headers,
      proxy: request.proxy,
      timeoutMs: this.options.timeoutMs,
      signal: request.signal,
    });
  }

  /**
   * @returns null when the response cannot settle the question
   */
  private async judge(
    response: HttpResponse,
    mode: { segmented: boolean; ranged: boolean; sniffBody: boolean }
  ): Promise<Omit<ProbeResult, 'url'> | null> {
    if (response.status === 403) {
      return { status: 'forbidden', sizeMb: null };
    }

    if (mode.segmented) {
      // A playlist's own size says nothing about the stream
      const reachable = response.status === 200 || (mode.ranged && response.status === 206);
      if (reachable) {
        return { status: 'ok', sizeMb: null };
      }
      return mode.sniffBody ? { status: 'invalid', sizeMb: null } : null;
    }

    const inspection = await inspectMediaResponse(response, {
      allowPartial: mode.ranged,
      sniffBody: mode.sniffBody,
    });

    switch (inspection.verdict) {
      case 'media':
        return { status: 'ok', sizeMb: extractSizeMb(response.headers) };
      case 'invalid':
        return { status: 'invalid', sizeMb: null };
      case 'inconclusive':
        return mode.sniffBody ? { status: 'invalid', sizeMb: null } : null;
    }
  }
}
