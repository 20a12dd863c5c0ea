/**
 * Media Stager
 *
 * Per-post acquisition policy: probe sizes, decide between direct links and
 * local files, fetch what must be fetched and report one decision.
 *
 * Flow:
 * 1. shutting down → cancelled; no slots → no-media
 * 2. size limit set → probe videos, reject when the largest is over it
 * 3. pre-fetch mode → download everything
 * 4. direct mode → probe the rest, download only forced or large slots
 * 5. decision from what is usable
 */

import type {
  AcquisitionDecision,
  Failure,
  FetchResult,
  MediaKind,
  MediaPost,
  MediaSlot,
  SlotDelivery,
  StagedPost,
  StagingConfig,
} from '@mediastage/core';
import { ShutdownError, resolveStagingConfig } from '@mediastage/core';
import {
  createLogger,
  errorMessage,
  executeCommand,
  formatDuration,
  formatSizeMb,
  isDirectoryWritable,
  type CommandRunner,
} from '@mediastage/utils';
import { BatchExecutor, settleOutcomes, type BatchJob } from './batch.js';
import { CandidateFetcher, toFailure } from './fetcher.js';
import { FileHandler } from './handlers/fileHandler.js';
import { Remuxer } from './handlers/ffmpeg.js';
import { HlsHandler } from './handlers/hls.js';
import { LifecycleManager } from './lifecycle.js';
import { ConcurrencyLimiter } from './limiter.js';
import { createMediaId, createRunToken } from './mediaId.js';
import { MediaProbe, type ProbeRequest, type SlotProbeResult } from './probe.js';
import { UndiciTransport, type HttpTransport } from './transport.js';

const log = createLogger({ component: 'stager' });

export interface MediaStagerDeps {
  transport?: HttpTransport;
  lifecycle?: LifecycleManager;
  /** Suffix shared by every media id of this instance */
  runToken?: string;
  commandRunner?: CommandRunner;
}

/** A slot plus its position across the whole post (videos first) */
interface PlannedSlot {
  slot: MediaSlot;
  ordinal: number;
}

interface SlotState {
  delivery: SlotDelivery;
  forbidden: boolean;
  /** Fetched locally because of its size rather than a force flag */
  escalatedForSize: boolean;
}

interface Outcome {
  decision?: AcquisitionDecision;
  states: SlotState[];
  videoCount: number;
  droppedVideos: number;
  /** A dropped video had been refused with 403 */
  droppedForbidden?: boolean;
  probeSizes?: Array<number | null>;
}

function maxMeasured(sizes: ReadonlyArray<number | null>): number | null {
  let max: number | null = null;
  for (const size of sizes) {
    if (size !== null && (max === null || size > max)) {
      max = size;
    }
  }
  return max;
}

function sumMeasured(sizes: ReadonlyArray<number | null>): number {
  return sizes.reduce<number>((total, size) => total + (size ?? 0), 0);
}

function failedProbe(url: string): SlotProbeResult {
  return { status: 'unreachable', sizeMb: null, url, forbidden: false };
}

export class MediaStager {
  readonly config: StagingConfig;
  readonly lifecycle: LifecycleManager;

  private readonly runToken: string;
  private readonly probe: MediaProbe;
  private readonly fetcher: CandidateFetcher;
  private readonly executor: BatchExecutor;

  /**
   * @throws ConfigurationError when the merged config is invalid
   */
  constructor(config: Partial<StagingConfig> = {}, deps: MediaStagerDeps = {}) {
    this.config = resolveStagingConfig(config);
    this.lifecycle = deps.lifecycle ?? new LifecycleManager();
    this.runToken = deps.runToken ?? createRunToken();

    const transport = deps.transport ?? new UndiciTransport();
    this.lifecycle.registerSession(transport);

    const remuxer = new Remuxer(deps.commandRunner ?? executeCommand, {
      ffmpegPath: this.config.ffmpegPath,
      timeoutMs: this.config.fetchTimeoutMs,
    });

    this.probe = new MediaProbe(transport, this.lifecycle, { timeoutMs: this.config.probeTimeoutMs });
    this.fetcher = new CandidateFetcher(
      {
        file: new FileHandler(transport, { timeoutMs: this.config.fetchTimeoutMs }),
        segmented: new HlsHandler(transport, remuxer, {
          useFfmpeg: this.config.useFfmpeg,
          timeoutMs: this.config.segmentTimeoutMs,
          segmentConcurrency: this.config.segmentConcurrency,
        }),
      },
      this.lifecycle,
      this.config.cacheDir
    );
    this.executor = new BatchExecutor(new ConcurrencyLimiter(this.config.maxConcurrentDownloads));
  }

  /**
   * Stage one post. Expected failures end up in the decision; only
   * programming errors are thrown.
   */
  async stage(post: MediaPost): Promise<StagedPost> {
    const slotCount = post.videoSlots.length + post.imageSlots.length;

    if (this.lifecycle.isShuttingDown) {
      return this.buildReport(post, null, this.cancelledOutcome(post));
    }
    if (slotCount === 0) {
      return this.buildReport(post, null, {
        decision: { status: 'no-media' },
        states: [],
        videoCount: 0,
        droppedVideos: 0,
      });
    }

    const mediaId = createMediaId(post.platform, post.sourceUrl, this.runToken);
    const postLog = log.child({ mediaId, source: post.sourceUrl });
    const startedAt = Date.now();

    try {
      const outcome = await this.lifecycle.track((signal) => this.run(post, mediaId, signal));
      const staged = this.buildReport(post, mediaId, outcome);
      postLog.info(
        {
          decision: staged.decision.status,
          videos: staged.videoCount,
          images: staged.imageCount,
          local: staged.useLocalFiles,
          maxVideoSize: formatSizeMb(staged.maxVideoSizeMb),
          elapsed: formatDuration(Date.now() - startedAt),
        },
        'Post staged'
      );
      return staged;
    } catch (error) {
      if (error instanceof ShutdownError) {
        return this.buildReport(post, mediaId, this.cancelledOutcome(post));
      }
      throw error;
    }
  }

  /**
   * Stage posts one after another. A post that throws is reported as
   * `no-valid-media` and the rest continue.
   */
  async stageAll(posts: readonly MediaPost[]): Promise<StagedPost[]> {
    const staged: StagedPost[] = [];

    for (const post of posts) {
      try {
        staged.push(await this.stage(post));
      } catch (error) {
        log.error({ source: post.sourceUrl, error: errorMessage(error) }, 'Failed to stage post');
        staged.push(
          this.buildReport(post, null, {
            decision: { status: 'no-valid-media', error: errorMessage(error) },
            states: [],
            videoCount: post.videoSlots.length,
            droppedVideos: 0,
          })
        );
      }
    }

    return staged;
  }

  /**
   * Delete the local files of a staged post
   */
  cleanup(staged: Pick<StagedPost, 'filePaths'>): Promise<number> {
    return this.lifecycle.cleanupFiles(staged.filePaths);
  }

  shutdown(): Promise<void> {
    return this.lifecycle.shutdown();
  }

  private async run(post: MediaPost, mediaId: string, signal: AbortSignal): Promise<Outcome> {
    const limit = this.config.maxVideoSizeMb;
    const videos = this.plan(post.videoSlots, 0);
    const images = this.plan(post.imageSlots, videos.length);

    // Size gate
    let videoProbes: SlotProbeResult[] | null = null;
    if (limit > 0 && videos.length > 0) {
      videoProbes = await this.probeSlots(post, videos, signal);
      if (this.lifecycle.isShuttingDown) {
        return this.cancelledOutcome(post);
      }

      const largest = maxMeasured(videoProbes.map((probe) => probe.sizeMb));
      if (largest !== null && largest > limit) {
        log.info({ mediaId, largest: formatSizeMb(largest), limit }, 'Video over size limit');
        return this.rejectedOutcome(post, largest, videoProbes, []);
      }
    }

    if (this.config.prefetchAll && (await this.isCacheUsable())) {
      return this.runPrefetch(post, mediaId, [...videos, ...images], videoProbes, signal);
    }
    return this.runDirect(post, mediaId, videos, images, videoProbes, signal);
  }

  private async runPrefetch(
    post: MediaPost,
    mediaId: string,
    planned: PlannedSlot[],
    videoProbes: SlotProbeResult[] | null,
    signal: AbortSignal
  ): Promise<Outcome> {
    const results = await this.fetchSlots(post, mediaId, planned, signal);
    if (this.lifecycle.isShuttingDown) {
      await this.lifecycle.cleanupFiles(results.map((result) => result.filePath));
      return this.cancelledOutcome(post);
    }

    const videoCount = post.videoSlots.length;
    const videoResults = results.slice(0, videoCount);
    const imageResults = results.slice(videoCount);

    const dropVideos = post.forceLocal.video
      && videoResults.length > 0
      && videoResults.every((result) => !result.success);

    const videoSizes = videoResults.map((result, i) =>
      result.success && result.sizeMb !== null ? result.sizeMb : videoProbes?.[i]?.sizeMb ?? null
    );

    const limit = this.config.maxVideoSizeMb;
    const largest = maxMeasured(videoSizes);
    if (!dropVideos && limit > 0 && largest !== null && largest > limit) {
      await this.lifecycle.cleanupFiles(results.map((result) => result.filePath));
      return this.rejectedOutcome(post, largest, videoProbes, videoSizes);
    }

    const kept = dropVideos ? imageResults : results;
    if (dropVideos) {
      log.debug({ mediaId }, 'Forced-local videos all failed, dropping them');
    }

    return {
      states: kept.map((result, i) => ({
        delivery: this.fetchDelivery(result, dropVideos ? null : videoSizes[i] ?? null),
        forbidden: result.forbidden,
        escalatedForSize: false,
      })),
      videoCount: dropVideos ? 0 : videoCount,
      droppedVideos: dropVideos ? videoCount : 0,
      droppedForbidden: dropVideos && videoResults.some((result) => result.forbidden),
      probeSizes: videoProbes?.map((probe) => probe.sizeMb),
    };
  }

  private async runDirect(
    post: MediaPost,
    mediaId: string,
    videos: PlannedSlot[],
    images: PlannedSlot[],
    videoProbes: SlotProbeResult[] | null,
    signal: AbortSignal
  ): Promise<Outcome> {
    const toProbe = videoProbes ? images : [...videos, ...images];
    const probed = await this.probeSlots(post, toProbe, signal);
    if (this.lifecycle.isShuttingDown) {
      return this.cancelledOutcome(post);
    }

    const probes = videoProbes ? [...videoProbes, ...probed] : probed;
    const planned = [...videos, ...images];

    // Which slots go to the cache
    const escalation = planned.map(({ slot }, i) => {
      const probe = probes[i] ?? failedProbe(slot.candidates[0].url);
      if (post.forceLocal[slot.kind]) {
        return 'forced' as const;
      }
      return this.isLarge(slot.kind, probe) ? ('large' as const) : null;
    });

    const escalated = planned.filter((_, i) => escalation[i] !== null);
    let fetched: FetchResult[] = [];
    if (escalated.length > 0) {
      if (await this.isCacheUsable()) {
        fetched = await this.fetchSlots(post, mediaId, escalated, signal);
        if (this.lifecycle.isShuttingDown) {
          await this.lifecycle.cleanupFiles(fetched.map((result) => result.filePath));
          return this.cancelledOutcome(post);
        }
      } else {
        log.warn({ mediaId, cacheDir: this.config.cacheDir, slots: escalated.length }, 'Cache unavailable for local fetch');
      }
    }
    const fetchedByOrdinal = new Map(fetched.map((result) => [result.ordinal, result]));

    const states: SlotState[] = planned.map(({ slot, ordinal }, i) => {
      const probe = probes[i] ?? failedProbe(slot.candidates[0].url);
      const reason = escalation[i] ?? null;

      if (reason === null) {
        return this.directState(slot, probe);
      }

      const result = fetchedByOrdinal.get(ordinal);
      if (!result) {
        return {
          delivery: this.failedDelivery(slot, { kind: 'cache-unavailable', message: 'Cache directory is not usable' }),
          forbidden: probe.forbidden,
          escalatedForSize: false,
        };
      }
      return {
        delivery: this.fetchDelivery(result, null),
        forbidden: probe.forbidden || result.forbidden,
        escalatedForSize: reason === 'large' && result.success,
      };
    });

    const videoStates = states.slice(0, videos.length);
    const dropVideos = post.forceLocal.video
      && videoStates.length > 0
      && videoStates.every((state) => state.delivery.mode === 'failed');

    if (dropVideos) {
      log.debug({ mediaId }, 'Forced-local videos all failed, dropping them');
    } else {
      const limit = this.config.maxVideoSizeMb;
      const localSizes = videoStates.map((state) =>
        state.delivery.mode === 'local' ? state.delivery.sizeMb : null
      );
      const largest = maxMeasured(localSizes);
      if (limit > 0 && largest !== null && largest > limit) {
        await this.lifecycle.cleanupFiles(fetched.map((result) => result.filePath));
        return this.rejectedOutcome(post, largest, probes.slice(0, videos.length), localSizes);
      }
    }

    return {
      states: dropVideos ? states.slice(videos.length) : states,
      videoCount: dropVideos ? 0 : videos.length,
      droppedVideos: dropVideos ? videos.length : 0,
      droppedForbidden: dropVideos && videoStates.some((state) => state.forbidden),
      probeSizes: probes.slice(0, videos.length).map((probe) => probe.sizeMb),
    };
  }

  private plan(slots: readonly MediaSlot[], offset: number): PlannedSlot[] {
    return slots.map((slot, i) => ({ slot, ordinal: offset + i }));
  }

  private probeRequest(post: MediaPost, kind: MediaKind, signal: AbortSignal): ProbeRequest {
    return {
      headers: kind === 'video' ? post.videoHeaders : post.imageHeaders,
      proxy: post.proxy[kind] ? post.proxy.url : undefined,
      signal,
    };
  }

  private async probeSlots(
    post: MediaPost,
    planned: readonly PlannedSlot[],
    signal: AbortSignal
  ): Promise<SlotProbeResult[]> {
    const jobs: Array<BatchJob<SlotProbeResult>> = planned.map(({ slot }) => (jobSignal: AbortSignal) =>
      this.probe.probeSlot(slot, this.probeRequest(post, slot.kind, jobSignal))
    );
    const outcomes = await this.executor.run(jobs, { signal });

    return settleOutcomes(outcomes, (outcome) => {
      const url = planned[outcome.index]?.slot.candidates[0].url ?? '';
      return outcome.status === 'cancelled'
        ? { status: 'skipped', sizeMb: null, url, forbidden: false }
        : failedProbe(url);
    });
  }

  private async fetchSlots(
    post: MediaPost,
    mediaId: string,
    planned: readonly PlannedSlot[],
    signal: AbortSignal
  ): Promise<FetchResult[]> {
    const jobs: Array<BatchJob<FetchResult>> = planned.map(({ slot, ordinal }) => (jobSignal: AbortSignal) =>
      this.fetcher.fetchSlot(slot, {
        mediaId,
        ordinal,
        ...this.probeRequest(post, slot.kind, jobSignal),
      })
    );
    const outcomes = await this.executor.run(jobs, { signal });

    return settleOutcomes(outcomes, (outcome): FetchResult => {
      const entry = planned[outcome.index];
      return {
        success: false,
        kind: entry?.slot.kind ?? 'video',
        index: entry?.slot.index ?? outcome.index,
        ordinal: entry?.ordinal ?? outcome.index,
        filePath: null,
        sizeMb: null,
        url: null,
        forbidden: false,
        failure: outcome.status === 'cancelled'
          ? { kind: 'cancelled', message: 'Shutdown in progress' }
          : toFailure(outcome.error),
      };
    });
  }

  /**
   * Large-media rule: kind listed and either threshold 0 or measured size
   * above it. Slots whose probe already failed are not escalated.
   */
  private isLarge(kind: MediaKind, probe: SlotProbeResult): boolean {
    if (!this.config.largeMediaKinds.includes(kind)) {
      return false;
    }
    if (probe.status !== 'ok' && probe.status !== 'unreachable') {
      return false;
    }
    const threshold = this.config.largeVideoThresholdMb;
    return threshold === 0 || (probe.sizeMb !== null && probe.sizeMb > threshold);
  }

  private isCacheUsable(): Promise<boolean> {
    return isDirectoryWritable(this.config.cacheDir);
  }

  private directState(slot: MediaSlot, probe: SlotProbeResult): SlotState {
    if (probe.status === 'ok' || probe.status === 'unreachable') {
      return {
        delivery: { kind: slot.kind, index: slot.index, mode: 'direct', url: probe.url, filePath: null, sizeMb: probe.sizeMb },
        forbidden: probe.forbidden,
        escalatedForSize: false,
      };
    }

    const failure: Failure = probe.status === 'forbidden' || probe.forbidden
      ? { kind: 'access-denied', message: `Access denied for ${probe.url}` }
      : { kind: 'invalid-media-response', message: `No valid media at ${probe.url}` };
    return { delivery: this.failedDelivery(slot, failure), forbidden: probe.forbidden, escalatedForSize: false };
  }

  private fetchDelivery(result: FetchResult, sizeMb: number | null): SlotDelivery {
    if (!result.success) {
      return {
        kind: result.kind,
        index: result.index,
        mode: 'failed',
        url: null,
        filePath: null,
        sizeMb: null,
        failure: result.failure,
      };
    }
    return {
      kind: result.kind,
      index: result.index,
      mode: 'local',
      url: result.url,
      filePath: result.filePath,
      sizeMb: result.sizeMb ?? sizeMb,
    };
  }

  private failedDelivery(slot: MediaSlot, failure: Failure): SlotDelivery {
    return { kind: slot.kind, index: slot.index, mode: 'failed', url: null, filePath: null, sizeMb: null, failure };
  }

  private cancelledOutcome(post: MediaPost): Outcome {
    return {
      decision: { status: 'cancelled' },
      states: [],
      videoCount: post.videoSlots.length,
      droppedVideos: 0,
    };
  }

  private rejectedOutcome(
    post: MediaPost,
    largest: number,
    videoProbes: SlotProbeResult[] | null,
    measured: Array<number | null>
  ): Outcome {
    const failure: Failure = {
      kind: 'size-exceeded',
      message: `Video of ${formatSizeMb(largest)} exceeds the ${this.config.maxVideoSizeMb}MB limit`,
    };
    const slots = [...post.videoSlots, ...post.imageSlots];

    return {
      decision: { status: 'rejected-too-large', maxVideoSizeMb: largest, limitMb: this.config.maxVideoSizeMb },
      states: slots.map((slot, i) => ({
        delivery: this.failedDelivery(slot, failure),
        forbidden: videoProbes?.[i]?.forbidden ?? false,
        escalatedForSize: false,
      })),
      videoCount: post.videoSlots.length,
      droppedVideos: 0,
      probeSizes: post.videoSlots.map((_, i) => measured[i] ?? videoProbes?.[i]?.sizeMb ?? null),
    };
  }

  private buildReport(post: MediaPost, mediaId: string | null, outcome: Outcome): StagedPost {
    const deliveries = outcome.states.map((state) => state.delivery);
    const videoDeliveries = deliveries.filter((delivery) => delivery.kind === 'video');
    const imageDeliveries = deliveries.filter((delivery) => delivery.kind === 'image');

    const videoSizes = outcome.decision?.status === 'rejected-too-large'
      ? outcome.probeSizes ?? []
      : videoDeliveries.map((delivery, i) =>
          delivery.mode === 'failed' ? null : delivery.sizeMb ?? outcome.probeSizes?.[i] ?? null
        );

    const failedVideoCount = videoDeliveries.filter((delivery) => delivery.mode === 'failed').length
      + outcome.droppedVideos;
    const failedImageCount = imageDeliveries.filter((delivery) => delivery.mode === 'failed').length;
    const usable = deliveries.filter((delivery) => delivery.mode !== 'failed');
    const useLocalFiles = usable.some((delivery) => delivery.mode === 'local');

    const decision: AcquisitionDecision = outcome.decision ?? (
      usable.length === 0
        ? { status: 'no-valid-media' }
        : failedVideoCount + failedImageCount > 0
          ? { status: 'accepted-partial', failedVideoCount, failedImageCount }
          : useLocalFiles
            ? { status: 'accepted-local-files' }
            : { status: 'accepted-direct-link' }
    );

    return {
      ...post,
      decision,
      mediaId,
      deliveries,
      videoSizes,
      maxVideoSizeMb: maxMeasured(videoSizes),
      totalVideoSizeMb: sumMeasured(videoSizes),
      videoCount: outcome.videoCount,
      imageCount: post.imageSlots.length,
      failedVideoCount,
      failedImageCount,
      useLocalFiles,
      filePaths: deliveries.map((delivery) => (delivery.mode === 'local' ? delivery.filePath : null)),
      exceedsMaxSize: decision.status === 'rejected-too-large',
      hasValidMedia: usable.length > 0,
      hasAccessDenied: outcome.droppedForbidden === true || outcome.states.some((state) => state.forbidden),
      isLargeMedia: outcome.states.some((state) => state.escalatedForSize),
    };
  }
}
