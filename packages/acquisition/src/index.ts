/**
 * @mediastage/acquisition
 *
 * Media acquisition pipeline.
 *
 * Responsibilities:
 * - Classify media URLs (image, video, segmented stream)
 * - Probe size and validity before committing to a transfer
 * - Fetch candidates into the cache (plain files, HLS streams)
 * - Bound concurrency and isolate failures across a batch
 * - Decide per post between direct links and local files
 * - Cooperative shutdown
 */

// Classification
export {
  detectMediaUrl,
  classifyMediaUrl,
  inferExtension,
  IMAGE_EXTENSIONS,
  VIDEO_EXTENSIONS,
  type MediaUrlKind,
  type MediaUrlDetection,
  type DetectionSource,
} from './classifier.js';

// Transport
export {
  UndiciTransport,
  type HttpTransport,
  type HttpRequestOptions,
  type HttpResponse,
  type HttpMethod,
} from './transport.js';

// Probe
export {
  MediaProbe,
  inspectMediaResponse,
  peekBody,
  looksLikeErrorPayload,
  extractSizeMb,
  SNIFF_BYTES,
  type ProbeRequest,
  type SlotProbeResult,
  type ResponseInspection,
  type MediaProbeOptions,
} from './probe.js';

// Fetching
export {
  CandidateFetcher,
  cacheStem,
  toFailure,
  type FetchRequest,
  type FetcherHandlers,
} from './fetcher.js';
export { FileHandler, type FileHandlerOptions } from './handlers/fileHandler.js';
export { HlsHandler, type HlsHandlerOptions } from './handlers/hls.js';
export { Remuxer, buildConcatList, type RemuxerOptions } from './handlers/ffmpeg.js';
export {
  parseHlsPlaylist,
  selectBestVariant,
  type HlsPlaylist,
  type HlsVariant,
} from './handlers/playlist.js';
export type {
  MediaHandler,
  FetchTarget,
  FetchedFile,
  HandlerRequest,
} from './handlers/types.js';

// Concurrency
export { ConcurrencyLimiter } from './limiter.js';
export {
  BatchExecutor,
  settleOutcomes,
  type BatchJob,
  type BatchOutcome,
  type BatchRunOptions,
} from './batch.js';

// Lifecycle
export { LifecycleManager, type Closeable } from './lifecycle.js';

// Media id
export { createMediaId, createRunToken, extractNumericId } from './mediaId.js';

// Policy engine
export { MediaStager, type MediaStagerDeps } from './stager.js';
