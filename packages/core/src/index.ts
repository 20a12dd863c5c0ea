/**
 * @mediastage/core
 * 
 * Core package containing:
 * - Media and staging types
 * - Post input schema and normalization
 * - Custom error classes
 * - Configuration loading
 */

// Types
export type {
  MediaKind,
  PostKind,
  UrlTag,
  MediaCandidate,
  MediaSlot,
  ProxySelection,
  KindFlags,
  MediaPost,
  ProbeStatus,
  ProbeResult,
  FailureKind,
  Failure,
  FetchResult,
} from './types/media.js';

export {
  isDeliverable,
  type AcquisitionDecision,
  type DecisionStatus,
  type DeliveryMode,
  type SlotDelivery,
  type StagingReport,
  type StagedPost,
} from './types/staging.js';

// Input schema
export {
  mediaPostInputSchema,
  urlTagSchema,
  postKindSchema,
  parseMediaPost,
  type MediaPostInput,
} from './schema/post.js';

// Errors
export {
  MediaStageError,
  ValidationError,
  ConfigurationError,
  TransportError,
  CommandExecutionError,
  ShutdownError,
  AccessDeniedError,
  InvalidMediaResponseError,
  SizeExceededError,
} from './errors/index.js';

// Configuration
export {
  MAX_LARGE_VIDEO_THRESHOLD_MB,
  DEFAULT_STAGING_CONFIG,
  resolveStagingConfig,
  loadDotenv,
  loadConfig,
  applyProxyPolicy,
  type StagingConfig,
  type ProxyConfig,
  type AppConfig,
} from './config/index.js';
