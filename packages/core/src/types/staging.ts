/**
 * Staging Types
 *
 * What the acquisition pipeline hands to message assembly.
 */

import type { Failure, MediaKind, MediaPost } from './media.js';

export type AcquisitionDecision =
  | { status: 'no-media' }
  | { status: 'cancelled' }
  | { status: 'rejected-too-large'; maxVideoSizeMb: number; limitMb: number }
  | { status: 'accepted-direct-link' }
  | { status: 'accepted-local-files' }
  | { status: 'accepted-partial'; failedVideoCount: number; failedImageCount: number }
  | { status: 'no-valid-media'; error?: string };

export type DecisionStatus = AcquisitionDecision['status'];

export type DeliveryMode = 'direct' | 'local' | 'failed';

export interface SlotDelivery {
  kind: MediaKind;
  index: number;
  mode: DeliveryMode;
  /** Direct link, or the candidate a local file came from */
  url: string | null;
  filePath: string | null;
  sizeMb: number | null;
  failure?: Failure;
}

export interface StagingReport {
  decision: AcquisitionDecision;
  mediaId: string | null;
  /** One entry per delivered slot: videos first, then images */
  deliveries: SlotDelivery[];
  videoSizes: Array<number | null>;
  maxVideoSizeMb: number | null;
  totalVideoSizeMb: number;
  videoCount: number;
  imageCount: number;
  failedVideoCount: number;
  failedImageCount: number;
  useLocalFiles: boolean;
  /** Aligned with `deliveries`; null where the slot is not a local file */
  filePaths: Array<string | null>;
  exceedsMaxSize: boolean;
  hasValidMedia: boolean;
  hasAccessDenied: boolean;
  /** At least one slot was fetched locally because of its size */
  isLargeMedia: boolean;
}

export type StagedPost = MediaPost & StagingReport;

export function isDeliverable(decision: AcquisitionDecision): boolean {
  switch (decision.status) {
    case 'accepted-direct-link':
    case 'accepted-local-files':
    case 'accepted-partial':
      return true;
    default:
      return false;
  }
}
