/**
 * Media Types
 *
 * The record a post travels through the pipeline as.
 */

export type MediaKind = 'video' | 'image';

export type PostKind = 'video' | 'image' | 'mixed' | 'gallery';

/**
 * How a candidate URL must be handled.
 * - plain: ordinary file URL
 * - segmented: HLS playlist, assembled into one file
 * - range: host only answers ranged requests (206)
 */
export type UrlTag = 'plain' | 'segmented' | 'range';

export interface MediaCandidate {
  url: string;
  tag: UrlTag;
}

/**
 * One deliverable item. Candidates are a fallback list: the first that
 * succeeds wins, later ones are never merged in.
 */
export interface MediaSlot {
  kind: MediaKind;
  /** Position among the post's slots of the same kind */
  index: number;
  candidates: [MediaCandidate, ...MediaCandidate[]];
}

export interface ProxySelection {
  url?: string;
  video: boolean;
  image: boolean;
}

export interface KindFlags {
  video: boolean;
  image: boolean;
}

export interface MediaPost {
  sourceUrl: string;
  platform: string;
  postKind: PostKind;
  videoSlots: MediaSlot[];
  imageSlots: MediaSlot[];
  videoHeaders: Record<string, string>;
  imageHeaders: Record<string, string>;
  proxy: ProxySelection;
  /** Direct links of this kind are known to be unusable; fetch locally */
  forceLocal: KindFlags;
  title?: string;
  author?: string;
}

export type ProbeStatus = 'ok' | 'forbidden' | 'invalid' | 'unreachable' | 'skipped';

export interface ProbeResult {
  status: ProbeStatus;
  /** null when the size could not be determined */
  sizeMb: number | null;
  url: string;
}

export type FailureKind =
  | 'transport'
  | 'access-denied'
  | 'invalid-media-response'
  | 'size-exceeded'
  | 'remux-failed'
  | 'io'
  | 'cache-unavailable'
  | 'cancelled';

export interface Failure {
  kind: FailureKind;
  message: string;
}

export interface FetchResult {
  success: boolean;
  kind: MediaKind;
  index: number;
  /** Position across the whole post (videos first), used in cache filenames */
  ordinal: number;
  filePath: string | null;
  sizeMb: number | null;
  /** Candidate URL that produced the file */
  url: string | null;
  /** Some candidate answered 403 */
  forbidden: boolean;
  failure?: Failure;
}
