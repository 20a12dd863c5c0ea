/**
 * Post Input Schema
 *
 * Validates the record produced by link recognition and normalizes it into
 * a `MediaPost`. Missing optional fields default to empty/false.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type {
  MediaCandidate,
  MediaKind,
  MediaPost,
  MediaSlot,
  PostKind,
} from '../types/media.js';

export const urlTagSchema = z.enum(['plain', 'segmented', 'range']);

export const postKindSchema = z.enum(['video', 'image', 'mixed', 'gallery']);

const candidateSchema = z.union([
  z.string().trim().min(1),
  z.object({
    url: z.string().trim().min(1),
    tag: urlTagSchema.default('plain'),
  }),
]);

const headersSchema = z.record(z.string()).default({});

export const mediaPostInputSchema = z.object({
  url: z.string().trim().min(1, 'Source URL is required'),
  platform: z.string().trim().min(1).default('unknown'),
  kind: postKindSchema.optional(),
  videoUrls: z.array(z.array(candidateSchema)).default([]),
  imageUrls: z.array(z.array(candidateSchema)).default([]),
  videoHeaders: headersSchema,
  imageHeaders: headersSchema,
  proxyUrl: z.string().url().optional(),
  useVideoProxy: z.boolean().default(false),
  useImageProxy: z.boolean().default(false),
  forceLocalVideo: z.boolean().default(false),
  forceLocalImage: z.boolean().default(false),
  title: z.string().optional(),
  author: z.string().optional(),
});

/** What a parser hands over; defaults not yet applied */
export type MediaPostInput = z.input<typeof mediaPostInputSchema>;

type ParsedInput = z.output<typeof mediaPostInputSchema>;
type ParsedCandidate = z.output<typeof candidateSchema>;

function toCandidate(raw: ParsedCandidate): MediaCandidate {
  return typeof raw === 'string' ? { url: raw, tag: 'plain' } : raw;
}

/**
 * Build slots of one kind, skipping empty candidate lists
 */
function buildSlots(kind: MediaKind, lists: ParsedCandidate[][]): MediaSlot[] {
  const slots: MediaSlot[] = [];

  for (const list of lists) {
    const [first, ...rest] = list.map(toCandidate);
    if (first === undefined) {
      continue;
    }
    slots.push({ kind, index: slots.length, candidates: [first, ...rest] });
  }

  return slots;
}

function derivePostKind(videoCount: number, imageCount: number): PostKind {
  if (videoCount > 0 && imageCount > 0) {
    return 'mixed';
  }
  if (videoCount > 0) {
    return 'video';
  }
  return imageCount > 1 ? 'gallery' : 'image';
}

function toMediaPost(input: ParsedInput): MediaPost {
  const videoSlots = buildSlots('video', input.videoUrls);
  const imageSlots = buildSlots('image', input.imageUrls);

  return {
    sourceUrl: input.url,
    platform: input.platform,
    postKind: input.kind ?? derivePostKind(videoSlots.length, imageSlots.length),
    videoSlots,
    imageSlots,
    videoHeaders: input.videoHeaders,
    imageHeaders: input.imageHeaders,
    proxy: {
      url: input.proxyUrl,
      video: input.useVideoProxy,
      image: input.useImageProxy,
    },
    forceLocal: {
      video: input.forceLocalVideo,
      image: input.forceLocalImage,
    },
    title: input.title,
    author: input.author,
  };
}

/**
 * Validate a raw post record and normalize it.
 *
 * @throws ValidationError listing every failing field
 */
export function parseMediaPost(input: unknown): MediaPost {
  const result = mediaPostInputSchema.safeParse(input);

  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)');
    const messages = result.error.issues.map((issue) => issue.message);
    throw new ValidationError(fields.join(', '), messages.join('; '));
  }

  return toMediaPost(result.data);
}
