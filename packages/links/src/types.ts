/**
 * Link Recognition Types
 */

import type { MediaPost, MediaPostInput } from '@mediastage/core';

/**
 * Turns links of one platform into post records
 */
export interface MediaParser {
  /** Platform name carried into the post */
  readonly platform: string;
  canHandle(url: string): boolean;
  /** Links in `text` this parser can handle, in order of appearance */
  extractLinks(text: string): string[];
  parse(url: string, signal?: AbortSignal): Promise<MediaPostInput>;
}

export interface RecognizedLink {
  url: string;
  parser: MediaParser;
}

export interface ParseFailure {
  url: string;
  platform: string;
  error: string;
}

export interface ParseTextResult {
  posts: MediaPost[];
  failures: ParseFailure[];
}
