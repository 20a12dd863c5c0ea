/**
 * Direct Link Parser
 *
 * Bare http(s) URLs that already point at media: a file with a known
 * image/video extension or an HLS playlist.
 */

import type { MediaPostInput } from '@mediastage/core';
import { detectMediaUrl } from '@mediastage/acquisition';
import type { MediaParser } from './types.js';

const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[)\].,;:!?'"]+$/;

export class DirectLinkParser implements MediaParser {
  readonly platform = 'direct';

  canHandle(url: string): boolean {
    if (!/^https?:\/\//i.test(url) || !URL.canParse(url)) {
      return false;
    }
    const { source } = detectMediaUrl(url);
    return source === 'extension' || source === 'playlist';
  }

  extractLinks(text: string): string[] {
    const links: string[] = [];
    for (const match of text.matchAll(URL_PATTERN)) {
      const url = match[0].replace(TRAILING_PUNCTUATION, '');
      if (this.canHandle(url) && !links.includes(url)) {
        links.push(url);
      }
    }
    return links;
  }

  async parse(url: string): Promise<MediaPostInput> {
    const { kind } = detectMediaUrl(url);

    switch (kind) {
      case 'image':
        return { url, platform: this.platform, imageUrls: [[url]] };
      case 'segmented':
        return { url, platform: this.platform, videoUrls: [[{ url, tag: 'segmented' }]] };
      case 'video':
        return { url, platform: this.platform, videoUrls: [[url]] };
    }
  }
}
