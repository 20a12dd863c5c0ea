/**
 * Parser Registry
 *
 * Finds the parser for a link and turns free text into validated posts.
 */

import { parseMediaPost, type MediaPost } from '@mediastage/core';
import { createLogger, errorMessage } from '@mediastage/utils';
import type { MediaParser, ParseFailure, ParseTextResult, RecognizedLink } from './types.js';

const log = createLogger({ component: 'links' });

export class ParserRegistry {
  private readonly parsers: MediaParser[] = [];

  constructor(parsers: readonly MediaParser[] = []) {
    for (const parser of parsers) {
      this.register(parser);
    }
  }

  get size(): number {
    return this.parsers.length;
  }

  /**
   * Add a parser. Registering the same instance twice is a no-op.
   */
  register(parser: MediaParser): this {
    if (!this.parsers.includes(parser)) {
      this.parsers.push(parser);
    }
    return this;
  }

  /**
   * First registered parser that accepts the URL
   */
  findParser(url: string): MediaParser | null {
    return this.parsers.find((parser) => parser.canHandle(url)) ?? null;
  }

  /**
   * Every recognizable link in `text`, ordered by first position and
   * deduplicated. Earlier-registered parsers win a shared link.
   */
  extractAllLinks(text: string): RecognizedLink[] {
    const found: Array<RecognizedLink & { position: number; order: number }> = [];

    this.parsers.forEach((parser, order) => {
      for (const url of parser.extractLinks(text)) {
        const position = text.indexOf(url);
        if (position !== -1) {
          found.push({ url, parser, position, order });
        }
      }
    });

    found.sort((a, b) => a.position - b.position || a.order - b.order);

    const seen = new Set<string>();
    const links: RecognizedLink[] = [];
    for (const { url, parser } of found) {
      if (!seen.has(url)) {
        seen.add(url);
        links.push({ url, parser });
      }
    }
    return links;
  }

  /**
   * Parse one URL with its parser
   *
   * @returns null when no parser handles the URL
   * @throws ValidationError when the parser produces an invalid record
   */
  async parseUrl(url: string, signal?: AbortSignal): Promise<MediaPost | null> {
    const parser = this.findParser(url);
    if (!parser) {
      return null;
    }
    return this.parseWith(parser, url, signal);
  }

  /**
   * Parse every link in `text` concurrently. A failing link is reported in
   * `failures` and does not affect the others.
   */
  async parseText(text: string, signal?: AbortSignal): Promise<ParseTextResult> {
    const links = this.extractAllLinks(text);
    const settled = await Promise.allSettled(
      links.map(({ url, parser }) => this.parseWith(parser, url, signal))
    );

    const posts: MediaPost[] = [];
    const failures: ParseFailure[] = [];

    settled.forEach((result, i) => {
      const link = links[i];
      if (!link) {
        return;
      }
      if (result.status === 'fulfilled') {
        posts.push(result.value);
        return;
      }
      const failure: ParseFailure = {
        url: link.url,
        platform: link.parser.platform,
        error: errorMessage(result.reason),
      };
      log.warn(failure, 'Failed to parse link');
      failures.push(failure);
    });

    return { posts, failures };
  }

  private async parseWith(parser: MediaParser, url: string, signal?: AbortSignal): Promise<MediaPost> {
    const input = await parser.parse(url, signal);
    return parseMediaPost({ ...input, platform: input.platform ?? parser.platform });
  }
}
