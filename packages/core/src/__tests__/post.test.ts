import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { parseMediaPost } from '../schema/post.js';

describe('parseMediaPost', () => {
  it('applies defaults for missing optional fields', () => {
    const post = parseMediaPost({
      url: 'https://example.test/post/1',
      videoUrls: [['https://cdn.test/a.mp4']],
    });

    expect(post).toEqual({
      sourceUrl: 'https://example.test/post/1',
      platform: 'unknown',
      postKind: 'video',
      videoSlots: [
        { kind: 'video', index: 0, candidates: [{ url: 'https://cdn.test/a.mp4', tag: 'plain' }] },
      ],
      imageSlots: [],
      videoHeaders: {},
      imageHeaders: {},
      proxy: { url: undefined, video: false, image: false },
      forceLocal: { video: false, image: false },
      title: undefined,
      author: undefined,
    });
  });

  it('keeps candidate order and explicit tags', () => {
    const post = parseMediaPost({
      url: 'https://example.test/post/2',
      videoUrls: [[
        { url: 'https://cdn.test/master.m3u8', tag: 'segmented' },
        'https://cdn.test/fallback.mp4',
        { url: 'https://cdn.test/ranged.mp4', tag: 'range' },
      ]],
    });

    expect(post.videoSlots[0]?.candidates).toEqual([
      { url: 'https://cdn.test/master.m3u8', tag: 'segmented' },
      { url: 'https://cdn.test/fallback.mp4', tag: 'plain' },
      { url: 'https://cdn.test/ranged.mp4', tag: 'range' },
    ]);
  });

  it('drops empty candidate lists and renumbers slots', () => {
    const post = parseMediaPost({
      url: 'https://example.test/post/3',
      imageUrls: [[], ['https://cdn.test/1.jpg'], [], ['https://cdn.test/2.jpg']],
    });

    expect(post.imageSlots.map((slot) => slot.index)).toEqual([0, 1]);
    expect(post.imageSlots.map((slot) => slot.candidates[0].url)).toEqual([
      'https://cdn.test/1.jpg',
      'https://cdn.test/2.jpg',
    ]);
    expect(post.postKind).toBe('gallery');
  });

  it('derives the post kind from slot counts unless given', () => {
    const mixed = parseMediaPost({
      url: 'https://example.test/p',
      videoUrls: [['https://cdn.test/v.mp4']],
      imageUrls: [['https://cdn.test/i.jpg']],
    });
    const single = parseMediaPost({ url: 'https://example.test/p', imageUrls: [['https://cdn.test/i.jpg']] });
    const explicit = parseMediaPost({ url: 'https://example.test/p', kind: 'gallery', imageUrls: [['https://cdn.test/i.jpg']] });

    expect(mixed.postKind).toBe('mixed');
    expect(single.postKind).toBe('image');
    expect(explicit.postKind).toBe('gallery');
  });

  it('maps proxy and force-local flags', () => {
    const post = parseMediaPost({
      url: 'https://example.test/p',
      platform: 'twitter',
      proxyUrl: 'http://proxy.test:8080',
      useVideoProxy: true,
      forceLocalVideo: true,
    });

    expect(post.proxy).toEqual({ url: 'http://proxy.test:8080', video: true, image: false });
    expect(post.forceLocal).toEqual({ video: true, image: false });
  });

  it('throws a ValidationError naming the bad fields', () => {
    const parse = () => parseMediaPost({ url: '', videoUrls: 'nope' });

    expect(parse).toThrow(ValidationError);
    expect(parse).toThrow('Validation failed for url, videoUrls: Source URL is required;');
  });
});
