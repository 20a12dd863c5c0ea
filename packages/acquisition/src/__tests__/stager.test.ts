import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseMediaPost, type MediaPostInput, type StagingConfig } from '@mediastage/core';
import { LifecycleManager } from '../lifecycle.js';
import { MediaStager } from '../stager.js';
import { FakeTransport, MB, deferred } from './helpers.js';

const VIDEO_A = 'https://cdn.test/v/a.mp4';
const VIDEO_B = 'https://cdn.test/v/b.mp4';
const IMAGE = 'https://cdn.test/i/1.jpg';

function post(input: Partial<MediaPostInput> = {}) {
  return parseMediaPost({ url: 'https://site.test/status/12345', platform: 'twitter', ...input });
}

describe('MediaStager', () => {
  let cacheDir: string;
  let transport: FakeTransport;

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'mediastage-stage-'));
    transport = new FakeTransport();
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  function stager(config: Partial<StagingConfig> = {}, lifecycle = new LifecycleManager()): MediaStager {
    return new MediaStager({ cacheDir, ...config }, { transport, lifecycle, runToken: 'tok' });
  }

  it('reports no-media for a post without slots', async () => {
    const staged = await stager().stage(post());

    expect(staged.decision).toEqual({ status: 'no-media' });
    expect(staged.mediaId).toBeNull();
    expect(staged.hasValidMedia).toBe(false);
    expect(transport.count()).toBe(0);
  });

  it('never rejects for size when the limit is 0', async () => {
    transport.media(VIDEO_A, 'video/mp4', 500 * MB);

    const staged = await stager({ maxVideoSizeMb: 0, largeMediaKinds: [] }).stage(post({ videoUrls: [[VIDEO_A]] }));

    expect(staged.decision).toEqual({ status: 'accepted-direct-link' });
    expect(staged.exceedsMaxSize).toBe(false);
    expect(staged.videoSizes).toEqual([500]);
    expect(staged.maxVideoSizeMb).toBe(500);
    expect(staged.deliveries).toEqual([
      { kind: 'video', index: 0, mode: 'direct', url: VIDEO_A, filePath: null, sizeMb: 500 },
    ]);
  });

  it('rejects a post whose largest video is over the limit without fetching', async () => {
    transport.media(VIDEO_A, 'video/mp4', 80 * MB);
    transport.media(IMAGE, 'image/jpeg', MB);

    const staged = await stager({ maxVideoSizeMb: 50 }).stage(post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]] }));

    expect(staged.decision).toEqual({ status: 'rejected-too-large', maxVideoSizeMb: 80, limitMb: 50 });
    expect(staged.exceedsMaxSize).toBe(true);
    expect(staged.failedVideoCount).toBe(1);
    expect(staged.failedImageCount).toBe(1);
    expect(staged.hasValidMedia).toBe(false);
    expect(staged.useLocalFiles).toBe(false);
    expect(staged.filePaths).toEqual([null, null]);
    expect(staged.videoSizes).toEqual([80]);
    expect(transport.count('GET')).toBe(0);
    expect(await readdir(cacheDir)).toEqual([]);
  });

  it('keeps a 403 seen during the size check on a rejected post', async () => {
    transport.media(VIDEO_A, 'video/mp4', 80 * MB);
    transport.route(VIDEO_B, { status: 403 });

    const staged = await stager({ maxVideoSizeMb: 50 }).stage(post({ videoUrls: [[VIDEO_A], [VIDEO_B]] }));

    expect(staged.decision).toEqual({ status: 'rejected-too-large', maxVideoSizeMb: 80, limitMb: 50 });
    expect(staged.hasAccessDenied).toBe(true);
    expect(staged.failedVideoCount).toBe(2);
  });

  it('fetches only the video above the large threshold', async () => {
    transport.media(VIDEO_A, 'video/mp4', 30 * MB);
    transport.media(VIDEO_B, 'video/mp4', 10 * MB);
    transport.media(IMAGE, 'image/jpeg', MB);

    const staged = await stager({ largeVideoThresholdMb: 20 }).stage(
      post({ videoUrls: [[VIDEO_A], [VIDEO_B]], imageUrls: [[IMAGE]] })
    );

    const localPath = join(cacheDir, 'twitter_12345_tok_0.mp4');
    expect(staged.decision).toEqual({ status: 'accepted-local-files' });
    expect(staged.deliveries.map((delivery) => delivery.mode)).toEqual(['local', 'direct', 'direct']);
    expect(staged.filePaths).toEqual([localPath, null, null]);
    expect(staged.isLargeMedia).toBe(true);
    expect(staged.useLocalFiles).toBe(true);
    expect(staged.videoSizes[1]).toBe(10);
    expect(await readdir(cacheDir)).toEqual(['twitter_12345_tok_0.mp4']);
    expect(transport.requests.filter((request) => request.method === 'GET').map((request) => request.url)).toEqual([
      VIDEO_A,
    ]);
  });

  it('treats every video as large when the threshold is 0', async () => {
    transport.route(VIDEO_A, { headers: { 'content-type': 'video/mp4' }, body: 'frames' });

    const staged = await stager({ largeVideoThresholdMb: 0 }).stage(post({ videoUrls: [[VIDEO_A]] }));

    expect(staged.decision).toEqual({ status: 'accepted-local-files' });
    expect(staged.isLargeMedia).toBe(true);
    expect(staged.deliveries[0]?.sizeMb).toBe(6 / MB);
  });

  it('keeps unknown sizes as direct links under a positive threshold', async () => {
    transport.route(VIDEO_A, { headers: { 'content-type': 'video/mp4' }, body: 'frames' });

    const staged = await stager({ largeVideoThresholdMb: 20 }).stage(post({ videoUrls: [[VIDEO_A]] }));

    expect(staged.decision).toEqual({ status: 'accepted-direct-link' });
    expect(staged.videoSizes).toEqual([null]);
    expect(staged.maxVideoSizeMb).toBeNull();
    expect(staged.totalVideoSizeMb).toBe(0);
  });

  it('accepts a partial post when a video is forbidden', async () => {
    transport.route(VIDEO_A, { status: 403 });
    transport.media(IMAGE, 'image/jpeg', MB);

    const staged = await stager().stage(post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]] }));

    expect(staged.decision).toEqual({ status: 'accepted-partial', failedVideoCount: 1, failedImageCount: 0 });
    expect(staged.hasValidMedia).toBe(true);
    expect(staged.hasAccessDenied).toBe(true);
    expect(staged.deliveries[0]?.failure?.kind).toBe('access-denied');
    expect(staged.deliveries[1]).toEqual({
      kind: 'image',
      index: 0,
      mode: 'direct',
      url: IMAGE,
      filePath: null,
      sizeMb: 1,
    });
  });

  it('reports no-valid-media when nothing is usable', async () => {
    transport.route(VIDEO_A, { headers: { 'content-type': 'text/html' }, body: '<html>' });

    const staged = await stager().stage(post({ videoUrls: [[VIDEO_A]] }));

    expect(staged.decision).toEqual({ status: 'no-valid-media' });
    expect(staged.failedVideoCount).toBe(1);
    expect(staged.hasValidMedia).toBe(false);
  });

  it('fetches forced-local kinds in direct mode', async () => {
    transport.media(VIDEO_A, 'video/mp4', MB);
    transport.route(IMAGE, { headers: { 'content-type': 'image/jpeg' }, body: 'jpeg' });

    const staged = await stager().stage(
      post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]], forceLocalImage: true })
    );

    expect(staged.decision).toEqual({ status: 'accepted-local-files' });
    expect(staged.filePaths).toEqual([null, join(cacheDir, 'twitter_12345_tok_1.jpg')]);
    expect(staged.isLargeMedia).toBe(false);
  });

  it('fails escalated slots when the cache is unusable', async () => {
    const blocker = join(cacheDir, 'not-a-dir');
    await writeFile(blocker, 'x');
    transport.media(VIDEO_A, 'video/mp4', MB);
    transport.media(IMAGE, 'image/jpeg', MB);

    const staged = await stager({ cacheDir: join(blocker, 'cache') }).stage(
      post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]], forceLocalImage: true })
    );

    expect(staged.decision).toEqual({ status: 'accepted-partial', failedVideoCount: 0, failedImageCount: 1 });
    expect(staged.deliveries[1]?.failure?.kind).toBe('cache-unavailable');
  });

  describe('pre-fetch mode', () => {
    it('downloads every slot', async () => {
      transport.route(VIDEO_A, { headers: { 'content-type': 'video/mp4' }, body: 'video' });
      transport.route(IMAGE, { headers: { 'content-type': 'image/jpeg' }, body: 'image' });

      const staged = await stager({ prefetchAll: true }).stage(post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]] }));

      expect(staged.decision).toEqual({ status: 'accepted-local-files' });
      expect(staged.filePaths).toEqual([
        join(cacheDir, 'twitter_12345_tok_0.mp4'),
        join(cacheDir, 'twitter_12345_tok_1.jpg'),
      ]);
      expect(transport.count('HEAD')).toBe(0);
    });

    it('drops forced-local videos that all failed', async () => {
      transport.route(VIDEO_A, { status: 403 });
      transport.route(IMAGE, { headers: { 'content-type': 'image/jpeg' }, body: 'image' });

      const staged = await stager({ prefetchAll: true }).stage(
        post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]], forceLocalVideo: true })
      );

      expect(staged.decision).toEqual({ status: 'accepted-partial', failedVideoCount: 1, failedImageCount: 0 });
      expect(staged.videoCount).toBe(0);
      expect(staged.deliveries.map((delivery) => delivery.kind)).toEqual(['image']);
      expect(staged.hasAccessDenied).toBe(true);
    });

    it('cleans up and rejects when a downloaded video is over the limit', async () => {
      transport.route(VIDEO_A, { headers: { 'content-type': 'video/mp4' }, body: Buffer.alloc(2 * MB) });
      transport.route(IMAGE, { headers: { 'content-type': 'image/jpeg' }, body: 'image' });

      const staged = await stager({ prefetchAll: true, maxVideoSizeMb: 1 }).stage(
        post({ videoUrls: [[VIDEO_A]], imageUrls: [[IMAGE]] })
      );

      expect(staged.decision).toEqual({ status: 'rejected-too-large', maxVideoSizeMb: 2, limitMb: 1 });
      expect(staged.filePaths).toEqual([null, null]);
      expect(await readdir(cacheDir)).toEqual([]);
    });
  });

  describe('shutdown', () => {
    it('makes no requests once shutdown has begun', async () => {
      transport.media(VIDEO_A, 'video/mp4', MB);
      const instance = stager();
      await instance.shutdown();

      const staged = await instance.stage(post({ videoUrls: [[VIDEO_A]] }));

      expect(staged.decision).toEqual({ status: 'cancelled' });
      expect(transport.count()).toBe(0);
      expect(transport.closed).toBe(true);
    });

    it('cancels a post that is in flight', async () => {
      const hold = deferred();
      transport.route(VIDEO_A, { hold: hold.promise, headers: { 'content-type': 'video/mp4' } });
      const instance = stager();

      const staging = instance.stage(post({ videoUrls: [[VIDEO_A]] }));
      await new Promise((resolve) => setTimeout(resolve, 10));
      await instance.shutdown();

      expect((await staging).decision).toEqual({ status: 'cancelled' });
      hold.resolve();
    });
  });

  describe('stageAll', () => {
    class FailingFirstLifecycle extends LifecycleManager {
      private calls = 0;

      override track<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
        this.calls++;
        return this.calls === 1 ? Promise.reject(new Error('tracker exploded')) : super.track(fn);
      }
    }

    it('isolates a post that throws', async () => {
      transport.media(IMAGE, 'image/jpeg', MB);
      const instance = stager({}, new FailingFirstLifecycle());

      const staged = await instance.stageAll([
        post({ imageUrls: [[IMAGE]] }),
        post({ url: 'https://site.test/status/67890', imageUrls: [[IMAGE]] }),
      ]);

      expect(staged.map((item) => item.decision)).toEqual([
        { status: 'no-valid-media', error: 'tracker exploded' },
        { status: 'accepted-direct-link' },
      ]);
    });
  });

  it('removes the files of a staged post on cleanup', async () => {
    transport.route(VIDEO_A, { headers: { 'content-type': 'video/mp4' }, body: 'video' });
    const instance = stager({ prefetchAll: true });
    const staged = await instance.stage(post({ videoUrls: [[VIDEO_A]] }));

    expect(await instance.cleanup(staged)).toBe(1);
    expect(await readdir(cacheDir)).toEqual([]);
  });
});
