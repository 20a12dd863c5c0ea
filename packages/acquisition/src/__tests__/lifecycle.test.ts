import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ShutdownError } from '@mediastage/core';
import { pathExists } from '@mediastage/utils';
import { LifecycleManager } from '../lifecycle.js';

describe('LifecycleManager', () => {
  it('tracks a task until it settles', async () => {
    const lifecycle = new LifecycleManager();

    const task = lifecycle.track(async () => 'value');
    expect(lifecycle.activeTaskCount).toBe(1);

    await expect(task).resolves.toBe('value');
    expect(lifecycle.activeTaskCount).toBe(0);
  });

  it('aborts tasks, closes sessions and waits on shutdown', async () => {
    const lifecycle = new LifecycleManager();
    const events: string[] = [];
    lifecycle.registerSession({ close: () => { events.push('session closed'); } });

    const task = lifecycle.track((signal) => new Promise<string>((resolve) => {
      signal.addEventListener('abort', () => {
        events.push('task aborted');
        resolve('stopped');
      });
    }));

    await lifecycle.shutdown();

    expect(events).toEqual(['task aborted', 'session closed']);
    await expect(task).resolves.toBe('stopped');
    expect(lifecycle.isShuttingDown).toBe(true);
  });

  it('is idempotent and refuses new work afterwards', async () => {
    const lifecycle = new LifecycleManager();
    let closes = 0;
    lifecycle.registerSession({ close: async () => { closes++; } });

    await Promise.all([lifecycle.shutdown(), lifecycle.shutdown()]);
    await lifecycle.shutdown();

    expect(closes).toBe(1);
    await expect(lifecycle.track(async () => 1)).rejects.toBeInstanceOf(ShutdownError);
  });

  it('keeps closing sessions when one fails', async () => {
    const lifecycle = new LifecycleManager();
    let closed = false;
    lifecycle.registerSession({ close: async () => { throw new Error('already closed'); } });
    lifecycle.registerSession({ close: () => { closed = true; } });

    await expect(lifecycle.shutdown()).resolves.toBeUndefined();
    expect(closed).toBe(true);
  });

  it('forgets a deregistered session', async () => {
    const lifecycle = new LifecycleManager();
    let closed = false;
    const deregister = lifecycle.registerSession({ close: () => { closed = true; } });

    deregister();
    await lifecycle.shutdown();

    expect(closed).toBe(false);
  });

  describe('cleanupFiles', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'mediastage-lifecycle-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('removes existing files and ignores missing or null entries', async () => {
      const lifecycle = new LifecycleManager();
      const file = join(dir, 'a.mp4');
      await writeFile(file, 'data');

      const removed = await lifecycle.cleanupFiles([file, null, join(dir, 'missing.jpg')]);

      expect(removed).toBe(1);
      expect(await pathExists(file)).toBe(false);
    });
  });
});
