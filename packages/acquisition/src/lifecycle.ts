/**
 * Lifecycle Manager
 *
 * Owns everything that must be released on shutdown: HTTP sessions and
 * in-flight tasks. After `shutdown()` begins, new work is refused and
 * callers see `isShuttingDown`.
 */

import { ShutdownError } from '@mediastage/core';
import { createLogger, errorMessage, removeFiles } from '@mediastage/utils';

const log = createLogger({ component: 'lifecycle' });

export interface Closeable {
  close(): Promise<void> | void;
}

interface TrackedTask {
  controller: AbortController;
  promise: Promise<unknown>;
}

export class LifecycleManager {
  private shuttingDown = false;
  private shutdownPromise: Promise<void> | null = null;
  private readonly sessions = new Set<Closeable>();
  private readonly tasks = new Set<TrackedTask>();

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  get activeTaskCount(): number {
    return this.tasks.size;
  }

  /**
   * @returns a function that deregisters the session
   */
  registerSession(session: Closeable): () => void {
    this.sessions.add(session);
    return () => {
      this.sessions.delete(session);
    };
  }

  /**
   * Run `fn` as a tracked task. Its signal aborts on shutdown.
   *
   * @throws ShutdownError when shutdown has already begun
   */
  track<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.shuttingDown) {
      return Promise.reject(new ShutdownError());
    }

    const controller = new AbortController();
    const promise = fn(controller.signal);
    const task: TrackedTask = { controller, promise };
    this.tasks.add(task);

    return promise.finally(() => {
      this.tasks.delete(task);
    });
  }

  /**
   * Stop accepting work, abort running tasks, close sessions and wait for
   * the tasks to settle. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shuttingDown = true;
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    const tasks = [...this.tasks];
    log.info({ tasks: tasks.length, sessions: this.sessions.size }, 'Shutting down');

    for (const task of tasks) {
      task.controller.abort(new ShutdownError());
    }

    const sessions = [...this.sessions];
    this.sessions.clear();
    for (const session of sessions) {
      try {
        await session.close();
      } catch (error) {
        log.warn({ error: errorMessage(error) }, 'Failed to close session');
      }
    }

    // Task failures belong to whoever awaited the task
    await Promise.allSettled(tasks.map((task) => task.promise));
    log.info('Shutdown complete');
  }

  /**
   * Delete the given files. Never throws; null entries are ignored.
   *
   * @returns number of files removed
   */
  cleanupFiles(paths: ReadonlyArray<string | null | undefined>): Promise<number> {
    return removeFiles(paths);
  }
}
