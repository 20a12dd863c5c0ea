/**
 * Pipeline Wiring
 */

import type { EventEmitter } from 'node:events';
import type { AppConfig } from '@mediastage/core';
import { MediaStager, type LifecycleManager, type MediaStagerDeps } from '@mediastage/acquisition';
import { DirectLinkParser, ParserRegistry } from '@mediastage/links';
import { createLogger, errorMessage } from '@mediastage/utils';

const log = createLogger({ component: 'cli' });

export interface Pipeline {
  stager: MediaStager;
  registry: ParserRegistry;
}

export function createPipeline(config: AppConfig, deps: MediaStagerDeps = {}): Pipeline {
  return {
    stager: new MediaStager(config.staging, deps),
    registry: new ParserRegistry([new DirectLinkParser()]),
  };
}

/**
 * Start a cooperative shutdown on SIGINT/SIGTERM
 *
 * @returns function removing the listeners
 */
export function bindShutdownSignals(
  lifecycle: LifecycleManager,
  target: EventEmitter = process
): () => void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Received shutdown signal');
    lifecycle.shutdown().catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, 'Error during shutdown');
    });
  };

  for (const signal of signals) {
    target.on(signal, onSignal);
  }

  return () => {
    for (const signal of signals) {
      target.off(signal, onSignal);
    }
  };
}
