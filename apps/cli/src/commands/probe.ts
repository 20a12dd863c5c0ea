/**
 * Probe Command
 *
 * Checks one URL the way the pipeline does before a transfer.
 */

import ora from 'ora';
import { LifecycleManager, MediaProbe, UndiciTransport } from '@mediastage/acquisition';
import { formatSizeMb, errorMessage } from '@mediastage/utils';
import { loadCliConfig } from '../config/index.js';
import { printError, printJson, printKeyValue } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
  proxy?: string;
  range?: boolean;
}

export async function probeCommand(url: string, options: ProbeOptions): Promise<void> {
  const lifecycle = new LifecycleManager();
  const transport = new UndiciTransport();
  lifecycle.registerSession(transport);

  const spinner = ora({ text: `Probing ${url}`, isSilent: options.json === true }).start();

  try {
    const config = loadCliConfig({});
    const probe = new MediaProbe(transport, lifecycle, { timeoutMs: config.staging.probeTimeoutMs });
    const result = await probe.probe(
      { url, tag: options.range ? 'range' : 'plain' },
      { proxy: options.proxy }
    );

    if (result.status === 'ok') {
      spinner.succeed('Reachable media');
    } else {
      spinner.warn(`Probe result: ${result.status}`);
      process.exitCode = 1;
    }

    if (options.json) {
      printJson(result);
    } else {
      printKeyValue('Status', result.status);
      printKeyValue('Size', formatSizeMb(result.sizeMb));
    }
  } catch (error) {
    spinner.fail('Probe failed');
    printError(errorMessage(error));
    process.exitCode = 1;
  } finally {
    await lifecycle.shutdown();
  }
}
