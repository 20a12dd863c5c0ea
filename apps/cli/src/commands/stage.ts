/**
 * Stage Command
 *
 * Recognizes media links in the given text, stages each post and prints
 * the decision. Cached files are removed afterwards unless `--keep`.
 */

import ora from 'ora';
import { applyProxyPolicy, isDeliverable, type AppConfig, type StagedPost } from '@mediastage/core';
import { errorMessage } from '@mediastage/utils';
import { loadCliConfig, type StagingOptions } from '../config/index.js';
import { bindShutdownSignals, createPipeline } from '../lib/pipeline.js';
import { printError, printInfo, printJson, printStagedPost, printWarning } from '../lib/output.js';

interface StageOptions extends StagingOptions {
  json?: boolean;
  keep?: boolean;
}

export async function stageCommand(text: string[], options: StageOptions): Promise<void> {
  let config: AppConfig;
  try {
    config = loadCliConfig(options);
  } catch (error) {
    printError(errorMessage(error));
    process.exitCode = 1;
    return;
  }

  const { stager, registry } = createPipeline(config);
  const unbind = bindShutdownSignals(stager.lifecycle);
  const spinner = ora({ text: 'Recognizing links...', isSilent: options.json === true }).start();
  let staged: StagedPost[] = [];

  try {
    const { posts, failures } = await registry.parseText(text.join(' '));

    if (posts.length === 0 && failures.length === 0) {
      spinner.fail('No media links found');
      process.exitCode = 1;
      return;
    }

    spinner.text = `Staging ${posts.length} post(s)...`;
    staged = await stager.stageAll(posts.map((post) => applyProxyPolicy(post, config.proxy)));
    spinner.stop();

    if (options.json) {
      printJson({ staged, failures });
    } else {
      staged.forEach(printStagedPost);
      for (const failure of failures) {
        printWarning(`Could not parse ${failure.url} (${failure.platform}): ${failure.error}`);
      }
    }

    if (!staged.some((post) => isDeliverable(post.decision))) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail('Staging failed');
    printError(errorMessage(error));
    process.exitCode = 1;
  } finally {
    unbind();
    if (options.keep) {
      const kept = staged.flatMap((post) => post.filePaths).filter((path) => path !== null).length;
      if (kept > 0 && !options.json) {
        printInfo(`Kept ${kept} file(s) in ${config.staging.cacheDir}`);
      }
    } else {
      for (const post of staged) {
        await stager.cleanup(post);
      }
    }
    await stager.shutdown();
  }
}
