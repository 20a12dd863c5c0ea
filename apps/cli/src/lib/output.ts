/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { AcquisitionDecision, SlotDelivery, StagedPost } from '@mediastage/core';
import { formatSizeMb } from '@mediastage/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function describeDecision(decision: AcquisitionDecision): string {
  switch (decision.status) {
    case 'no-media':
      return 'No media found';
    case 'cancelled':
      return 'Cancelled';
    case 'rejected-too-large':
      return `Rejected: largest video ${formatSizeMb(decision.maxVideoSizeMb)} exceeds the ${decision.limitMb}MB limit`;
    case 'accepted-direct-link':
      return 'Accepted (direct links)';
    case 'accepted-local-files':
      return 'Accepted (local files)';
    case 'accepted-partial':
      return `Accepted with failures (${decision.failedVideoCount} video, ${decision.failedImageCount} image)`;
    case 'no-valid-media':
      return decision.error ? `No valid media: ${decision.error}` : 'No valid media';
  }
}

/**
 * One line per slot: `video #1 direct 12.00MB https://...`
 */
export function describeDelivery(delivery: SlotDelivery): string {
  const label = `${delivery.kind} #${delivery.index + 1} ${delivery.mode}`;

  switch (delivery.mode) {
    case 'direct':
      return `${label} ${formatSizeMb(delivery.sizeMb)} ${delivery.url ?? ''}`.trimEnd();
    case 'local':
      return `${label} ${formatSizeMb(delivery.sizeMb)} ${delivery.filePath ?? ''}`.trimEnd();
    case 'failed':
      return delivery.failure ? `${label} ${delivery.failure.kind}: ${delivery.failure.message}` : label;
  }
}

const decisionColors: Record<AcquisitionDecision['status'], (text: string) => string> = {
  'no-media': chalk.gray,
  cancelled: chalk.gray,
  'rejected-too-large': chalk.red,
  'accepted-direct-link': chalk.green,
  'accepted-local-files': chalk.green,
  'accepted-partial': chalk.yellow,
  'no-valid-media': chalk.red,
};

export function printStagedPost(staged: StagedPost): void {
  const color = decisionColors[staged.decision.status];

  printHeader(`${staged.platform}: ${staged.sourceUrl}`);
  printKeyValue('Decision', color(describeDecision(staged.decision)));
  if (staged.mediaId) {
    printKeyValue('Media id', staged.mediaId);
  }
  printKeyValue('Videos', `${staged.videoCount} (${staged.failedVideoCount} failed)`);
  printKeyValue('Images', `${staged.imageCount} (${staged.failedImageCount} failed)`);
  printKeyValue('Largest video', formatSizeMb(staged.maxVideoSizeMb));
  if (staged.isLargeMedia) {
    printKeyValue('Large media', 'fetched locally');
  }

  for (const delivery of staged.deliveries) {
    const line = describeDelivery(delivery);
    console.log(`    ${delivery.mode === 'failed' ? chalk.red(line) : line}`);
  }
}
