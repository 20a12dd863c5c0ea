/**
 * Classify Command
 *
 * Prints the media kind the classifier assigns to each URL. No network.
 */

import { detectMediaUrl } from '@mediastage/acquisition';
import { printJson, printKeyValue } from '../lib/output.js';

interface ClassifyOptions {
  json?: boolean;
}

export function classifyCommand(urls: string[], options: ClassifyOptions): void {
  const results = urls.map((url) => ({ url, ...detectMediaUrl(url) }));

  if (options.json) {
    printJson(results);
    return;
  }

  for (const { url, kind, source } of results) {
    printKeyValue(kind, `${url} (${source})`);
  }
}
