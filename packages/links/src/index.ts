/**
 * @mediastage/links
 *
 * Link recognition: parser interface, registry and direct media links.
 */

export { ParserRegistry } from './registry.js';
export { DirectLinkParser } from './directLink.js';
export type {
  MediaParser,
  RecognizedLink,
  ParseFailure,
  ParseTextResult,
} from './types.js';
