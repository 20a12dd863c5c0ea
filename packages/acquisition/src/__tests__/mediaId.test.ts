import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { createMediaId, createRunToken, extractNumericId } from '../mediaId.js';

describe('extractNumericId', () => {
  it('takes the last run of five or more digits from the path', () => {
    expect(extractNumericId('https://site.test/user/123/status/1790012345678?s=20')).toBe('1790012345678');
    expect(extractNumericId('https://site.test/p/1234')).toBeNull();
  });

  it('ignores digits in the query string', () => {
    expect(extractNumericId('https://site.test/watch?v=9876543')).toBeNull();
  });
});

describe('createMediaId', () => {
  it('uses the numeric id when present', () => {
    expect(createMediaId('twitter', 'https://site.test/status/98765', 'run1')).toBe('twitter_98765_run1');
  });

  it('falls back to a hash of the URL', () => {
    const url = 'https://site.test/watch?v=abc';
    const hash = createHash('md5').update(url).digest('hex').slice(0, 8);

    expect(createMediaId('direct', url, 'run1')).toBe(`direct_${hash}_run1`);
  });

  it('makes the platform safe for filenames', () => {
    expect(createMediaId('my site/x', 'https://site.test/v/55555', 'r')).toBe('my_site_x_55555_r');
  });
});

describe('createRunToken', () => {
  it('encodes the timestamp in base 36', () => {
    expect(createRunToken(36 * 36)).toBe('100');
  });
});
