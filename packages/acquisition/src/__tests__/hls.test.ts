import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AccessDeniedError, CommandExecutionError, InvalidMediaResponseError } from '@mediastage/core';
import type { CommandOptions, CommandResult } from '@mediastage/utils';
import { Remuxer } from '../handlers/ffmpeg.js';
import { HlsHandler } from '../handlers/hls.js';
import { FakeTransport } from './helpers.js';

const MASTER = 'https://cdn.test/hls/master.m3u8';
const MEDIA = 'https://cdn.test/hls/high/index.m3u8';

interface RecordedCommand {
  command: string;
  args: string[];
  list: string | null;
}

/** ffmpeg stand-in: writes its last argument (relative to cwd) */
function fakeFfmpeg(exitCode = 0) {
  const calls: RecordedCommand[] = [];
  const runner = async (command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> => {
    const cwd = options.cwd ?? process.cwd();
    const list = args.includes('list.txt') ? await readFile(join(cwd, 'list.txt'), 'utf8') : null;
    calls.push({ command, args, list });
    const output = args[args.length - 1];
    if (exitCode === 0 && output) {
      await writeFile(join(cwd, output), 'REMUXED');
    }
    return { exitCode, stdout: '', stderr: exitCode === 0 ? '' : 'Invalid data found', duration: 1, timedOut: false };
  };
  return { calls, runner };
}

function servePlainStream(transport: FakeTransport): void {
  transport
    .route(MASTER, {
      body: [
        '#EXTM3U',
        '#EXT-X-STREAM-INF:BANDWIDTH=800000',
        'low/index.m3u8',
        '#EXT-X-STREAM-INF:BANDWIDTH=2400000',
        'high/index.m3u8',
      ].join('\n'),
    })
    .route(MEDIA, { body: '#EXTM3U\n#EXTINF:4,\nseg0.ts\n#EXTINF:4,\nseg1.ts\n#EXT-X-ENDLIST\n' })
    .route('https://cdn.test/hls/high/seg0.ts', { body: 'AAAA' })
    .route('https://cdn.test/hls/high/seg1.ts', { body: 'BBBB' });
}

describe('HlsHandler', () => {
  let cacheDir: string;
  const target = () => ({ cacheDir, stem: 'post_12345_tok_0' });
  const candidate = { url: MASTER, tag: 'segmented' as const };

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'mediastage-hls-'));
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  function handler(transport: FakeTransport, useFfmpeg: boolean, runner = fakeFfmpeg().runner): HlsHandler {
    return new HlsHandler(transport, new Remuxer(runner, { ffmpegPath: 'ffmpeg', timeoutMs: 1000 }), {
      useFfmpeg,
      timeoutMs: 1000,
      segmentConcurrency: 2,
    });
  }

  it('joins segments of the best variant without ffmpeg', async () => {
    const transport = new FakeTransport();
    servePlainStream(transport);

    const file = await handler(transport, false).fetch(candidate, 'video', target(), {});

    expect(file.filePath).toBe(join(cacheDir, 'post_12345_tok_0.ts'));
    expect(await readFile(file.filePath, 'utf8')).toBe('AAAABBBB');
    expect(file.sizeMb).toBe(8 / (1024 * 1024));
    expect(transport.requests.map((request) => request.url)).not.toContain('https://cdn.test/hls/low/index.m3u8');
    expect(await readdir(cacheDir)).toEqual(['post_12345_tok_0.ts']);
  });

  it('remuxes through a concat list with ffmpeg', async () => {
    const transport = new FakeTransport();
    servePlainStream(transport);
    const ffmpeg = fakeFfmpeg();

    const file = await handler(transport, true, ffmpeg.runner).fetch(candidate, 'video', target(), {});

    expect(file.filePath).toBe(join(cacheDir, 'post_12345_tok_0.mp4'));
    expect(await readFile(file.filePath, 'utf8')).toBe('REMUXED');
    expect(ffmpeg.calls).toEqual([
      {
        command: 'ffmpeg',
        args: ['-y', '-loglevel', 'error', '-f', 'concat', '-safe', '0', '-i', 'list.txt', '-c', 'copy', 'output.mp4'],
        list: "file 'seg_00000.ts'\nfile 'seg_00001.ts'\n",
      },
    ]);
    expect(await readdir(cacheDir)).toEqual(['post_12345_tok_0.mp4']);
  });

  it('puts the init segment first and keeps mp4 without ffmpeg', async () => {
    const transport = new FakeTransport()
      .route(MEDIA, { body: '#EXTM3U\n#EXT-X-MAP:URI="init.mp4"\n#EXTINF:4,\nseg0.m4s\n' })
      .route('https://cdn.test/hls/high/init.mp4', { body: 'INIT' })
      .route('https://cdn.test/hls/high/seg0.m4s', { body: 'FRAG' });

    const file = await handler(transport, false).fetch({ url: MEDIA, tag: 'plain' }, 'video', target(), {});

    expect(file.filePath).toBe(join(cacheDir, 'post_12345_tok_0.mp4'));
    expect(await readFile(file.filePath, 'utf8')).toBe('INITFRAG');
  });

  it('hands encrypted streams to ffmpeg as a remote input', async () => {
    const transport = new FakeTransport().route(MEDIA, {
      body: '#EXTM3U\n#EXT-X-KEY:METHOD=AES-128,URI="k"\n#EXTINF:4,\nseg0.ts\n',
    });
    const ffmpeg = fakeFfmpeg();

    const file = await handler(transport, true, ffmpeg.runner).fetch(
      { url: MEDIA, tag: 'segmented' },
      'video',
      target(),
      { headers: { referer: 'https://site.test/' } }
    );

    expect(await readFile(file.filePath, 'utf8')).toBe('REMUXED');
    expect(ffmpeg.calls[0]?.args).toEqual([
      '-y', '-loglevel', 'error',
      '-headers', 'referer: https://site.test/\r\n',
      '-i', MEDIA, '-c', 'copy', 'output.mp4',
    ]);
    expect(transport.count()).toBe(1);
  });

  it('refuses encrypted streams without ffmpeg', async () => {
    const transport = new FakeTransport().route(MEDIA, {
      body: '#EXTM3U\n#EXT-X-KEY:METHOD=SAMPLE-AES,URI="k"\n#EXTINF:4,\nseg0.ts\n',
    });

    await expect(
      handler(transport, false).fetch({ url: MEDIA, tag: 'segmented' }, 'video', target(), {})
    ).rejects.toThrow(InvalidMediaResponseError);
  });

  it('fails on a forbidden segment and leaves nothing behind', async () => {
    const transport = new FakeTransport();
    servePlainStream(transport);
    transport.route('https://cdn.test/hls/high/seg1.ts', { status: 403 });

    await expect(handler(transport, false).fetch(candidate, 'video', target(), {})).rejects.toBeInstanceOf(
      AccessDeniedError
    );
    expect(await readdir(cacheDir)).toEqual([]);
  });

  it('reports a failed remux', async () => {
    const transport = new FakeTransport();
    servePlainStream(transport);

    await expect(
      handler(transport, true, fakeFfmpeg(1).runner).fetch(candidate, 'video', target(), {})
    ).rejects.toBeInstanceOf(CommandExecutionError);
    expect(await readdir(cacheDir)).toEqual([]);
  });
});
