import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { isRemotePath, parseM3U, readM3UFile, serializeM3U } from '../playlist/m3u.js';
import { UNKNOWN_DURATION } from '../playlist/types.js';

const BASE = path.resolve('/media/show');

function parse(text: string) {
  return parseM3U(text, { name: 'show', baseDir: BASE, loop: true });
}

describe('parseM3U', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads EXTINF duration and title for the following path line', () => {
    const playlist = parse('#EXTM3U\n#EXTINF:30,Intro Bumper\nintro.mp4\n');

    expect(playlist.name).toBe('show');
    expect(playlist.loop).toBe(true);
    expect(playlist.tracks).toEqual([
      {
        path: path.resolve(BASE, 'intro.mp4'),
        title: 'Intro Bumper',
        duration: 30,
        trimIn: null,
        trimOut: null,
        remote: false,
      },
    ]);
  });

  it('marks -1 and unparsable durations as unknown', () => {
    const playlist = parse('#EXTINF:-1,Live Feed\na.mp4\n#EXTINF:abc,Broken\nb.mp4\n');

    expect(playlist.tracks.map((t) => t.duration)).toEqual([UNKNOWN_DURATION, UNKNOWN_DURATION]);
  });

  it('truncates fractional durations', () => {
    const playlist = parse('#EXTINF:12.9,Clip\nclip.mp4\n');

    expect(playlist.tracks[0].duration).toBe(12);
  });

  it('falls back to the file stem when there is no EXTINF title', () => {
    const playlist = parse('clips/outro-loop.mov\n');

    expect(playlist.tracks[0].title).toBe('outro-loop');
    expect(playlist.tracks[0].duration).toBe(UNKNOWN_DURATION);
    expect(playlist.tracks[0].path).toBe(path.resolve(BASE, 'clips/outro-loop.mov'));
  });

  it('keeps absolute paths as they are', () => {
    const absolute = path.resolve('/srv/media/slate.png');
    const playlist = parse(`${absolute}\n`);

    expect(playlist.tracks[0].path).toBe(absolute);
  });

  it('leaves remote entries unresolved and titles them by URL', () => {
    const playlist = parse('https://cdn.example.com/loop.mp4\nrtmp://ingest.example.com/live\n');

    expect(playlist.tracks.map((t) => [t.path, t.title, t.remote])).toEqual([
      ['https://cdn.example.com/loop.mp4', 'https://cdn.example.com/loop.mp4', true],
      ['rtmp://ingest.example.com/live', 'rtmp://ingest.example.com/live', true],
    ]);
  });

  it('applies EXTVLCOPT trim points to the next track only', () => {
    const playlist = parse(
      [
        '#EXTINF:120,Trimmed',
        '#EXTVLCOPT:start-time=5',
        '#EXTVLCOPT:stop-time=90.5',
        'trimmed.mp4',
        '#EXTINF:60,Plain',
        'plain.mp4',
      ].join('\n'),
    );

    expect(playlist.tracks[0]).toMatchObject({ trimIn: 5, trimOut: 90.5 });
    expect(playlist.tracks[1]).toMatchObject({ trimIn: null, trimOut: null, title: 'Plain' });
  });

  it('drops a stop-time that is not after the start-time', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const playlist = parse('#EXTVLCOPT:start-time=20\n#EXTVLCOPT:stop-time=10\nclip.mp4\n');

    expect(playlist.tracks[0]).toMatchObject({ trimIn: 20, trimOut: null });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('treats a zero start-time as no trim', () => {
    const playlist = parse('#EXTVLCOPT:start-time=0\nclip.mp4\n');

    expect(playlist.tracks[0].trimIn).toBeNull();
  });

  it('ignores blank lines, CRLF endings and unknown directives', () => {
    const playlist = parse('#EXTM3U\r\n\r\n#PLAYLIST:Show\r\n#EXTINF:10,One\r\none.mp4\r\n\r\ntwo.mp4\r\n');

    expect(playlist.tracks.map((t) => t.title)).toEqual(['One', 'two']);
  });

  it('collects EXTOVERLAY directives for the next track', () => {
    const playlist = parse(
      [
        '#EXTINF:3600,Episode 01',
        '#EXTOVERLAY:hold=12',
        '#EXTOVERLAY:text=Now Playing: Episode One',
        'ep01.mp4',
        '#EXTINF:120,Station ID',
        '#EXTOVERLAY:skip=1',
        '#EXTOVERLAY:delay=2.5',
        'bumper.mp4',
        'ep02.mp4',
      ].join('\n'),
    );

    expect(playlist.tracks.map((t) => t.overlay)).toEqual([
      { holdMs: 12000, text: 'Now Playing: Episode One' },
      { skip: true, delayMs: 2500 },
      undefined,
    ]);
  });

  it('ignores EXTOVERLAY directives it cannot read', () => {
    const playlist = parse(
      ['#EXTOVERLAY:hold=soon', '#EXTOVERLAY:fade=1', '#EXTOVERLAY:text=', '#EXTOVERLAY:skip=no', 'a.mp4'].join('\n'),
    );

    expect(playlist.tracks[0].overlay).toEqual({ skip: false });
  });

  it('returns an empty playlist for a file with no entries', () => {
    expect(parse('#EXTM3U\n').tracks).toEqual([]);
  });
});

describe('isRemotePath', () => {
  it('recognises streaming schemes case-insensitively', () => {
    expect(isRemotePath('HTTPS://cdn.example.com/a.mp4')).toBe(true);
    expect(isRemotePath('rtsp://camera.local/stream')).toBe(true);
    expect(isRemotePath('/var/media/a.mp4')).toBe(false);
    expect(isRemotePath('ftp://files.example.com/a.mp4')).toBe(false);
  });
});

describe('serializeM3U', () => {
  it('writes tracks in a form parseM3U reads back', () => {
    const original = parse('#EXTINF:42,Opener\n#EXTVLCOPT:start-time=3\nopener.mp4\n#EXTINF:-1,Feed\nhttp://cdn.example.com/feed\n');
    const text = serializeM3U(original);

    expect(text.split('\n').slice(0, 5)).toEqual([
      '#EXTM3U',
      '',
      '#EXTINF:42,Opener',
      '#EXTVLCOPT:start-time=3',
      path.resolve(BASE, 'opener.mp4'),
    ]);
    expect(parse(text).tracks).toEqual(original.tracks);
  });

  it('writes overlay overrides back as directives', () => {
    const original = parse('#EXTINF:60,Feature\n#EXTOVERLAY:text=Feature Film\n#EXTOVERLAY:hold=4.5\nfeature.mp4\n');
    const text = serializeM3U(original);

    expect(text.split('\n').slice(2, 6)).toEqual([
      '#EXTINF:60,Feature',
      '#EXTOVERLAY:text=Feature Film',
      '#EXTOVERLAY:hold=4.5',
      path.resolve(BASE, 'feature.mp4'),
    ]);
    expect(parse(text).tracks).toEqual(original.tracks);
  });
});

describe('readM3UFile', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('names the playlist after the file and resolves paths beside it', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-m3u-'));
    const file = path.join(dir, 'intermission.m3u8');
    fs.writeFileSync(file, '#EXTM3U\n#EXTINF:15,Slate\nslate.png\n');

    const playlist = await readM3UFile(file, false);

    expect(playlist.name).toBe('intermission');
    expect(playlist.loop).toBe(false);
    expect(playlist.tracks[0].path).toBe(path.join(dir, 'slate.png'));
  });
});
