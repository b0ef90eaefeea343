import fs from 'node:fs/promises';
import path from 'node:path';
import { UNKNOWN_DURATION, type Playlist, type Track, type TrackOverlay } from './types.js';

/**
 * 拡張 M3U プレイリスト
 *
 * - `#EXTINF:<秒数>,<タイトル>` の次の行がパス (秒数 -1 = 不明)
 * - パス行の前に `#EXTVLCOPT:start-time=<秒>` / `#EXTVLCOPT:stop-time=<秒>` でトリム指定
 * - `#EXTOVERLAY:text=<文字列>` / `hold=<秒>` / `delay=<秒>` / `skip=1` でタイトル表示を上書き
 * - `#EXTM3U`・空行・未知のディレクティブは無視
 * - 相対パスはプレイリストファイルのディレクトリ基準で絶対パスに解決
 */

const REMOTE_PREFIXES = ['http://', 'https://', 'rtmp://', 'rtsp://'];

interface PendingMeta {
  title?: string;
  duration?: number;
  trimIn?: number;
  trimOut?: number;
  overlay?: TrackOverlay;
}

const FALSY_FLAGS = new Set(['', '0', 'false', 'no']);

export function isRemotePath(entry: string): boolean {
  return REMOTE_PREFIXES.some((prefix) => entry.toLowerCase().startsWith(prefix));
}

export function parseM3U(text: string, options: { name: string; baseDir: string; loop: boolean }): Playlist {
  const tracks: Track[] = [];
  let meta: PendingMeta = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line === '#EXTM3U') continue;

    if (line.startsWith('#EXTINF:')) {
      const rest = line.slice('#EXTINF:'.length);
      const comma = rest.indexOf(',');
      const durationText = comma === -1 ? rest : rest.slice(0, comma);
      const duration = Number.parseFloat(durationText);
      meta.duration = Number.isFinite(duration) && duration >= 0 ? Math.trunc(duration) : UNKNOWN_DURATION;
      meta.title = comma === -1 ? '' : rest.slice(comma + 1).trim();
      continue;
    }

    if (line.startsWith('#EXTVLCOPT:')) {
      const [key, value] = splitOnce(line.slice('#EXTVLCOPT:'.length), '=');
      const seconds = Number.parseFloat(value);
      if (!Number.isFinite(seconds) || seconds < 0) continue;
      if (key === 'start-time') meta.trimIn = seconds;
      if (key === 'stop-time') meta.trimOut = seconds;
      continue;
    }

    if (line.startsWith('#EXTOVERLAY:')) {
      const overlay = parseOverlayDirective(line.slice('#EXTOVERLAY:'.length));
      if (overlay) meta.overlay = { ...meta.overlay, ...overlay };
      continue;
    }

    if (line.startsWith('#')) continue;

    tracks.push(buildTrack(line, meta, options));
    meta = {};
  }

  return { name: options.name, tracks, loop: options.loop };
}

function buildTrack(entry: string, meta: PendingMeta, options: { name: string; baseDir: string }): Track {
  const remote = isRemotePath(entry);
  const trackPath = remote ? entry : path.resolve(options.baseDir, entry);
  const fallbackTitle = remote ? entry : path.parse(entry).name;

  let trimIn = meta.trimIn ?? null;
  let trimOut = meta.trimOut ?? null;
  if (trimOut !== null && trimOut <= (trimIn ?? 0)) {
    console.warn(`[M3U] "${options.name}": stop-time ${trimOut} is not after start-time for ${entry}, ignoring`);
    trimOut = null;
  }
  if (trimIn === 0) trimIn = null;

  const track: Track = {
    path: trackPath,
    title: meta.title || fallbackTitle,
    duration: meta.duration ?? UNKNOWN_DURATION,
    trimIn,
    trimOut,
    remote,
  };
  return meta.overlay ? { ...track, overlay: meta.overlay } : track;
}

/** `key=value` 1 つ分。未知のキーや数値でない秒数は null */
function parseOverlayDirective(directive: string): TrackOverlay | null {
  const [rawKey, value] = splitOnce(directive, '=');
  const key = rawKey.toLowerCase();
  if (key === 'text') return value ? { text: value } : null;
  if (key === 'skip') return { skip: !FALSY_FLAGS.has(value.toLowerCase()) };
  if (key === 'hold' || key === 'delay') {
    const seconds = Number.parseFloat(value);
    if (!Number.isFinite(seconds) || seconds < 0) return null;
    const ms = Math.round(seconds * 1000);
    return key === 'hold' ? { holdMs: ms } : { delayMs: ms };
  }
  return null;
}

export function serializeM3U(playlist: Playlist): string {
  const lines = ['#EXTM3U', ''];
  for (const track of playlist.tracks) {
    lines.push(`#EXTINF:${track.duration},${track.title}`);
    if (track.trimIn !== null) lines.push(`#EXTVLCOPT:start-time=${track.trimIn}`);
    if (track.trimOut !== null) lines.push(`#EXTVLCOPT:stop-time=${track.trimOut}`);
    if (track.overlay) lines.push(...overlayLines(track.overlay));
    lines.push(track.path, '');
  }
  return lines.join('\n');
}

function overlayLines(overlay: TrackOverlay): string[] {
  const lines: string[] = [];
  if (overlay.text !== undefined) lines.push(`#EXTOVERLAY:text=${overlay.text}`);
  if (overlay.holdMs !== undefined) lines.push(`#EXTOVERLAY:hold=${overlay.holdMs / 1000}`);
  if (overlay.delayMs !== undefined) lines.push(`#EXTOVERLAY:delay=${overlay.delayMs / 1000}`);
  if (overlay.skip) lines.push('#EXTOVERLAY:skip=1');
  return lines;
}

/** ファイルから読み込む。プレイリスト名はファイル名 (拡張子なし) */
export async function readM3UFile(filePath: string, loop: boolean): Promise<Playlist> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseM3U(text, {
    name: path.parse(filePath).name,
    baseDir: path.dirname(filePath),
    loop,
  });
}

function splitOnce(text: string, separator: string): [string, string] {
  const index = text.indexOf(separator);
  if (index === -1) return [text.trim(), ''];
  return [text.slice(0, index).trim(), text.slice(index + 1).trim()];
}
