import fs from 'node:fs';
import path from 'node:path';
import { parseFile } from 'music-metadata';
import { errorMessage } from '../core/errors.js';
import { readM3UFile } from './m3u.js';
import { UNKNOWN_DURATION, type Playlist, type PreflightReport, type Track } from './types.js';

const PLAYLIST_EXTENSIONS = new Set(['.m3u', '.m3u8']);

export interface LibraryOptions {
  /** EXTINF に秒数がないローカルファイルの長さをメタデータから補完する */
  probeDurations: boolean;
  loop: boolean;
}

/**
 * 起動時にディスクから読み込んだプレイリスト一式。セッション中は不変 (再読込 = 再起動)
 */
export class PlaylistLibrary {
  private playlists = new Map<string, Playlist>();
  private lastReport: PreflightReport | null = null;

  static fromPlaylists(playlists: Playlist[]): PlaylistLibrary {
    const library = new PlaylistLibrary();
    for (const playlist of playlists) {
      library.playlists.set(playlist.name, playlist);
    }
    return library;
  }

  /** ディレクトリ内の *.m3u / *.m3u8 をすべて読み込む。読めないファイルはスキップ */
  static async loadDirectory(directory: string, options: LibraryOptions): Promise<PlaylistLibrary> {
    const library = new PlaylistLibrary();
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
      console.warn(`[PlaylistLibrary] Created empty playlist directory ${directory}`);
      return library;
    }

    const files = fs.readdirSync(directory)
      .filter((f) => PLAYLIST_EXTENSIONS.has(path.extname(f).toLowerCase()))
      .sort();

    for (const file of files) {
      try {
        const parsed = await readM3UFile(path.join(directory, file), options.loop);
        const playlist = options.probeDurations
          ? { ...parsed, tracks: await Promise.all(parsed.tracks.map(probeDuration)) }
          : parsed;
        if (library.playlists.has(playlist.name)) {
          console.warn(`[PlaylistLibrary] Duplicate playlist name "${playlist.name}" (${file}), keeping the first`);
          continue;
        }
        library.playlists.set(playlist.name, playlist);
        console.log(`[PlaylistLibrary] Loaded "${playlist.name}": ${playlist.tracks.length} tracks`);
      } catch (err) {
        console.error(`[PlaylistLibrary] Failed to load ${file}: ${errorMessage(err)}`);
      }
    }

    return library;
  }

  get(name: string): Playlist | undefined {
    return this.playlists.get(name);
  }

  list(): Playlist[] {
    return [...this.playlists.values()];
  }

  get size(): number {
    return this.playlists.size;
  }

  /** 全プレイリストの全トラックについて、存在しないファイルのパスを列挙する (状態は変更しない) */
  validate(): PreflightReport {
    const report: PreflightReport = {};
    for (const playlist of this.playlists.values()) {
      report[playlist.name] = playlist.tracks
        .filter((track) => !track.remote && !fs.existsSync(track.path))
        .map((track) => track.path);
    }
    this.lastReport = report;
    return report;
  }

  /** 直近の validate() 結果。未実行なら null */
  preflightFor(name: string): string[] | null {
    if (!this.lastReport) return null;
    return this.lastReport[name] ?? null;
  }
}

async function probeDuration(track: Track): Promise<Track> {
  if (track.remote || track.duration !== UNKNOWN_DURATION || !fs.existsSync(track.path)) {
    return track;
  }
  try {
    const metadata = await parseFile(track.path, { duration: true, skipCovers: true });
    const seconds = metadata.format.duration;
    if (seconds !== undefined && Number.isFinite(seconds)) {
      return { ...track, duration: Math.round(seconds) };
    }
  } catch (err) {
    console.warn(`[PlaylistLibrary] Could not probe duration of ${track.path}: ${errorMessage(err)}`);
  }
  return track;
}
