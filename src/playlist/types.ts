export const UNKNOWN_DURATION = -1;

/** `#EXTOVERLAY:` によるトラックごとのタイトル表示の上書き */
export interface TrackOverlay {
  text?: string;
  holdMs?: number;
  delayMs?: number;
  skip?: boolean;
}

export interface Track {
  /** 絶対パス。リモートの場合は URL */
  readonly path: string;
  readonly title: string;
  /** 秒。不明なら UNKNOWN_DURATION */
  readonly duration: number;
  readonly trimIn: number | null;
  readonly trimOut: number | null;
  readonly remote: boolean;
  readonly overlay?: TrackOverlay;
}

export interface Playlist {
  readonly name: string;
  readonly tracks: readonly Track[];
  readonly loop: boolean;
}

export interface PlaylistState {
  activePlaylist: string | null;
  position: number;
  autoAdvance: boolean;
  updatedAt: string;
}

/** プレイリスト名 → 存在しないトラックのパス */
export type PreflightReport = Record<string, string[]>;

export function defaultPlaylistState(autoAdvance: boolean): PlaylistState {
  return { activePlaylist: null, position: 0, autoAdvance, updatedAt: new Date(0).toISOString() };
}
