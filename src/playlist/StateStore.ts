import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PersistenceFailureError, errorMessage } from '../core/errors.js';
import { defaultPlaylistState, type PlaylistState } from './types.js';

const recordSchema = z.object({
  active_playlist: z.string().nullable(),
  position: z.number().int().min(0),
  auto_advance: z.boolean(),
  updated_at: z.string(),
});

type StateRecord = z.infer<typeof recordSchema>;

export interface PlaylistStateStore {
  load(): Promise<PlaylistState>;
  commit(state: PlaylistState): Promise<void>;
}

/**
 * 再生位置のスナップショットを 1 レコードの JSON として保存する。
 * 一時ファイルに書いてから rename するので、途中で落ちても前回の内容が残る。
 */
export class StateStore implements PlaylistStateStore {
  constructor(
    private filePath: string,
    private defaultAutoAdvance: boolean,
  ) {}

  /** 前回 commit した状態。ファイルが無い・壊れている場合はデフォルト */
  async load(): Promise<PlaylistState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (!isNotFound(err)) {
        console.warn(`[StateStore] Could not read ${this.filePath}: ${errorMessage(err)}`);
      }
      return defaultPlaylistState(this.defaultAutoAdvance);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      console.warn(`[StateStore] ${this.filePath} is not valid JSON, using defaults: ${errorMessage(err)}`);
      return defaultPlaylistState(this.defaultAutoAdvance);
    }

    const parsed = recordSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[StateStore] ${this.filePath} has an unexpected shape, using defaults`);
      return defaultPlaylistState(this.defaultAutoAdvance);
    }
    return fromRecord(parsed.data);
  }

  async commit(state: PlaylistState): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(toRecord(state), null, 2) + '\n', 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((rmErr) => {
        console.warn(`[StateStore] Could not remove ${tmpPath}: ${errorMessage(rmErr)}`);
      });
      throw new PersistenceFailureError(`Could not write ${this.filePath}: ${errorMessage(err)}`);
    }
  }
}

function toRecord(state: PlaylistState): StateRecord {
  return {
    active_playlist: state.activePlaylist,
    position: state.position,
    auto_advance: state.autoAdvance,
    updated_at: state.updatedAt,
  };
}

function fromRecord(record: StateRecord): PlaylistState {
  return {
    activePlaylist: record.active_playlist,
    position: record.position,
    autoAdvance: record.auto_advance,
    updatedAt: record.updated_at,
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
