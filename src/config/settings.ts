import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';

/**
 * 設定の優先順位: 環境変数 > config.yaml > デフォルト
 */

const presetActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('set_volume'), source: z.string().min(1), volumeDb: z.number() }),
  z.object({ type: z.literal('set_mute'), source: z.string().min(1), muted: z.boolean() }),
  z.object({ type: z.enum(['media_play', 'media_pause', 'media_restart']), source: z.string().min(1) }),
]);

const presetSchema = z.object({
  name: z.string().min(1),
  sceneName: z.string().min(1),
  description: z.string().default(''),
  playlist: z.string().min(1).nullable().default(null),
  actions: z.array(presetActionSchema).default([]),
});

const settingsSchema = z.object({
  obs: z
    .object({
      host: z.string().min(1).default('localhost'),
      port: z.coerce.number().int().min(1).max(65535).default(4455),
      password: z.string().default(''),
      reconnectIntervalMs: z.coerce.number().int().min(0).default(5000),
      maxReconnectIntervalMs: z.coerce.number().int().min(0).default(60000),
      backoff: z.enum(['fixed', 'exponential']).default('fixed'),
      maxReconnectAttempts: z.coerce.number().int().min(0).default(10),
      requestTimeoutMs: z.coerce.number().int().min(1).default(10000),
    })
    .default({}),
  api: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(8080),
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
  osc: z
    .object({
      enabled: z.boolean().default(true),
      listenHost: z.string().min(1).default('0.0.0.0'),
      listenPort: z.coerce.number().int().min(0).max(65535).default(9000),
      replyHost: z.string().min(1).default('255.255.255.255'),
      replyPort: z.coerce.number().int().min(1).max(65535).default(9001),
      credential: z.string().min(1).optional(),
    })
    .default({}),
  playlist: z
    .object({
      directory: z.string().min(1).default('playlists'),
      stateFile: z.string().min(1).default('playlist_state.json'),
      sourceName: z.string().min(1).default('MediaSource'),
      loop: z.boolean().default(true),
      defaultPlaylist: z.string().min(1).optional(),
      autoAdvance: z.boolean().default(true),
      preflight: z.enum(['off', 'warn', 'enforce']).default('warn'),
      probeDurations: z.boolean().default(true),
    })
    .default({}),
  overlay: z
    .object({
      enabled: z.boolean().default(true),
      sourceName: z.string().min(1).default('TitleOverlay'),
      sceneName: z.string().default(''),
      holdMs: z.coerce.number().int().min(0).default(8000),
      delayMs: z.coerce.number().int().min(0).default(1000),
      prefix: z.string().default(''),
      suffix: z.string().default(''),
      autoTrigger: z.boolean().default(true),
    })
    .default({}),
  broadcast: z
    .object({
      queueSize: z.coerce.number().int().min(1).default(100),
    })
    .default({}),
  presets: z.array(presetSchema).default([]),
});

export type Settings = z.infer<typeof settingsSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

/** 環境変数名 → [セクション, キー, 型] */
const ENV_MAP: Array<[string, string, string, 'string' | 'number' | 'boolean']> = [
  ['OBS_HOST', 'obs', 'host', 'string'],
  ['OBS_PORT', 'obs', 'port', 'number'],
  ['OBS_PASSWORD', 'obs', 'password', 'string'],
  ['OBS_RECONNECT_INTERVAL_MS', 'obs', 'reconnectIntervalMs', 'number'],
  ['OBS_MAX_RECONNECT_INTERVAL_MS', 'obs', 'maxReconnectIntervalMs', 'number'],
  ['OBS_BACKOFF', 'obs', 'backoff', 'string'],
  ['OBS_MAX_RECONNECT_ATTEMPTS', 'obs', 'maxReconnectAttempts', 'number'],
  ['OBS_REQUEST_TIMEOUT_MS', 'obs', 'requestTimeoutMs', 'number'],
  ['API_HOST', 'api', 'host', 'string'],
  ['API_PORT', 'api', 'port', 'number'],
  ['API_KEY', 'api', 'apiKey', 'string'],
  ['OSC_ENABLED', 'osc', 'enabled', 'boolean'],
  ['OSC_LISTEN_HOST', 'osc', 'listenHost', 'string'],
  ['OSC_LISTEN_PORT', 'osc', 'listenPort', 'number'],
  ['OSC_REPLY_HOST', 'osc', 'replyHost', 'string'],
  ['OSC_REPLY_PORT', 'osc', 'replyPort', 'number'],
  ['OSC_CREDENTIAL', 'osc', 'credential', 'string'],
  ['PLAYLIST_DIR', 'playlist', 'directory', 'string'],
  ['PLAYLIST_STATE_FILE', 'playlist', 'stateFile', 'string'],
  ['PLAYLIST_SOURCE_NAME', 'playlist', 'sourceName', 'string'],
  ['PLAYLIST_LOOP', 'playlist', 'loop', 'boolean'],
  ['PLAYLIST_DEFAULT', 'playlist', 'defaultPlaylist', 'string'],
  ['PLAYLIST_AUTO_ADVANCE', 'playlist', 'autoAdvance', 'boolean'],
  ['PLAYLIST_PREFLIGHT', 'playlist', 'preflight', 'string'],
  ['PLAYLIST_PROBE_DURATIONS', 'playlist', 'probeDurations', 'boolean'],
  ['OVERLAY_ENABLED', 'overlay', 'enabled', 'boolean'],
  ['OVERLAY_SOURCE_NAME', 'overlay', 'sourceName', 'string'],
  ['OVERLAY_SCENE_NAME', 'overlay', 'sceneName', 'string'],
  ['OVERLAY_HOLD_MS', 'overlay', 'holdMs', 'number'],
  ['OVERLAY_DELAY_MS', 'overlay', 'delayMs', 'number'],
  ['OVERLAY_PREFIX', 'overlay', 'prefix', 'string'],
  ['OVERLAY_SUFFIX', 'overlay', 'suffix', 'string'],
  ['OVERLAY_AUTO_TRIGGER', 'overlay', 'autoTrigger', 'boolean'],
  ['BROADCAST_QUEUE_SIZE', 'broadcast', 'queueSize', 'number'],
];

export interface LoadOptions {
  env?: Env;
  /** 省略時は RELAY_CONFIG_FILE か ./config.yaml */
  configPath?: string;
}

export function loadSettings(options: LoadOptions = {}): Settings {
  const env = options.env ?? process.env;
  const configPath = options.configPath || env.RELAY_CONFIG_FILE || path.join(process.cwd(), 'config.yaml');

  const merged = applyEnv(readYaml(configPath), env);
  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}

function readYaml(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};
  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError([`${configPath}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) throw new ConfigError([`${configPath}: top level must be a mapping`]);
  console.log(`[Settings] Loaded ${configPath}`);
  return data;
}

function applyEnv(base: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [name, section, key, type] of ENV_MAP) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    const current = result[section];
    const target: Record<string, unknown> = isRecord(current) ? { ...current } : {};
    target[key] = type === 'boolean' ? parseBoolean(raw) : raw;
    result[section] = target;
  }
  return result;
}

function parseBoolean(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  // スキーマ検証でエラーにする
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
