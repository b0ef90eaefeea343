import dgram from 'node:dgram';
import type { AddressInfo } from 'node:net';
import type { Broadcaster } from '../broadcast/Broadcaster.js';
import { isRelayStatus, type CommandRouter, type RelayStatus } from '../command/CommandRouter.js';
import type { RelayEvent } from '../core/EventBus.js';
import { errorMessage } from '../core/errors.js';
import {
  decodePacket,
  encodePacket,
  flattenPacket,
  IMMEDIATELY,
  numericArg,
  type OscMessage,
  type OscPacket,
} from './OscCodec.js';

export interface OscBridgeOptions {
  listenHost: string;
  listenPort: number;
  replyHost: string;
  replyPort: number;
  /** 設定時はすべての OSC コマンドにこの資格情報を付ける */
  credential?: string;
}

export interface CommandEnvelope {
  cmd: string;
  params?: Record<string, unknown>;
}

const SUBSCRIBER_ID = 'osc:feedback';

/**
 * OSC アドレス → コマンド。対応しないアドレスは null
 *
 *   /obs/scene/{preset}            プリセット起動
 *   /obs/playlist/next | prev
 *   /obs/playlist/activate/{name}
 *   /obs/playlist/seek [int]
 *   /obs/stream/start | stop
 *   /obs/record/start | stop
 *   /obs/volume/{source} [0..1]    -60..0 dB に変換
 *   /obs/mute/{source} [0|1]
 *   /obs/autoadvance [0|1]
 *   /obs/state/query               状態の再送
 */
export function oscToCommand(message: OscMessage): CommandEnvelope | null {
  const parts = message.address.split('/').filter((part) => part !== '');
  if (parts[0] !== 'obs') return null;
  const [, group, action, ...rest] = parts;
  const value = numericArg(message.args[0]);

  switch (group) {
    case 'scene':
      return action ? { cmd: 'activate_preset', params: { name: [action, ...rest].join('/') } } : null;
    case 'playlist':
      if (action === 'next') return { cmd: 'playlist_next' };
      if (action === 'prev') return { cmd: 'playlist_prev' };
      if (action === 'activate' && rest.length > 0) {
        return { cmd: 'playlist_activate', params: { name: rest.join('/') } };
      }
      if (action === 'seek') {
        return { cmd: 'playlist_seek', params: value === undefined ? {} : { position: Math.trunc(value) } };
      }
      return null;
    case 'stream':
      if (action === 'start') return { cmd: 'stream_start' };
      if (action === 'stop') return { cmd: 'stream_stop' };
      return null;
    case 'record':
      if (action === 'start') return { cmd: 'record_start' };
      if (action === 'stop') return { cmd: 'record_stop' };
      return null;
    case 'volume':
      if (!action || value === undefined) return null;
      return {
        cmd: 'set_volume',
        params: { source_name: [action, ...rest].join('/'), volume_db: faderToDb(value) },
      };
    case 'mute':
      if (!action || value === undefined) return null;
      return { cmd: 'set_mute', params: { source_name: [action, ...rest].join('/'), muted: value !== 0 } };
    case 'autoadvance':
      return value === undefined ? null : { cmd: 'set_auto_advance', params: { enabled: value !== 0 } };
    case 'state':
      return action === 'query' ? { cmd: 'get_status' } : null;
    default:
      return null;
  }
}

/** フェーダー値 0.0–1.0 → -60..0 dB (範囲外は丸める) */
export function faderToDb(value: number): number {
  const clamped = Math.min(1, Math.max(0, value));
  return clamped * 60 - 60;
}

/** イベント → フィードバック用 OSC メッセージ */
export function eventToFeedback(event: RelayEvent): OscMessage[] {
  switch (event.name) {
    case 'scene_switched':
    case 'scene_changed_external':
      return [{ address: '/obs/state/scene', args: [{ type: 's', value: event.data.scene }] }];
    case 'stream_started':
    case 'stream_stopped':
      return [
        { address: '/obs/state/stream', args: [{ type: 'i', value: event.name === 'stream_started' ? 1 : 0 }] },
      ];
    case 'recording_started':
    case 'recording_stopped':
      return [
        { address: '/obs/state/record', args: [{ type: 'i', value: event.name === 'recording_started' ? 1 : 0 }] },
      ];
    case 'playlist_activated':
      return [
        { address: '/obs/state/playlist', args: [{ type: 's', value: event.data.playlist }] },
        { address: '/obs/state/track', args: [{ type: 's', value: event.data.track }] },
      ];
    case 'track_changed':
      return [{ address: '/obs/state/track', args: [{ type: 's', value: event.data.track }] }];
    case 'session_connected':
    case 'session_disconnected':
      return [
        {
          address: '/obs/state/connected',
          args: [{ type: 'i', value: event.name === 'session_connected' ? 1 : 0 }],
        },
      ];
    default:
      return [];
  }
}

/** get_status の結果 → 状態一式 */
export function statusToFeedback(status: RelayStatus): OscMessage[] {
  const messages: OscMessage[] = [
    { address: '/obs/state/connected', args: [{ type: 'i', value: status.healthy ? 1 : 0 }] },
  ];
  if (status.scene !== null) {
    messages.push({ address: '/obs/state/scene', args: [{ type: 's', value: status.scene }] });
  }
  if (status.playlist.activePlaylist !== null) {
    messages.push({ address: '/obs/state/playlist', args: [{ type: 's', value: status.playlist.activePlaylist }] });
  }
  if (status.playlist.currentTrack) {
    messages.push({ address: '/obs/state/track', args: [{ type: 's', value: status.playlist.currentTrack.title }] });
  }
  return messages;
}

/**
 * UDP で OSC を受けて CommandRouter に流し、
 * イベントを replyHost:replyPort へフィードバックする
 */
export class OscBridge {
  private socket: dgram.Socket | null = null;

  constructor(
    private router: CommandRouter,
    private broadcaster: Broadcaster,
    private options: OscBridgeOptions,
  ) {}

  async start(): Promise<AddressInfo> {
    if (this.socket) return this.socket.address();

    const socket = dgram.createSocket('udp4');
    socket.on('message', (buf, rinfo) => {
      this.handlePacket(buf, `${rinfo.address}:${rinfo.port}`).catch((err) => {
        console.error('[OscBridge] Failed to handle packet:', err);
      });
    });
    socket.on('error', (err) => console.error('[OscBridge] Socket error:', err.message));

    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(this.options.listenPort, this.options.listenHost, () => {
        socket.off('error', reject);
        resolve();
      });
    });
    // 255.255.255.255 へのフィードバックに必要
    socket.setBroadcast(true);
    this.socket = socket;

    this.broadcaster.register({
      id: SUBSCRIBER_ID,
      isOpen: () => this.socket !== null,
      // UDP の送信失敗は一時的なもの。購読を外すのはソケットを閉じたときだけ
      deliver: (event) =>
        this.sendAll(eventToFeedback(event)).catch((err) => {
          console.warn(`[OscBridge] Feedback for ${event.name} not sent: ${errorMessage(err)}`);
        }),
    });

    const address = socket.address();
    console.log(
      `[OscBridge] Listening on ${address.address}:${address.port} → feedback to ${this.options.replyHost}:${this.options.replyPort}`,
    );
    return address;
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    this.broadcaster.unregister(SUBSCRIBER_ID, 'shutdown');
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    console.log('[OscBridge] Stopped');
  }

  isRunning(): boolean {
    return this.socket !== null;
  }

  private async handlePacket(buf: Buffer, origin: string): Promise<void> {
    let packet: OscPacket;
    try {
      packet = decodePacket(buf);
    } catch (err) {
      console.warn(`[OscBridge] Dropped malformed packet from ${origin}: ${errorMessage(err)}`);
      return;
    }

    // bundle 内のメッセージは順に処理する
    for (const message of flattenPacket(packet)) {
      await this.handleMessage(message, origin);
    }
  }

  private async handleMessage(message: OscMessage, origin: string): Promise<void> {
    const command = oscToCommand(message);
    if (!command) {
      console.log(`[OscBridge] Unhandled address ${message.address} from ${origin}`);
      return;
    }

    const result = await this.router.dispatch(command, {
      subscriberId: `osc:${origin}`,
      credential: this.options.credential,
    });
    if (!result.ok) {
      console.warn(`[OscBridge] ${message.address} → ${command.cmd} failed: ${result.error.code}: ${result.error.message}`);
      return;
    }
    if (command.cmd === 'get_status' && isRelayStatus(result.data)) {
      await this.sendAll(statusToFeedback(result.data));
    }
  }

  private async sendAll(messages: OscMessage[]): Promise<void> {
    if (messages.length === 0) return;
    const packet: OscPacket = messages.length === 1 ? messages[0] : { timetag: IMMEDIATELY, elements: messages };
    await this.send(encodePacket(packet));
  }

  private send(buf: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.resolve();
    return new Promise((resolve, reject) => {
      socket.send(buf, this.options.replyPort, this.options.replyHost, (err) => (err ? reject(err) : resolve()));
    });
  }
}
