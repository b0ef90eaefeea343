import { z } from 'zod';
import { SchemaError } from '../core/errors.js';

const noParams = z.object({}).passthrough();

const commandSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('activate_preset'), params: z.object({ name: z.string().min(1) }) }),
  z.object({ name: z.literal('switch_scene'), params: z.object({ scene_name: z.string().min(1) }) }),
  z.object({ name: z.literal('playlist_activate'), params: z.object({ name: z.string().min(1) }) }),
  z.object({ name: z.literal('playlist_next'), params: noParams }),
  z.object({ name: z.literal('playlist_prev'), params: noParams }),
  z.object({ name: z.literal('playlist_seek'), params: z.object({ position: z.number().int() }) }),
  z.object({ name: z.literal('playlist_validate'), params: noParams }),
  z.object({ name: z.literal('set_auto_advance'), params: z.object({ enabled: z.boolean() }) }),
  z.object({ name: z.literal('stream_start'), params: noParams }),
  z.object({ name: z.literal('stream_stop'), params: noParams }),
  z.object({ name: z.literal('record_start'), params: noParams }),
  z.object({ name: z.literal('record_stop'), params: noParams }),
  z.object({
    name: z.literal('set_transition'),
    params: z
      .object({
        name: z.string().min(1).optional(),
        duration_ms: z.number().int().min(0).optional(),
      })
      .refine((p) => p.name !== undefined || p.duration_ms !== undefined, {
        message: 'name or duration_ms is required',
      }),
  }),
  z.object({
    name: z.literal('set_volume'),
    params: z.object({ source_name: z.string().min(1), volume_db: z.number().max(26).min(-100) }),
  }),
  z.object({ name: z.literal('set_mute'), params: z.object({ source_name: z.string().min(1), muted: z.boolean() }) }),
  z.object({
    name: z.literal('overlay_trigger'),
    params: z.object({
      text: z.string().min(1),
      hold_ms: z.number().int().min(0).optional(),
      delay_ms: z.number().int().min(0).optional(),
    }),
  }),
  z.object({ name: z.literal('overlay_trigger_current'), params: noParams }),
  z.object({ name: z.literal('overlay_hide'), params: noParams }),
  z.object({
    name: z.literal('overlay_configure'),
    params: z
      .object({
        enabled: z.boolean(),
        source_name: z.string().min(1),
        scene_name: z.string(),
        hold_ms: z.number().int().min(0),
        delay_ms: z.number().int().min(0),
        prefix: z.string(),
        suffix: z.string(),
        auto_trigger: z.boolean(),
      })
      .partial()
      .strict(),
  }),
  z.object({ name: z.literal('session_reconnect'), params: noParams }),
  z.object({ name: z.literal('get_status'), params: noParams }),
]);

export type Command = z.infer<typeof commandSchema>;
export type CommandName = Command['name'];

export const COMMAND_NAMES: readonly CommandName[] = commandSchema.options.map((option) => option.shape.name.value);

const envelopeSchema = z.object({
  cmd: z.string(),
  params: z.record(z.unknown()).optional(),
});

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((known) => known === name);
}

/**
 * `{ cmd, params }` 形式の受信メッセージをコマンドに変換する。
 * 未知のコマンド名・パラメータ不足・型違いはすべて SchemaError
 */
export function parseCommand(raw: unknown): Command {
  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new SchemaError('Expected { cmd: string, params?: object }');
  }

  const { cmd, params } = envelope.data;
  if (!isCommandName(cmd)) {
    throw new SchemaError(`Unknown command: ${cmd}`);
  }

  const parsed = commandSchema.safeParse({ name: cmd, params: params ?? {} });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.filter((p) => p !== 'params').join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    throw new SchemaError(`Invalid parameters for ${cmd}: ${detail}`);
  }
  return parsed.data;
}

/** `cmd` 文字列だけ取り出す (結果メッセージに付けるため)。取れなければ null */
export function commandNameOf(raw: unknown): string | null {
  const envelope = envelopeSchema.safeParse(raw);
  return envelope.success ? envelope.data.cmd : null;
}
