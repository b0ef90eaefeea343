/**
 * OSC 1.0 のエンコード / デコード
 *
 * - 文字列: UTF-8 + NUL 終端、4 バイト境界までパディング
 * - 数値: ビッグエンディアン (i = int32, f = float32)
 * - blob: [int32 長さ] + データ + パディング
 * - T / F / N は引数データなし
 * - bundle: "#bundle" + 8 バイトのタイムタグ + ([int32 サイズ] + 要素)*
 */

export type OscArgument =
  | { type: 'i'; value: number }
  | { type: 'f'; value: number }
  | { type: 's'; value: string }
  | { type: 'b'; value: Buffer }
  | { type: 'T'; value: true }
  | { type: 'F'; value: false }
  | { type: 'N'; value: null };

export interface OscMessage {
  address: string;
  args: OscArgument[];
}

export interface OscBundle {
  /** NTP 形式 (上位 32bit 秒 / 下位 32bit 小数)。1n は「即時」 */
  timetag: bigint;
  elements: OscPacket[];
}

export type OscPacket = OscMessage | OscBundle;

const BUNDLE_TAG = '#bundle';
export const IMMEDIATELY = 1n;

export class OscDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OscDecodeError';
  }
}

export function isBundle(packet: OscPacket): packet is OscBundle {
  return 'elements' in packet;
}

function padded(length: number): number {
  return Math.ceil(length / 4) * 4;
}

function encodeString(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf-8');
  // NUL 終端のぶん最低 1 バイト
  const block = Buffer.alloc(padded(bytes.length + 1), 0);
  bytes.copy(block);
  return block;
}

function encodeArgument(arg: OscArgument): Buffer {
  switch (arg.type) {
    case 'i': {
      const buf = Buffer.alloc(4);
      buf.writeInt32BE(arg.value);
      return buf;
    }
    case 'f': {
      const buf = Buffer.alloc(4);
      buf.writeFloatBE(arg.value);
      return buf;
    }
    case 's':
      return encodeString(arg.value);
    case 'b': {
      const buf = Buffer.alloc(4 + padded(arg.value.length), 0);
      buf.writeInt32BE(arg.value.length);
      arg.value.copy(buf, 4);
      return buf;
    }
    case 'T':
    case 'F':
    case 'N':
      return Buffer.alloc(0);
  }
}

export function encodeMessage(message: OscMessage): Buffer {
  if (!message.address.startsWith('/')) {
    throw new Error(`OSC address must start with "/": ${message.address}`);
  }
  const typeTags = ',' + message.args.map((arg) => arg.type).join('');
  return Buffer.concat([
    encodeString(message.address),
    encodeString(typeTags),
    ...message.args.map(encodeArgument),
  ]);
}

export function encodePacket(packet: OscPacket): Buffer {
  if (!isBundle(packet)) return encodeMessage(packet);

  const timetag = Buffer.alloc(8);
  timetag.writeBigUInt64BE(packet.timetag);
  const parts: Buffer[] = [encodeString(BUNDLE_TAG), timetag];
  for (const element of packet.elements) {
    const body = encodePacket(element);
    const size = Buffer.alloc(4);
    size.writeInt32BE(body.length);
    parts.push(size, body);
  }
  return Buffer.concat(parts);
}

/**
 * バイト列を順に読むカーソル。範囲外の読み取りは OscDecodeError
 */
class Reader {
  private offset = 0;

  constructor(private buf: Buffer) {}

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private take(length: number): Buffer {
    if (length < 0 || this.offset + length > this.buf.length) {
      throw new OscDecodeError(`Truncated packet at byte ${this.offset}`);
    }
    const slice = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  string(): string {
    const end = this.buf.indexOf(0, this.offset);
    if (end === -1) throw new OscDecodeError(`Unterminated string at byte ${this.offset}`);
    const value = this.buf.toString('utf-8', this.offset, end);
    this.take(padded(end - this.offset + 1));
    return value;
  }

  int32(): number {
    return this.take(4).readInt32BE();
  }

  float32(): number {
    return this.take(4).readFloatBE();
  }

  uint64(): bigint {
    return this.take(8).readBigUInt64BE();
  }

  blob(): Buffer {
    const length = this.int32();
    const data = Buffer.from(this.take(length));
    this.take(padded(length) - length);
    return data;
  }

  bytes(length: number): Buffer {
    return this.take(length);
  }
}

function decodeMessage(reader: Reader, address: string): OscMessage {
  // 型タグなしの古い送信元もある
  if (reader.remaining === 0) return { address, args: [] };

  const tags = reader.string();
  if (!tags.startsWith(',')) throw new OscDecodeError(`Bad type tag string "${tags}"`);

  const args: OscArgument[] = [];
  for (const tag of tags.slice(1)) {
    switch (tag) {
      case 'i':
        args.push({ type: 'i', value: reader.int32() });
        break;
      case 'f':
        args.push({ type: 'f', value: reader.float32() });
        break;
      case 's':
        args.push({ type: 's', value: reader.string() });
        break;
      case 'b':
        args.push({ type: 'b', value: reader.blob() });
        break;
      case 'T':
        args.push({ type: 'T', value: true });
        break;
      case 'F':
        args.push({ type: 'F', value: false });
        break;
      case 'N':
        args.push({ type: 'N', value: null });
        break;
      default:
        throw new OscDecodeError(`Unsupported type tag "${tag}"`);
    }
  }
  return { address, args };
}

export function decodePacket(buf: Buffer): OscPacket {
  const reader = new Reader(buf);
  const head = reader.string();

  if (head === BUNDLE_TAG) {
    const timetag = reader.uint64();
    const elements: OscPacket[] = [];
    while (reader.remaining > 0) {
      const size = reader.int32();
      elements.push(decodePacket(reader.bytes(size)));
    }
    return { timetag, elements };
  }

  if (!head.startsWith('/')) throw new OscDecodeError(`Bad address "${head}"`);
  return decodeMessage(reader, head);
}

/** bundle を展開してメッセージだけを順に返す */
export function flattenPacket(packet: OscPacket): OscMessage[] {
  return isBundle(packet) ? packet.elements.flatMap(flattenPacket) : [packet];
}

/** 数値系の引数を number として取り出す (T/F は 1/0) */
export function numericArg(arg: OscArgument | undefined): number | undefined {
  if (!arg) return undefined;
  switch (arg.type) {
    case 'i':
    case 'f':
      return arg.value;
    case 'T':
      return 1;
    case 'F':
      return 0;
    case 's': {
      const value = arg.value.trim() === '' ? NaN : Number(arg.value);
      return Number.isFinite(value) ? value : undefined;
    }
    default:
      return undefined;
  }
}
