import { DecodeError } from './errors';

export const MAGIC = 0x4d;
export const VERSION = 0x01;
const HEADER_SIZE = 8;

const utf8 = new TextEncoder();
const utf8Decoder = new TextDecoder();

/** Protocol tags negotiated in the HELLO frame. */
export const GOSSIP_ALPN = utf8.encode('/mesh-gossip/1');
export const BLOBS_ALPN = utf8.encode('/mesh-bytes/1');
export const DOCS_ALPN = utf8.encode('/mesh-sync/1');

export function alpn(name: string): Uint8Array {
  return utf8.encode(name);
}

export function alpnToString(tag: Uint8Array): string {
  return utf8Decoder.decode(tag);
}

// ─── Transport frames ──────────────────────────────────────────────

export enum FrameType {
  HELLO = 1,
  ACCEPT = 2,
  AUTH = 3,
  REJECT = 4,
  DATA = 5,
  CLOSE = 6,
}

export type Frame =
  | { type: FrameType.HELLO; alpn: Uint8Array; peerId: Uint8Array; challenge: Uint8Array }
  | { type: FrameType.ACCEPT; peerId: Uint8Array; signature: Uint8Array; challenge: Uint8Array }
  | { type: FrameType.AUTH; signature: Uint8Array }
  | { type: FrameType.REJECT; reason: string }
  | { type: FrameType.DATA; payload: Uint8Array }
  | { type: FrameType.CLOSE; reason: string };

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((acc, p) => acc + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function u16(value: number): Uint8Array {
  const buf = new Uint8Array(2);
  new DataView(buf.buffer).setUint16(0, value, false);
  return buf;
}

function u64(value: number): Uint8Array {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, BigInt(value), false);
  return buf;
}

class Reader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  take(length: number): Uint8Array {
    if (this.offset + length > this.bytes.length) throw new DecodeError('frame truncated');
    const out = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  u8(): number {
    return this.take(1)[0] ?? 0;
  }

  u16(): number {
    if (this.offset + 2 > this.bytes.length) throw new DecodeError('frame truncated');
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }

  u64(): number {
    if (this.offset + 8 > this.bytes.length) throw new DecodeError('frame truncated');
    const value = this.view.getBigUint64(this.offset, false);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new DecodeError('integer out of range');
    return Number(value);
  }

  rest(): Uint8Array {
    return this.take(this.bytes.length - this.offset);
  }
}

function encodeBody(frame: Frame): Uint8Array {
  switch (frame.type) {
    case FrameType.HELLO:
      return concat([u16(frame.alpn.length), frame.alpn, frame.peerId, frame.challenge]);
    case FrameType.ACCEPT:
      return concat([frame.peerId, frame.signature, frame.challenge]);
    case FrameType.AUTH:
      return frame.signature;
    case FrameType.REJECT:
    case FrameType.CLOSE:
      return utf8.encode(frame.reason);
    case FrameType.DATA:
      return frame.payload;
  }
}

export function encodeFrame(frame: Frame): Uint8Array {
  const body = encodeBody(frame);
  const header = new Uint8Array(HEADER_SIZE);
  const dv = new DataView(header.buffer);
  dv.setUint8(0, MAGIC);
  dv.setUint8(1, VERSION);
  dv.setUint8(2, frame.type);
  dv.setUint8(3, 0); // flags
  dv.setUint32(4, body.length, false);
  return concat([header, body]);
}

export function decodeFrame(bytes: Uint8Array): Frame {
  if (bytes.length < HEADER_SIZE) throw new DecodeError('frame too short');
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (dv.getUint8(0) !== MAGIC) throw new DecodeError('bad magic');
  if (dv.getUint8(1) !== VERSION) throw new DecodeError(`unsupported version ${dv.getUint8(1)}`);
  const type = dv.getUint8(2);
  const len = dv.getUint32(4, false);
  if (bytes.length < HEADER_SIZE + len) throw new DecodeError('incomplete frame');
  const body = new Reader(bytes.subarray(HEADER_SIZE, HEADER_SIZE + len));

  switch (type) {
    case FrameType.HELLO: {
      const alpnLen = body.u16();
      return {
        type: FrameType.HELLO,
        alpn: body.take(alpnLen),
        peerId: body.take(32),
        challenge: body.take(32),
      };
    }
    case FrameType.ACCEPT:
      return { type: FrameType.ACCEPT, peerId: body.take(32), signature: body.take(64), challenge: body.take(32) };
    case FrameType.AUTH:
      return { type: FrameType.AUTH, signature: body.take(64) };
    case FrameType.REJECT:
      return { type: FrameType.REJECT, reason: utf8Decoder.decode(body.rest()) };
    case FrameType.CLOSE:
      return { type: FrameType.CLOSE, reason: utf8Decoder.decode(body.rest()) };
    case FrameType.DATA:
      return { type: FrameType.DATA, payload: body.rest() };
    default:
      throw new DecodeError(`unknown frame type ${type}`);
  }
}

/** Bytes a handshake signature covers: the peer's challenge followed by the tag. */
export function handshakeTranscript(challenge: Uint8Array, tag: Uint8Array): Uint8Array {
  return concat([challenge, tag]);
}

// ─── Gossip messages ───────────────────────────────────────────────

export enum GossipMsgType {
  JOIN = 1,
  JOINED = 2,
  MESSAGE = 3,
  LEAVE = 4,
}

export enum BroadcastScope {
  SWARM = 0,
  NEIGHBORS = 1,
}

export type GossipMessage =
  | { type: GossipMsgType.JOIN | GossipMsgType.JOINED | GossipMsgType.LEAVE; topic: Uint8Array }
  | {
      type: GossipMsgType.MESSAGE;
      topic: Uint8Array;
      id: Uint8Array;
      scope: BroadcastScope;
      content: Uint8Array;
    };

export function encodeGossip(msg: GossipMessage): Uint8Array {
  if (msg.type === GossipMsgType.MESSAGE) {
    return concat([new Uint8Array([msg.type]), msg.topic, msg.id, new Uint8Array([msg.scope]), msg.content]);
  }
  return concat([new Uint8Array([msg.type]), msg.topic]);
}

export function decodeGossip(bytes: Uint8Array): GossipMessage {
  const r = new Reader(bytes);
  const type = r.u8();
  switch (type) {
    case GossipMsgType.JOIN:
      return { type: GossipMsgType.JOIN, topic: r.take(32) };
    case GossipMsgType.JOINED:
      return { type: GossipMsgType.JOINED, topic: r.take(32) };
    case GossipMsgType.LEAVE:
      return { type: GossipMsgType.LEAVE, topic: r.take(32) };
    case GossipMsgType.MESSAGE: {
      const topic = r.take(32);
      const id = r.take(16);
      const rawScope = r.u8();
      let scope: BroadcastScope;
      if (rawScope === BroadcastScope.SWARM) scope = BroadcastScope.SWARM;
      else if (rawScope === BroadcastScope.NEIGHBORS) scope = BroadcastScope.NEIGHBORS;
      else throw new DecodeError(`unknown broadcast scope ${rawScope}`);
      return { type: GossipMsgType.MESSAGE, topic, id, scope, content: r.rest() };
    }
    default:
      throw new DecodeError(`unknown gossip message ${type}`);
  }
}

// ─── Blob transfer messages ────────────────────────────────────────

export enum BlobMsgType {
  GET = 1,
  FOUND = 2,
  NOT_FOUND = 3,
  CHUNK = 4,
  END = 5,
}

export type BlobMessage =
  | { type: BlobMsgType.GET; hash: Uint8Array }
  | { type: BlobMsgType.FOUND; size: number }
  | { type: BlobMsgType.NOT_FOUND }
  | { type: BlobMsgType.CHUNK; offset: number; data: Uint8Array }
  | { type: BlobMsgType.END };

export function encodeBlob(msg: BlobMessage): Uint8Array {
  const tag = new Uint8Array([msg.type]);
  switch (msg.type) {
    case BlobMsgType.GET:
      return concat([tag, msg.hash]);
    case BlobMsgType.FOUND:
      return concat([tag, u64(msg.size)]);
    case BlobMsgType.CHUNK:
      return concat([tag, u64(msg.offset), msg.data]);
    case BlobMsgType.NOT_FOUND:
    case BlobMsgType.END:
      return tag;
  }
}

export function decodeBlob(bytes: Uint8Array): BlobMessage {
  const r = new Reader(bytes);
  const type = r.u8();
  switch (type) {
    case BlobMsgType.GET:
      return { type: BlobMsgType.GET, hash: r.take(32) };
    case BlobMsgType.FOUND:
      return { type: BlobMsgType.FOUND, size: r.u64() };
    case BlobMsgType.CHUNK:
      return { type: BlobMsgType.CHUNK, offset: r.u64(), data: r.rest() };
    case BlobMsgType.NOT_FOUND:
      return { type: BlobMsgType.NOT_FOUND };
    case BlobMsgType.END:
      return { type: BlobMsgType.END };
    default:
      throw new DecodeError(`unknown blob message ${type}`);
  }
}
