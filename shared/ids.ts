import { ValidationError } from './errors';

export type HexString = string;

const HEX_32 = /^[0-9a-fA-F]{64}$/;

export function toHex(bytes: Uint8Array): HexString {
  return Buffer.from(bytes).toString('hex');
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function fixed32(bytes: Uint8Array, what: string, code: ValidationError['code']): Uint8Array {
  if (bytes.length !== 32) {
    throw new ValidationError(`${what} must be exactly 32 bytes, got ${bytes.length}`, code);
  }
  return Uint8Array.from(bytes);
}

function hex32(value: string, what: string, code: ValidationError['code']): Uint8Array {
  if (!HEX_32.test(value)) {
    throw new ValidationError(`invalid ${what}: expected 64 hex characters`, code);
  }
  return new Uint8Array(Buffer.from(value, 'hex'));
}

/**
 * Public identifier of a node: its ed25519 public key.
 * Only obtainable through validated parsing.
 */
export class PeerId {
  private constructor(private readonly key: Uint8Array) {}

  static parse(value: string): PeerId {
    return new PeerId(hex32(value.trim(), 'peer id', 'INVALID_PEER_ID'));
  }

  static fromBytes(bytes: Uint8Array): PeerId {
    return new PeerId(fixed32(bytes, 'peer id', 'INVALID_PEER_ID'));
  }

  get bytes(): Uint8Array {
    return this.key.slice();
  }

  equals(other: PeerId): boolean {
    return bytesEqual(this.key, other.key);
  }

  toString(): HexString {
    return toHex(this.key);
  }

  /** First 8 hex characters, for log lines. */
  short(): string {
    return this.toString().slice(0, 8);
  }
}

/** 32 opaque bytes naming a gossip topic. */
export class Topic {
  private constructor(private readonly id: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): Topic {
    return new Topic(fixed32(bytes, 'topic', 'INVALID_TOPIC'));
  }

  static parse(value: string): Topic {
    return new Topic(hex32(value.trim(), 'topic', 'INVALID_TOPIC'));
  }

  get bytes(): Uint8Array {
    return this.id.slice();
  }

  equals(other: Topic): boolean {
    return bytesEqual(this.id, other.id);
  }

  toString(): HexString {
    return toHex(this.id);
  }
}

/** SHA-256 digest naming a blob. */
export class Hash {
  private constructor(private readonly digest: Uint8Array) {}

  static parse(value: string): Hash {
    return new Hash(hex32(value.trim(), 'hash', 'INVALID_HASH'));
  }

  static fromBytes(bytes: Uint8Array): Hash {
    return new Hash(fixed32(bytes, 'hash', 'INVALID_HASH'));
  }

  get bytes(): Uint8Array {
    return this.digest.slice();
  }

  equals(other: Hash): boolean {
    return bytesEqual(this.digest, other.digest);
  }

  toString(): HexString {
    return toHex(this.digest);
  }
}

/** Where a node can be reached. */
export interface NodeAddr {
  peerId: PeerId;
  addresses: string[];
}
