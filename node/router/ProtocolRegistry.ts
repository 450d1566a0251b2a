import { ValidationError } from '../../shared/errors';
import { toHex } from '../../shared/ids';
import { alpnToString } from '../../shared/protocol';
import { IProtocolHandler } from '../core/types';

/** Tags travel behind a 16-bit length in the handshake. */
export const MAX_TAG_LENGTH = 0xffff;

export interface ProtocolRegistration {
  readonly tag: Uint8Array;
  readonly name: string;
  readonly handler: IProtocolHandler;
}

/**
 * Immutable tag -> handler table. Built once when the node is assembled and
 * handed to the router; there is no way to add or remove a tag afterwards.
 */
export class ProtocolRegistry {
  private constructor(private readonly byTag: ReadonlyMap<string, ProtocolRegistration>) {}

  static build(registrations: Iterable<readonly [Uint8Array, IProtocolHandler]>): ProtocolRegistry {
    const byTag = new Map<string, ProtocolRegistration>();
    for (const [tag, handler] of registrations) {
      if (tag.length === 0) {
        throw new ValidationError('protocol tag must not be empty', 'INVALID_PROTOCOL');
      }
      if (tag.length > MAX_TAG_LENGTH) {
        throw new ValidationError(
          `protocol tag is ${tag.length} bytes, longer than ${MAX_TAG_LENGTH}`,
          'INVALID_PROTOCOL'
        );
      }
      const key = toHex(tag);
      if (byTag.has(key)) {
        throw new ValidationError(`protocol ${alpnToString(tag)} registered twice`, 'DUPLICATE_PROTOCOL');
      }
      byTag.set(key, Object.freeze({ tag: tag.slice(), name: alpnToString(tag), handler }));
    }
    return new ProtocolRegistry(byTag);
  }

  get size(): number {
    return this.byTag.size;
  }

  get(tag: Uint8Array): ProtocolRegistration | undefined {
    return this.byTag.get(toHex(tag));
  }

  has(tag: Uint8Array): boolean {
    return this.byTag.has(toHex(tag));
  }

  tags(): Uint8Array[] {
    return [...this.byTag.values()].map(r => r.tag.slice());
  }

  registrations(): ProtocolRegistration[] {
    return [...this.byTag.values()];
  }
}
