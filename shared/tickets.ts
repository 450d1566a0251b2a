import { z } from 'zod';
import { ValidationError, errorMessage } from './errors';
import { Hash, NodeAddr, PeerId, toHex } from './ids';

const nodeAddrSchema = z.object({
  id: z.string(),
  addrs: z.array(z.string()),
});

const blobTicketSchema = z.object({
  hash: z.string(),
  node: nodeAddrSchema,
});

const docTicketSchema = z.object({
  namespace: z.string(),
  nodes: z.array(nodeAddrSchema),
});

type WireNodeAddr = z.infer<typeof nodeAddrSchema>;

function toWire(addr: NodeAddr): WireNodeAddr {
  return { id: addr.peerId.toString(), addrs: [...addr.addresses] };
}

function fromWire(addr: WireNodeAddr): NodeAddr {
  return { peerId: PeerId.parse(addr.id), addresses: [...addr.addrs] };
}

function encode(prefix: string, value: unknown): string {
  return prefix + Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

function decode<T>(prefix: string, text: string, schema: z.ZodType<T>): T {
  if (!text.startsWith(prefix)) {
    throw new ValidationError(`ticket must start with "${prefix}"`, 'INVALID_TICKET');
  }
  try {
    const json: unknown = JSON.parse(Buffer.from(text.slice(prefix.length), 'base64url').toString('utf8'));
    return schema.parse(json);
  } catch (err) {
    throw new ValidationError(`malformed ticket: ${errorMessage(err)}`, 'INVALID_TICKET');
  }
}

/** Everything needed to fetch one blob from its provider. */
export class BlobTicket {
  constructor(
    readonly hash: Hash,
    readonly node: NodeAddr
  ) {}

  static parse(text: string): BlobTicket {
    const wire = decode('blob', text.trim(), blobTicketSchema);
    return new BlobTicket(Hash.parse(wire.hash), fromWire(wire.node));
  }

  toString(): string {
    return encode('blob', { hash: this.hash.toString(), node: toWire(this.node) });
  }
}

/** A document id plus the nodes to sync it from. */
export class DocTicket {
  constructor(
    readonly namespace: Uint8Array,
    readonly nodes: NodeAddr[]
  ) {}

  static parse(text: string): DocTicket {
    const wire = decode('doc', text.trim(), docTicketSchema);
    if (!/^[0-9a-f]{64}$/.test(wire.namespace)) {
      throw new ValidationError('malformed ticket: bad namespace', 'INVALID_TICKET');
    }
    return new DocTicket(new Uint8Array(Buffer.from(wire.namespace, 'hex')), wire.nodes.map(fromWire));
  }

  toString(): string {
    return encode('doc', { namespace: toHex(this.namespace), nodes: this.nodes.map(toWire) });
  }
}
