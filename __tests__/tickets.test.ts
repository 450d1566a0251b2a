import { describe, it, expect } from 'vitest';
import { BlobTicket, DocTicket } from '../shared/tickets';
import { Hash, PeerId } from '../shared/ids';
import { ValidationError } from '../shared/errors';
import { filled } from './helpers';

const node = { peerId: PeerId.fromBytes(filled(32, 1)), addresses: ['memory://a'] };

describe('BlobTicket', () => {
  it('parses what it prints', () => {
    const ticket = new BlobTicket(Hash.fromBytes(filled(32, 2)), node);
    const text = ticket.toString();
    expect(text.startsWith('blob')).toBe(true);

    const parsed = BlobTicket.parse(text);
    expect(parsed.hash.equals(ticket.hash)).toBe(true);
    expect(parsed.node.peerId.equals(node.peerId)).toBe(true);
    expect(parsed.node.addresses).toEqual(['memory://a']);
  });

  it('rejects a wrong prefix and garbage', () => {
    const doc = new DocTicket(filled(32, 3), [node]).toString();
    expect(() => BlobTicket.parse(doc)).toThrow(ValidationError);
    expect(() => BlobTicket.parse('blob!!!')).toThrow('malformed ticket');
  });
});

describe('DocTicket', () => {
  it('parses what it prints', () => {
    const ticket = new DocTicket(filled(32, 3), [node]);
    const parsed = DocTicket.parse(ticket.toString());
    expect(parsed.namespace).toEqual(filled(32, 3));
    expect(parsed.nodes).toHaveLength(1);
    expect(parsed.nodes[0]?.addresses).toEqual(['memory://a']);
  });

  it('rejects a namespace that is not 32 bytes', () => {
    const bad = 'doc' + Buffer.from(JSON.stringify({ namespace: 'abcd', nodes: [] })).toString('base64url');
    expect(() => DocTicket.parse(bad)).toThrow('bad namespace');
  });
});
