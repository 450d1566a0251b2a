import { describe, it, expect } from 'vitest';
import { decodeSync, encodeSync } from '../shared/docsProtocol';
import { DecodeError } from '../shared/errors';
import { bytes, text } from './helpers';

const NAMESPACE = 'aa'.repeat(32);

describe('sync messages', () => {
  it('are JSON on the wire', () => {
    expect(text(encodeSync({ type: 'open', namespace: NAMESPACE }))).toBe(`{"type":"open","namespace":"${NAMESPACE}"}`);
    expect(decodeSync(bytes('{"type":"refused","reason":"unknown document"}'))).toEqual({
      type: 'refused',
      reason: 'unknown document',
    });
  });

  it('reject unknown types, bad ids and broken JSON', () => {
    expect(() => decodeSync(bytes('{"type":"hello"}'))).toThrow(DecodeError);
    expect(() => decodeSync(bytes('{"type":"open","namespace":"AA"}'))).toThrow(DecodeError);
    expect(() => decodeSync(bytes('{"type":'))).toThrow(/^bad sync message: /);
  });

  it('reject entries with an odd-length key', () => {
    const entry = {
      namespace: NAMESPACE,
      author: 'bb'.repeat(32),
      key: 'abc',
      hash: 'cc'.repeat(32),
      size: 1,
      timestamp: 1,
      signature: 'dd'.repeat(64),
      content: 'AA==',
    };
    expect(() => decodeSync(bytes(JSON.stringify({ type: 'insert', entry })))).toThrow(DecodeError);
    expect(decodeSync(bytes(JSON.stringify({ type: 'insert', entry: { ...entry, key: 'abcd' } })))).toMatchObject({
      type: 'insert',
      entry: { key: 'abcd', size: 1 },
    });
  });
});
