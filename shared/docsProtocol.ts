import { z } from 'zod';
import { DecodeError, errorMessage } from './errors';

const hex32 = z.string().regex(/^[0-9a-f]{64}$/);
const hex64 = z.string().regex(/^[0-9a-f]{128}$/);

export const wireEntrySchema = z.object({
  namespace: hex32,
  author: hex32,
  key: z.string().regex(/^(?:[0-9a-f]{2})+$/),
  hash: hex32,
  size: z.number().int().nonnegative(),
  timestamp: z.number().int().nonnegative(),
  signature: hex64,
  /** base64 content, sent inline with the entry */
  content: z.string(),
});

export type WireEntry = z.infer<typeof wireEntrySchema>;

export const syncMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('open'), namespace: hex32 }),
  z.object({ type: z.literal('refused'), reason: z.string() }),
  z.object({ type: z.literal('entries'), entries: z.array(wireEntrySchema) }),
  z.object({ type: z.literal('insert'), entry: wireEntrySchema }),
]);

export type SyncMessage = z.infer<typeof syncMessageSchema>;

const utf8 = new TextEncoder();
const utf8Decoder = new TextDecoder();

export function encodeSync(msg: SyncMessage): Uint8Array {
  return utf8.encode(JSON.stringify(msg));
}

export function decodeSync(bytes: Uint8Array): SyncMessage {
  try {
    return syncMessageSchema.parse(JSON.parse(utf8Decoder.decode(bytes)));
  } catch (err) {
    throw new DecodeError(`bad sync message: ${errorMessage(err)}`);
  }
}
