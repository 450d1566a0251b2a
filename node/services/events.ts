import { VariantMismatchError } from '../../shared/errors';
import { PeerId } from '../../shared/ids';

export type GossipEvent =
  | { type: 'peerConnected'; peer: PeerId }
  | { type: 'peerDisconnected'; peer: PeerId }
  | { type: 'delivered'; payload: Uint8Array; origin: PeerId }
  | { type: 'lagged' }
  | { type: 'error'; message: string };

export type DownloadProgress =
  | { type: 'found'; hash: string; size: number }
  | { type: 'progress'; offset: number }
  | { type: 'done'; hash: string }
  | { type: 'allDone'; bytesRead: number; elapsedMs: number }
  | { type: 'abort'; error: string };

export type AddProgress =
  | { type: 'found'; name: string; size: number }
  | { type: 'progress'; offset: number }
  | { type: 'done'; hash: string }
  | { type: 'allDone'; hash: string; size: number; tag: Uint8Array }
  | { type: 'abort'; error: string };

export type ProvideEvent =
  | { type: 'clientConnected'; connectionId: string; peer: PeerId }
  | { type: 'transferStarted'; connectionId: string; hash: string; size: number }
  | { type: 'transferCompleted'; connectionId: string; hash: string; bytesSent: number }
  | { type: 'transferAborted'; connectionId: string; hash: string; error: string };

/** A signed document record as handed to callers. */
export interface DocEntry {
  namespace: string;
  author: string;
  key: Uint8Array;
  hash: string;
  size: number;
  timestamp: number;
}

export type DocEvent =
  | { type: 'insertLocal'; entry: DocEntry }
  | { type: 'insertRemote'; from: PeerId; entry: DocEntry }
  | { type: 'contentReady'; hash: string }
  | { type: 'neighborUp'; peer: PeerId }
  | { type: 'neighborDown'; peer: PeerId }
  | { type: 'syncFinished'; peer: PeerId; error?: string };

type Variant = { type: string };

function isVariant<E extends Variant, K extends E['type']>(event: E, type: K): event is Extract<E, { type: K }> {
  return event.type === type;
}

/**
 * Narrows `event` to the `type` variant for callers that cannot `switch` on
 * the union. Throws {@link VariantMismatchError} on any other variant.
 */
export function expectVariant<E extends Variant, K extends E['type']>(event: E, type: K): Extract<E, { type: K }> {
  if (isVariant(event, type)) return event;
  throw new VariantMismatchError(type, event.type);
}
