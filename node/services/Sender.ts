import { AlreadyCancelledError, SubscriptionClosedError } from '../../shared/errors';
import { BroadcastScope } from '../../shared/protocol';
import { Topic } from '../../shared/ids';
import { BridgeTask } from '../bridge/EventBridge';
import { CancellationToken } from '../core/CancellationToken';
import { GossipSubscription } from './GossipService';

/**
 * Outward half of a gossip subscription. Dropping a Sender does not stop
 * event delivery; only `cancel()` or the end of the stream does.
 */
export class Sender {
  constructor(
    private readonly subscription: GossipSubscription,
    private readonly token: CancellationToken,
    readonly task: BridgeTask
  ) {}

  get topic(): Topic {
    return this.subscription.topic;
  }

  get isCancelled(): boolean {
    return this.token.isCancelled;
  }

  /** Sends to every peer on the topic; neighbours forward it on. */
  async broadcast(payload: Uint8Array): Promise<void> {
    this.send(payload, BroadcastScope.SWARM);
  }

  /** Sends to direct neighbours only. */
  async broadcastNeighbors(payload: Uint8Array): Promise<void> {
    this.send(payload, BroadcastScope.NEIGHBORS);
  }

  cancel(): void {
    if (!this.token.cancel()) {
      throw new AlreadyCancelledError('subscription already cancelled');
    }
  }

  private send(payload: Uint8Array, scope: BroadcastScope): void {
    if (this.token.isCancelled || this.subscription.isClosed) {
      throw new SubscriptionClosedError();
    }
    this.subscription.broadcast(payload, scope);
  }
}
