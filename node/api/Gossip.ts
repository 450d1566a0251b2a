import { PeerId, Topic } from '../../shared/ids';
import { NodeShutdownError } from '../../shared/errors';
import { startBridge } from '../bridge/EventBridge';
import { CancellationToken } from '../core/CancellationToken';
import { EventCallback, ILogger } from '../core/types';
import { GossipService } from '../services/GossipService';
import { Sender } from '../services/Sender';
import { GossipEvent } from '../services/events';

export class Gossip {
  constructor(
    private service: GossipService,
    private nodeToken: CancellationToken,
    private logger: ILogger
  ) {}

  /**
   * Joins `topic`, dialling `bootstrap` peers in the background, and delivers
   * its events to `callback` until the returned Sender is cancelled.
   */
  subscribe(
    topic: Uint8Array | Topic,
    bootstrap: readonly (PeerId | string)[],
    callback: EventCallback<GossipEvent>
  ): Sender {
    const topicId = topic instanceof Topic ? topic : Topic.fromBytes(topic);
    const peers = bootstrap.map(p => (typeof p === 'string' ? PeerId.parse(p) : p));
    if (this.nodeToken.isCancelled) throw new NodeShutdownError();

    const subscription = this.service.subscribe(topicId, peers);
    const token = this.nodeToken.child();
    token.onCancel(() => subscription.close());
    const task = startBridge(subscription.events, callback, token, {
      name: `gossip ${topicId.toString().slice(0, 8)}`,
      logger: this.logger,
    });
    return new Sender(subscription, token, task);
  }
}
