import { NodeAddr, PeerId } from '../../shared/ids';
import { IEndpoint } from '../core/types';

export interface RemoteInfo {
  peerId: PeerId;
  addresses: string[];
}

export class Net {
  constructor(private endpoint: IEndpoint) {}

  nodeId(): PeerId {
    return this.endpoint.peerId;
  }

  nodeAddr(): NodeAddr {
    return this.endpoint.nodeAddr();
  }

  waitOnline(): Promise<void> {
    return this.endpoint.online();
  }

  addNodeAddr(addr: NodeAddr): void {
    this.endpoint.addNodeAddr(addr);
  }

  /** Addresses we know for `peer`, or `undefined` if it was never added. */
  remoteInfo(peer: PeerId | string): RemoteInfo | undefined {
    const peerId = typeof peer === 'string' ? PeerId.parse(peer) : peer;
    const addresses = this.endpoint.knownAddresses(peerId);
    return addresses.length > 0 ? { peerId, addresses } : undefined;
  }
}
