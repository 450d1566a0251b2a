export { Gossip } from './Gossip';
export { Blobs, toHash } from './Blobs';
export { Tags } from './Tags';
export { Docs } from './Docs';
export { Doc } from './Doc';
export { Authors } from './Authors';
export { Net } from './Net';
export type { RemoteInfo } from './Net';
export { NodeControl } from './NodeControl';
export { Subscription } from './Subscription';
