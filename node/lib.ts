export { Node, parseNodeOptions } from './Node';
export type { NodeOptions } from './Node';
export * from './api';
export { Sender } from './services/Sender';
export { expectVariant } from './services/events';
export type { AddProgress, DocEntry, DocEvent, DownloadProgress, GossipEvent, ProvideEvent } from './services/events';
export type { EntryQuery } from './services/DocService';
export type { AddOutcome } from './services/BlobService';
export { CancellationToken } from './core/CancellationToken';
export type {
  EventCallback,
  IConnection,
  IEndpoint,
  IEventCallback,
  ILogger,
  IProtocolCreator,
  IProtocolHandler,
  TagInfo,
} from './core/types';
export type { BridgeExit, BridgeStats, BridgeTask } from './bridge/EventBridge';
export { createLogger, setLogLevel } from './logger';
export type { LogLevel } from './logger';
export { Hash, PeerId, Topic } from '../shared/ids';
export type { NodeAddr } from '../shared/ids';
export { BlobTicket, DocTicket } from '../shared/tickets';
export { alpn } from '../shared/protocol';
export { keyToPath, pathToKey } from '../shared/keyPath';
export * from '../shared/errors';
