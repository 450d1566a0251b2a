import path from 'path';
import { z } from 'zod';
import { BLOBS_ALPN, DOCS_ALPN, GOSSIP_ALPN } from '../shared/protocol';
import { DocsDisabledError, ValidationError, errorMessage } from '../shared/errors';
import { startBridge } from './bridge/EventBridge';
import { CancellationToken } from './core/CancellationToken';
import { EventChannel } from './core/EventChannel';
import { EventCallback, ILogger, IProtocolCreator, IProtocolHandler, ITransport } from './core/types';
import { logger as rootLogger, scoped } from './logger';
import { ProtocolRegistry } from './router/ProtocolRegistry';
import { ProtocolRouter } from './router/ProtocolRouter';
import { Endpoint } from './transport/Endpoint';
import { MemoryTransport } from './transport/MemoryTransport';
import { WebSocketTransport } from './transport/WebSocketTransport';
import { FsBlobRepository } from './repositories/FsBlobRepository';
import { FsDocRepository } from './repositories/FsDocRepository';
import { InMemoryBlobRepository } from './repositories/InMemoryBlobRepository';
import { InMemoryDocRepository } from './repositories/InMemoryDocRepository';
import { GossipHandler } from './handlers/GossipHandler';
import { BlobsHandler } from './handlers/BlobsHandler';
import { DocsHandler } from './handlers/DocsHandler';
import { GossipService } from './services/GossipService';
import { BlobService } from './services/BlobService';
import { DocService } from './services/DocService';
import { generateSecretKey, loadOrCreateSecretKey } from './services/KeyStore';
import { ProvideEvent } from './services/events';
import { Gossip } from './api/Gossip';
import { Blobs } from './api/Blobs';
import { Tags } from './api/Tags';
import { Docs } from './api/Docs';
import { Authors } from './api/Authors';
import { Net } from './api/Net';
import { NodeControl } from './api/NodeControl';

function isEventCallback(value: unknown): value is EventCallback<ProvideEvent> {
  if (typeof value === 'function') return true;
  return typeof value === 'object' && value !== null && 'onEvent' in value && typeof value.onEvent === 'function';
}

const nodeOptionsSchema = z
  .object({
    /** Accepted for compatibility; blobs are never garbage collected. */
    gcIntervalMillis: z.number().int().positive().optional(),
    blobEvents: z.custom<EventCallback<ProvideEvent>>(isEventCallback, 'blobEvents must be a callback').optional(),
    enableDocs: z.boolean().default(false),
    bindAddr: z
      .string()
      .regex(/^\[?[^\s\]]+\]?:\d{1,5}$/, 'bindAddr must be host:port')
      .refine(a => Number(a.slice(a.lastIndexOf(':') + 1)) <= 65535, 'port out of range')
      .default('127.0.0.1:0'),
    transport: z.enum(['websocket', 'memory']).default('websocket'),
    secretKey: z
      .instanceof(Uint8Array)
      .refine(k => k.length === 32, 'secretKey must be 32 bytes')
      .optional(),
    protocols: z
      .custom<Map<Uint8Array, IProtocolCreator>>(v => v instanceof Map, 'protocols must be a Map')
      .optional(),
    shutdownTimeoutMs: z.number().int().positive().default(5000),
  })
  .strict();

export type NodeOptions = z.input<typeof nodeOptionsSchema>;
type ParsedOptions = z.output<typeof nodeOptionsSchema>;

export function parseNodeOptions(options: NodeOptions): ParsedOptions {
  const parsed = nodeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'options'}: ${i.message}`);
    throw new ValidationError(`invalid node options: ${issues.join('; ')}`, 'INVALID_OPTIONS');
  }
  return parsed.data;
}

function splitBindAddr(bindAddr: string): { host: string; port: number } {
  const at = bindAddr.lastIndexOf(':');
  return { host: bindAddr.slice(0, at).replace(/^\[|\]$/g, ''), port: Number(bindAddr.slice(at + 1)) };
}

interface NodeParts {
  endpoint: Endpoint;
  router: ProtocolRouter;
  token: CancellationToken;
  gossip: GossipService;
  blobs: BlobService;
  docs: DocService | null;
  logger: ILogger;
}

/**
 * A running peer: one endpoint, one router and the gossip, blob and
 * (optionally) document services behind it.
 */
export class Node {
  private stopping: Promise<void> | null = null;

  private constructor(private readonly parts: NodeParts) {}

  /** A node whose blobs, documents and identity live under `root`. */
  static persistent(root: string): Promise<Node> {
    return Node.create(root, {});
  }

  static persistentWithOptions(root: string, options: NodeOptions): Promise<Node> {
    return Node.create(root, options);
  }

  static memory(): Promise<Node> {
    return Node.create(null, {});
  }

  static memoryWithOptions(options: NodeOptions): Promise<Node> {
    return Node.create(null, options);
  }

  private static async create(root: string | null, input: NodeOptions): Promise<Node> {
    const options = parseNodeOptions(input);
    const log = rootLogger;
    const token = new CancellationToken();
    let endpoint: Endpoint | null = null;
    let provideEvents: EventChannel<ProvideEvent> | null = null;

    try {
      const secretKey =
        options.secretKey ?? (root ? await loadOrCreateSecretKey(path.join(root, 'secret.key')) : generateSecretKey());
      const blobRepo = root ? await new FsBlobRepository(root).open() : new InMemoryBlobRepository();

      let transport: ITransport;
      if (options.transport === 'memory') {
        transport = new MemoryTransport();
      } else {
        const { host, port } = splitBindAddr(options.bindAddr);
        transport = new WebSocketTransport(host, port, scoped(log, 'transport'));
      }
      endpoint = await Endpoint.bind({ secretKey, transport, logger: scoped(log, 'endpoint') });

      const registrations: Array<[Uint8Array, IProtocolHandler]> = [];

      const gossip = new GossipService(endpoint, scoped(log, 'gossip'));
      registrations.push([GOSSIP_ALPN, new GossipHandler(gossip, scoped(log, 'gossip'))]);

      const blobs = new BlobService(blobRepo, endpoint, scoped(log, 'blobs'));
      if (options.blobEvents) {
        provideEvents = new EventChannel<ProvideEvent>();
        startBridge(provideEvents, options.blobEvents, token, { name: 'blob events', logger: log });
      }
      registrations.push([BLOBS_ALPN, new BlobsHandler(blobs, provideEvents, scoped(log, 'blobs'))]);

      let docs: DocService | null = null;
      if (options.enableDocs) {
        const docRepo = root ? await new FsDocRepository(root).open() : new InMemoryDocRepository();
        docs = new DocService(docRepo, blobRepo, endpoint, scoped(log, 'docs'));
        registrations.push([DOCS_ALPN, new DocsHandler(docs, scoped(log, 'docs'))]);
      }

      for (const [tag, creator] of options.protocols ?? new Map<Uint8Array, IProtocolCreator>()) {
        registrations.push([tag, creator.create(endpoint)]);
      }

      const registry = ProtocolRegistry.build(registrations);
      const router = new ProtocolRouter(endpoint, registry, scoped(log, 'router'), {
        shutdownTimeoutMs: options.shutdownTimeoutMs,
      });
      router.start();

      log.info(`Node ${endpoint.peerId.short()} started${root ? ` at ${root}` : ' in memory'}`);
      return new Node({ endpoint, router, token, gossip, blobs, docs, logger: log });
    } catch (err) {
      log.error('Node failed to start:', errorMessage(err));
      token.cancel();
      provideEvents?.close();
      if (endpoint) await endpoint.close();
      throw err;
    }
  }

  gossip(): Gossip {
    return new Gossip(this.parts.gossip, this.parts.token, this.parts.logger);
  }

  blobs(): Blobs {
    return new Blobs(this.parts.blobs, this.parts.endpoint, this.parts.token, this.parts.logger);
  }

  tags(): Tags {
    return new Tags(this.parts.blobs);
  }

  docs(): Docs {
    return new Docs(this.requireDocs(), this.parts.endpoint, this.parts.token, this.parts.logger);
  }

  authors(): Authors {
    return new Authors(this.requireDocs());
  }

  net(): Net {
    return new Net(this.parts.endpoint);
  }

  node(): NodeControl {
    return new NodeControl(this.parts.endpoint, () => this.shutdown());
  }

  get isShutdown(): boolean {
    return this.stopping !== null;
  }

  /** Cancels every subscription and shuts the router down. Idempotent. */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      const { token, router, endpoint, logger } = this.parts;
      token.cancel();
      this.stopping = router.shutdown().then(() => logger.info(`Node ${endpoint.peerId.short()} shut down`));
    }
    return this.stopping;
  }

  private requireDocs(): DocService {
    if (!this.parts.docs) throw new DocsDisabledError();
    return this.parts.docs;
  }
}
