/**
 * Errors raised by the node. Each carries a machine-readable `code` so callers
 * on the far side of a callback boundary can branch without `instanceof`.
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly code:
      | 'INVALID_TOPIC'
      | 'INVALID_PEER_ID'
      | 'INVALID_HASH'
      | 'INVALID_TICKET'
      | 'INVALID_OPTIONS'
      | 'INVALID_KEY'
      | 'DUPLICATE_PROTOCOL'
      | 'INVALID_PROTOCOL'
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code:
      | 'UNKNOWN_PEER'
      | 'DIAL_FAILED'
      | 'HANDSHAKE_FAILED'
      | 'PROTOCOL_REJECTED'
      | 'CONNECTION_CLOSED'
      | 'ENDPOINT_CLOSED'
      | 'BIND_FAILED',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** A second `cancel()` on a token or subscription that is already cancelled. */
export class AlreadyCancelledError extends Error {
  readonly code = 'ALREADY_CANCELLED';

  constructor(message = 'already closed') {
    super(message);
    this.name = 'AlreadyCancelledError';
  }
}

/** Any send on a subscription after it was cancelled. */
export class SubscriptionClosedError extends Error {
  readonly code = 'SUBSCRIPTION_CLOSED';

  constructor(message = 'subscription is closed') {
    super(message);
    this.name = 'SubscriptionClosedError';
  }
}

export class NodeShutdownError extends Error {
  readonly code = 'NODE_SHUTDOWN';

  constructor(message = 'node is shut down') {
    super(message);
    this.name = 'NodeShutdownError';
  }
}

export class DocsDisabledError extends Error {
  readonly code = 'DOCS_DISABLED';

  constructor() {
    super('docs are not enabled on this node');
    this.name = 'DocsDisabledError';
  }
}

export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND';

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Reading the payload of an event variant that is not the active one. */
export class VariantMismatchError extends Error {
  readonly code = 'VARIANT_MISMATCH';

  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`not a ${expected} event (got ${actual})`);
    this.name = 'VariantMismatchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
