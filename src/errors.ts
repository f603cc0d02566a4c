export type ErrorKind = 'transport' | 'protocol' | 'lookup' | 'validation';

export class ReconcileError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Any failure of a JSON-RPC round trip.
 */
export class RpcError extends ReconcileError {}

/**
 * The server could not be reached or answered with a non-success HTTP status.
 */
export class TransportError extends RpcError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super('transport', message);
  }
}

/**
 * The server answered, but the body was empty, not JSON, malformed, or an RPC `error` object.
 */
export class ProtocolError extends RpcError {
  constructor(
    message: string,
    public readonly code?: number,
    public readonly data?: string
  ) {
    super('protocol', message);
  }
}

export type LookupEntity = 'host' | 'hostgroup' | 'template' | 'hostinterface';

export class LookupError extends ReconcileError {
  constructor(
    public readonly entity: LookupEntity,
    public readonly entityName: string
  ) {
    super('lookup', `${entity} '${entityName}' not found`);
  }
}

export class ValidationError extends ReconcileError {
  constructor(message: string) {
    super('validation', message);
  }
}
