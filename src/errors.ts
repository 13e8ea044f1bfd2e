import { ConnectionId } from './types';

/** Normalise anything thrown into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class ReadFailure extends Error {
  readonly connectionId: ConnectionId;

  constructor(connectionId: ConnectionId, cause: unknown) {
    super(`Read failed for client_id ${connectionId}: ${toError(cause).message}`, { cause });
    this.name = 'ReadFailure';
    this.connectionId = connectionId;
  }
}

export class WriteFailure extends Error {
  readonly connectionId: ConnectionId;

  constructor(connectionId: ConnectionId, cause: unknown) {
    super(`Failed to send data to client_id ${connectionId}: ${toError(cause).message}`, { cause });
    this.name = 'WriteFailure';
    this.connectionId = connectionId;
  }
}

export class ListenerBindError extends Error {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, cause: unknown) {
    super(`Could not bind ${host}:${port}: ${toError(cause).message}`, { cause });
    this.name = 'ListenerBindError';
    this.host = host;
    this.port = port;
  }
}

/** A code path assumed an id was registered and it was not */
export class RegistryInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryInvariantError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
