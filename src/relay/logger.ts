/**
 * Console sink for relay events. The relay core only emits events; this is
 * where they become log lines.
 */

import { RelayEvent, RelayEventListener } from '../types';

export interface LogTarget {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createConsoleLogger(target: LogTarget = console): RelayEventListener {
  return (event: RelayEvent) => {
    switch (event.type) {
      case 'LISTENING':
        target.log(`[server] listening on port ${event.port} (${event.host})`);
        break;

      case 'ACCEPTED':
        target.log(`[server] connected ${event.remoteAddress} ${event.connectionId}`);
        break;

      case 'CONNECTED':
        target.log(`[relay] Logged in: ${event.connectionId}`);
        break;

      case 'CONNECTION_REPLACED':
        target.warn(`[relay] client_id ${event.connectionId} re-registered; previous channel dropped`);
        break;

      case 'MESSAGE':
        target.log(`[relay] message ${event.connectionId} ${event.line}`);
        break;

      case 'WRITE_FAILED':
        target.error(`[relay] ${event.error.message}`);
        break;

      case 'READ_FAILED':
        target.error(`[relay] ${event.error.message}`);
        break;

      case 'DISCONNECTED':
        target.log(`[relay] Disconnected: ${event.connectionId} (${event.reason})`);
        break;

      case 'CONNECTION_ERROR':
        target.error(`[relay] Error for ${event.connectionId}:`, event.error);
        break;
    }
  };
}
