/**
 * Broadcast Coordinator — runs the per-connection protocol:
 *   CONNECTING → LOGGED_IN (registered + LOGIN sent) → CLOSED (deregistered).
 *
 * Each inbound line is relayed to every other connection and acknowledged to
 * the sender. Lines from one connection are broadcast strictly in order.
 */

import { ReadFailure } from '../errors';
import {
  CloseReason,
  ConnectionId,
  MessageEnvelope,
  RelayEventListener,
  WriteChannel,
} from '../types';
import { messageFrame } from './protocol';
import { ConnectionRegistry } from './registry';

const noop: RelayEventListener = () => undefined;

export class BroadcastCoordinator {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly emit: RelayEventListener = noop
  ) {}

  /**
   * Drive one connection for its full lifetime. Resolves once the connection
   * is closed and its id has left the registry.
   */
  async handleConnection(
    id: ConnectionId,
    channel: WriteChannel,
    lines: AsyncIterable<string>
  ): Promise<CloseReason> {
    await this.registry.register(id, channel);
    this.emit({ type: 'CONNECTED', connectionId: id });
    await this.registry.sendLogin(id);

    try {
      for await (const line of lines) {
        await this.relay({ senderId: id, line });
      }
    } catch (err) {
      this.emit({ type: 'READ_FAILED', connectionId: id, error: new ReadFailure(id, err) });
      return this.close(id, 'READ_ERROR');
    }
    return this.close(id, 'END_OF_STREAM');
  }

  private async relay(envelope: MessageEnvelope): Promise<void> {
    this.emit({ type: 'MESSAGE', connectionId: envelope.senderId, line: envelope.line });
    await this.registry.broadcast(envelope.senderId, messageFrame(envelope.senderId, envelope.line));
  }

  private async close(id: ConnectionId, reason: CloseReason): Promise<CloseReason> {
    await this.registry.deregister(id);
    this.emit({ type: 'DISCONNECTED', connectionId: id, reason });
    return reason;
  }
}
