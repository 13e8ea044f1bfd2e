/**
 * Connection Registry — the relay's only shared mutable state.
 * Maps a live connection id to the write channel for that peer.
 *
 * Every operation runs inside one exclusive section; a broadcast holds it for
 * the whole sweep, writes included.
 */

import { WriteFailure, RegistryInvariantError } from '../errors';
import {
  BroadcastReport,
  ConnectionId,
  RelayEventListener,
  SendResult,
  WriteChannel,
} from '../types';
import { ACK_TOKEN, loginFrame } from './protocol';

const noop: RelayEventListener = () => undefined;

export class ConnectionRegistry {
  private readonly channels = new Map<ConnectionId, WriteChannel>();
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly emit: RelayEventListener = noop) {}

  get size(): number {
    return this.channels.size;
  }

  ids(): ConnectionId[] {
    return Array.from(this.channels.keys());
  }

  has(id: ConnectionId): boolean {
    return this.channels.has(id);
  }

  /** Overwrites any channel already held under `id` */
  register(id: ConnectionId, channel: WriteChannel): Promise<void> {
    return this.exclusive(() => {
      if (this.channels.has(id)) {
        this.emit({ type: 'CONNECTION_REPLACED', connectionId: id });
      }
      this.channels.set(id, channel);
    });
  }

  /** Resolves true if an entry was removed */
  deregister(id: ConnectionId): Promise<boolean> {
    return this.exclusive(() => this.channels.delete(id));
  }

  sendTo(id: ConnectionId, data: Buffer | string): Promise<SendResult> {
    return this.exclusive(async (): Promise<SendResult> => {
      const channel = this.channels.get(id);
      if (!channel) return { ok: false, reason: 'NOT_CONNECTED' };
      const error = await this.write(id, channel, toBuffer(data));
      return error ? { ok: false, reason: 'WRITE_FAILED', error } : { ok: true };
    });
  }

  /** Greets a connection that must already be registered */
  sendLogin(id: ConnectionId): Promise<void> {
    return this.exclusive(async () => {
      const channel = this.channels.get(id);
      if (!channel) {
        throw new RegistryInvariantError(`Login for client_id ${id} which is not registered`);
      }
      await this.write(id, channel, Buffer.from(loginFrame(id), 'utf8'));
    });
  }

  /**
   * Sends `payload` to every registered connection except `senderId`, which
   * gets the acknowledgement token instead. A failed write is reported and
   * the sweep carries on.
   */
  broadcast(senderId: ConnectionId, payload: Buffer | string): Promise<BroadcastReport> {
    return this.exclusive(async () => {
      const message = toBuffer(payload);
      const ack = Buffer.from(ACK_TOKEN, 'utf8');
      const report: BroadcastReport = { delivered: [], acknowledged: false, failed: [] };

      for (const [id, channel] of Array.from(this.channels)) {
        const isSender = id === senderId;
        const error = await this.write(id, channel, isSender ? ack : message);
        if (error) {
          report.failed.push(id);
        } else if (isSender) {
          report.acknowledged = true;
        } else {
          report.delivered.push(id);
        }
      }
      return report;
    });
  }

  private async write(
    id: ConnectionId,
    channel: WriteChannel,
    data: Buffer
  ): Promise<WriteFailure | null> {
    try {
      await channel.write(data);
      return null;
    } catch (err) {
      const failure = new WriteFailure(id, err);
      this.emit({ type: 'WRITE_FAILED', connectionId: id, error: failure });
      return failure;
    }
  }

  private exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // Rejections reach the caller through `run`; the chain itself keeps going.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function toBuffer(data: Buffer | string): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}
