// Unique among live connections only; derived from the remote port.
export type ConnectionId = number;

/** Outbound byte sink for one remote peer. Owned by the registry once registered. */
export interface WriteChannel {
  write(data: Buffer): Promise<void>;
}

export type CloseReason = 'READ_ERROR' | 'END_OF_STREAM';

export interface MessageEnvelope {
  senderId: ConnectionId;
  line: string;
}

// ── Registry results ─────────────────────────────────────────────────────────

export type SendResult =
  | { ok: true }
  | { ok: false; reason: 'NOT_CONNECTED' }
  | { ok: false; reason: 'WRITE_FAILED'; error: Error };

export interface BroadcastReport {
  delivered: ConnectionId[];
  acknowledged: boolean;
  failed: ConnectionId[];
}

// ── Relay events ─────────────────────────────────────────────────────────────

export type RelayEvent =
  | { type: 'LISTENING'; host: string; port: number }
  | { type: 'ACCEPTED'; remoteAddress: string; connectionId: ConnectionId }
  | { type: 'CONNECTED'; connectionId: ConnectionId }
  | { type: 'CONNECTION_REPLACED'; connectionId: ConnectionId }
  | { type: 'MESSAGE'; connectionId: ConnectionId; line: string }
  | { type: 'WRITE_FAILED'; connectionId: ConnectionId; error: Error }
  | { type: 'READ_FAILED'; connectionId: ConnectionId; error: Error }
  | { type: 'DISCONNECTED'; connectionId: ConnectionId; reason: CloseReason }
  | { type: 'CONNECTION_ERROR'; connectionId: ConnectionId; error: Error };

export type RelayEventListener = (event: RelayEvent) => void;
