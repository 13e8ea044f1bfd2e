/**
 * Wire protocol — newline-delimited UTF-8 frames.
 *
 *   server → joining client:  LOGIN:<id>
 *   server → other clients:   MESSAGE:<id> <text>
 *   server → sender:          ACK:MESSAGE
 */

import { Readable } from 'stream';
import { TextDecoder } from 'util';
import { ConnectionId } from '../types';

export const LINE_DELIMITER = '\n';

export const ACK_TOKEN = `ACK:MESSAGE${LINE_DELIMITER}`;

export function loginFrame(id: ConnectionId): string {
  return `LOGIN:${id}${LINE_DELIMITER}`;
}

export function messageFrame(senderId: ConnectionId, line: string): string {
  return `MESSAGE:${senderId} ${line}${LINE_DELIMITER}`;
}

/**
 * Read lines from a byte stream. Only `\n` ends a line; one `\r` directly
 * before it is dropped, any other `\r` is payload. A trailing fragment at end
 * of stream is yielded as-is. Invalid UTF-8 or a stream error throws.
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  let pending = '';

  for await (const chunk of input) {
    const bytes: Uint8Array = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    pending += decoder.decode(bytes, { stream: true });

    let end = pending.indexOf(LINE_DELIMITER);
    while (end !== -1) {
      const line = pending.slice(0, end);
      pending = pending.slice(end + 1);
      yield line.endsWith('\r') ? line.slice(0, -1) : line;
      end = pending.indexOf(LINE_DELIMITER);
    }
  }

  pending += decoder.decode();
  if (pending.length > 0) yield pending;
}
