/**
 * Relay Server — the TCP accept loop.
 * Responsibilities:
 *   - Derive each connection's id from its remote port.
 *   - Adapt the socket into a write channel + line source.
 *   - Hand both to the coordinator, which owns the connection from then on.
 */

import net, { AddressInfo, Socket } from 'net';
import { ListenerBindError, toError } from '../errors';
import { RelayEventListener, WriteChannel } from '../types';
import { BroadcastCoordinator } from './coordinator';
import { readLines } from './protocol';
import { ConnectionRegistry } from './registry';

export interface RelayServerOptions {
  host: string;
  port: number;
  onEvent?: RelayEventListener;
}

export interface RelayServer {
  readonly registry: ConnectionRegistry;
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
}

/** Write half of a socket; resolves once the bytes are handed to the OS */
export function socketChannel(socket: Socket): WriteChannel {
  return {
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        socket.write(data, (err) => (err ? reject(err) : resolve()));
      }),
  };
}

export function createRelayServer(options: RelayServerOptions): RelayServer {
  const emit: RelayEventListener = options.onEvent ?? (() => undefined);
  const registry = new ConnectionRegistry(emit);
  const coordinator = new BroadcastCoordinator(registry, emit);
  const sockets = new Set<Socket>();

  const server = net.createServer((socket) => {
    const id = socket.remotePort;
    if (id === undefined) {
      // Peer went away before we could read its address
      socket.destroy();
      return;
    }

    sockets.add(socket);
    emit({ type: 'ACCEPTED', remoteAddress: socket.remoteAddress ?? 'unknown', connectionId: id });

    socket.on('error', (err) => {
      emit({ type: 'CONNECTION_ERROR', connectionId: id, error: err });
    });
    socket.on('close', () => {
      sockets.delete(socket);
    });

    coordinator
      .handleConnection(id, socketChannel(socket), readLines(socket))
      .then((reason) => {
        if (reason === 'END_OF_STREAM') socket.end();
        else socket.destroy();
      })
      .catch((err: unknown) => {
        emit({ type: 'CONNECTION_ERROR', connectionId: id, error: toError(err) });
        socket.destroy();
      });
  });

  return {
    registry,

    start() {
      return new Promise<AddressInfo>((resolve, reject) => {
        const onError = (err: Error) => {
          reject(new ListenerBindError(options.host, options.port, err));
        };
        server.once('error', onError);
        server.listen(options.port, options.host, () => {
          server.off('error', onError);
          const address = server.address();
          if (address === null || typeof address === 'string') {
            reject(new ListenerBindError(options.host, options.port, 'listener has no TCP address'));
            return;
          }
          emit({ type: 'LISTENING', host: address.address, port: address.port });
          resolve(address);
        });
      });
    },

    stop() {
      return new Promise<void>((resolve, reject) => {
        for (const socket of sockets) socket.destroy();
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
