/**
 * REST routes — read-only health check. All relay traffic goes over TCP.
 */

import http from 'http';
import express, { Router, Request, Response } from 'express';
import { ListenerBindError } from '../errors';
import { ConnectionRegistry } from '../relay/registry';

export function createHealthRouter(registry: ConnectionRegistry): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      connections: registry.size,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}

/** Serve the health route; rejects with ListenerBindError if the port cannot be bound */
export function startHealthServer(
  registry: ConnectionRegistry,
  host: string,
  port: number
): Promise<http.Server> {
  const app = express();
  app.use('/', createHealthRouter(registry));
  const server = http.createServer(app);

  return new Promise<http.Server>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new ListenerBindError(host, port, err));
    };
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      server.on('error', (err) => {
        console.error('[server] Health server error:', err);
      });
      resolve(server);
    });
  });
}
