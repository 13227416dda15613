import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from '@day-profile/shared/Utils/logger';
import type { SupervisedTask } from '../lifecycle.js';

/**
 * Liveness probe: every method and path answers 200 `OK`. Requests are
 * not logged.
 */
export function createHealthApp(): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((_req: Request, res: Response) => {
    res.status(200).type('text/plain').send('OK');
  });

  return app;
}

export class HealthServer implements SupervisedTask {
  readonly name = 'health';
  private server: Server | null = null;

  constructor(
    private readonly port: number,
    private readonly logger: Logger
  ) {}

  start(): Promise<void> {
    const app = createHealthApp();
    return new Promise((resolve, reject) => {
      const server = app.listen(this.port, () => {
        server.off('error', reject);
        this.server = server;
        this.logger.info(`Health server listening on port ${this.listeningPort()}`);
        resolve();
      });
      server.once('error', reject);
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /** The bound port, useful when started on port 0. */
  listeningPort(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    const info: AddressInfo = address;
    return info.port;
  }
}
