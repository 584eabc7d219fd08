import type { Server } from 'node:http';
import type { Express } from 'express';

export interface RunningApp {
  /** Origin without trailing slash, e.g. http://127.0.0.1:51234 */
  origin: string;
  close(): Promise<void>;
}

/** Start an express app on an ephemeral loopback port. */
export async function listen(app: Express): Promise<RunningApp> {
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind a TCP port');
  }

  return {
    origin: `http://127.0.0.1:${address.port}`,
    close() {
      return new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(err => (err ? reject(err) : resolve()));
      });
    },
  };
}
