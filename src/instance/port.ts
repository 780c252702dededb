import { createServer } from 'net';

/** Returns a TCP port nothing is listening on. */
export type FreePortProvider = () => Promise<number>;

/**
 * Ask the OS for an ephemeral port by listening on port 0, then release it.
 * The port is free when returned; callers race anyone else who asks.
 */
export const getFreePort: FreePortProvider = () =>
  new Promise((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close(() => reject(new Error('Could not determine the allocated port')));
        return;
      }
      server.close(error => (error ? reject(error) : resolve(address.port)));
    });
  });
