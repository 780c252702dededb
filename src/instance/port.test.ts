import { describe, test, expect } from 'vitest';
import { createServer } from 'net';
import { getFreePort } from './port.js';

describe('Free Port', () => {
  test('should return a port that can be bound', async () => {
    const port = await getFreePort();
    expect(port).toBeGreaterThan(0);
    expect(port).toBeLessThanOrEqual(65535);

    const server = createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', () => resolve());
    });
    await new Promise<void>(resolve => server.close(() => resolve()));
  });
});
