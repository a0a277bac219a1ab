/**
 * @fileoverview Allocation of a free local TCP port for a debugger.
 *
 * @module build/freePort
 */

import * as net from 'net';

export type PortAllocator = () => Promise<number>;

/**
 * Ask the OS for an unused port on the loopback interface and release it.
 */
export const allocateFreePort: PortAllocator = () => new Promise((resolve, reject) => {
  const server = net.createServer();
  server.unref();
  server.on('error', reject);
  server.listen(0, '127.0.0.1', () => {
    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      reject(new Error('Could not determine the allocated port'));
      return;
    }
    server.close(() => resolve(address.port));
  });
});
