/**
 * In-process HTTP server standing in for the load test target.
 */
import { createServer, Server } from 'node:http';
import { AddressInfo } from 'node:net';

export interface TestServerOptions {
  status?: number;
  delayMs?: number;
}

export interface TestServer {
  url: string;
  requests: () => number;
  close: () => Promise<void>;
}

function listen(server: Server): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }
      resolve(address);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close(error => (error ? reject(error) : resolve()));
  });
}

export async function startTestServer(options: TestServerOptions = {}): Promise<TestServer> {
  const { status = 200, delayMs = 0 } = options;
  let requests = 0;

  const server = createServer((req, res) => {
    requests++;
    setTimeout(() => {
      res.writeHead(status, { 'Content-Type': 'text/plain' });
      res.end(status < 400 ? 'ok' : 'error');
    }, delayMs);
  });

  const address = await listen(server);

  return {
    url: `http://127.0.0.1:${address.port}/`,
    requests: () => requests,
    close: () => close(server),
  };
}

/**
 * Returns a URL on a local port that nothing listens on.
 */
export async function unreachableUrl(): Promise<string> {
  const server = createServer();
  const address = await listen(server);
  await close(server);
  return `http://127.0.0.1:${address.port}/`;
}
