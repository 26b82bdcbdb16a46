/**
 * In-process stand-in for the upstream ticker stream.
 *
 * A real `ws` server on an ephemeral loopback port; tests push frames to
 * every connected feed and can drop connections to force a reconnect.
 */

import { WebSocketServer, type WebSocket } from 'ws';

export class FakeUpstream {
  readonly requestedPaths: string[] = [];
  private readonly server: WebSocketServer;
  private readonly sockets = new Set<WebSocket>();
  private connectionWaiters: Array<() => void> = [];
  private connectionCount = 0;

  private constructor(server: WebSocketServer) {
    this.server = server;
    server.on('connection', (socket, req) => {
      this.requestedPaths.push(req.url ?? '');
      this.sockets.add(socket);
      this.connectionCount++;
      socket.on('close', () => this.sockets.delete(socket));
      const waiters = this.connectionWaiters;
      this.connectionWaiters = [];
      waiters.forEach(resolve => resolve());
    });
  }

  static start(): Promise<FakeUpstream> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
      server.once('error', reject);
      server.once('listening', () => resolve(new FakeUpstream(server)));
    });
  }

  get url(): string {
    const address = this.server.address();
    if (typeof address === 'string') {
      throw new Error('FakeUpstream is not bound to a TCP port');
    }
    return `ws://127.0.0.1:${address.port}`;
  }

  get connections(): number {
    return this.connectionCount;
  }

  /**
   * Resolve once `count` connections have been accepted in total
   */
  async waitForConnections(count: number, timeoutMs = 3000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (this.connectionCount < count) {
      if (Date.now() > deadline) {
        throw new Error(`Timed out waiting for ${count} upstream connections (have ${this.connectionCount})`);
      }
      await new Promise<void>(resolve => {
        this.connectionWaiters.push(resolve);
        setTimeout(resolve, 50);
      });
    }
  }

  send(frame: string): void {
    for (const socket of this.sockets) {
      socket.send(frame);
    }
  }

  /**
   * Cut every connection without a close handshake
   */
  dropAll(): void {
    for (const socket of this.sockets) {
      socket.terminate();
    }
  }

  close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.terminate();
    }
    return new Promise(resolve => this.server.close(() => resolve()));
  }
}
