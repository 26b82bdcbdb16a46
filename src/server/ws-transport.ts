/**
 * Adapts a server-side `ws` socket to the SessionTransport a subscriber session drives.
 */

import { WebSocket } from 'ws';
import type { SessionTransport } from '../broadcast/subscriber-session.js';

export interface WsTransportOptions {
  /** Terminate the socket if the peer has not completed the close handshake by then (default: 5000) */
  closeGraceMs?: number;
}

export class WsTransport implements SessionTransport {
  private readonly closeGraceMs: number;
  private closeTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly socket: WebSocket,
    options: WsTransportOptions = {}
  ) {
    this.closeGraceMs = options.closeGraceMs ?? 5000;
    socket.once('close', () => {
      if (this.closeTimer) {
        clearTimeout(this.closeTimer);
        this.closeTimer = null;
      }
    });
  }

  send(frame: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`socket not open (readyState=${this.socket.readyState})`));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(frame, error => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    this.socket.close(code, reason);

    // A stalled peer never answers the close frame
    this.closeTimer = setTimeout(() => {
      this.closeTimer = null;
      this.socket.terminate();
    }, this.closeGraceMs);
  }

  onClose(listener: () => void): void {
    if (this.socket.readyState === WebSocket.CLOSED) {
      listener();
      return;
    }
    this.socket.once('close', listener);
  }
}
