#!/usr/bin/env npx tsx
/**
 * Example subscriber: connects to the relay and prints every frame it receives.
 *
 * Usage:
 *   npx tsx scripts/ws-client.ts [url]
 *
 * The URL defaults to ws://localhost:8000/ws (or WS_URL if set).
 */

import WebSocket from 'isomorphic-ws';

const url = process.argv[2] ?? process.env.WS_URL ?? 'ws://localhost:8000/ws';
const ws = new WebSocket(url);

ws.on('open', () => {
  console.log(`connected to ${url}`);
});

ws.on('message', (data: WebSocket.RawData) => {
  console.log(data.toString());
});

ws.on('close', (code: number, reason: Buffer) => {
  console.log(`closed code=${code} reason=${reason.toString() || 'none'}`);
  process.exit(code === 1000 || code === 1001 ? 0 : 1);
});

ws.on('error', (error: Error) => {
  console.error(`error: ${error.message}`);
});

process.on('SIGINT', () => ws.close(1000, 'client exit'));
