/*
Line protocol
-------------
Server -> client: one JSON object per line, exactly one key, no whitespace:
  {"message":"..."}  text to show
  {"input":"..."}    show the prompt and send back one answer
  {"error":"..."}    the connection is being dropped
Client -> server: raw text chunks. The first chunk is the player's name; each
later chunk answers the most recent "input" line.
*/

import type { Socket } from 'net';
import type { Duplex } from 'stream';
import { z } from 'zod';
import { PeerDisconnectedError, ProtocolError } from '../errors';

export const MAX_READ_BYTES = 1024;

export type ServerLineKind = 'message' | 'input' | 'error';

export interface ServerLine {
  kind: ServerLineKind;
  text: string;
}

//#region Encoding (server side)

export function encodeLine(kind: ServerLineKind, text: string): string {
  const payload: Partial<Record<ServerLineKind, string>> = { [kind]: text };
  return JSON.stringify(payload) + '\n';
}

export function decodeText(chunk: Buffer): string {
  return chunk.toString('utf8');
}

/** A name is the first chunk minus the client's line terminator. */
export function decodeName(chunk: string): string {
  return chunk.replace(/\r?\n$/, '');
}

//#endregion

//#region Decoding (client side)

const ServerLineSchema = z.union([
  z.object({ message: z.string() }).strict(),
  z.object({ input: z.string() }).strict(),
  z.object({ error: z.string() }).strict(),
]);

export function parseServerLine(line: string): ServerLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ProtocolError(`Not a JSON line: ${line}`);
  }
  const parsed = ServerLineSchema.safeParse(raw);
  if (!parsed.success) throw new ProtocolError(`Unexpected line: ${line}`);
  const obj = parsed.data;
  if ('message' in obj) return { kind: 'message', text: obj.message };
  if ('input' in obj) return { kind: 'input', text: obj.input };
  return { kind: 'error', text: obj.error };
}

/** Reassembles lines that arrive split across chunks. */
export class ServerLineDecoder {
  private partial = '';

  push(chunk: string): ServerLine[] {
    const parts = (this.partial + chunk).split('\n');
    this.partial = parts.pop() ?? '';
    return parts.map(p => p.trim()).filter(p => p.length > 0).map(parseServerLine);
  }
}

export function decodeServerLines(text: string): ServerLine[] {
  return new ServerLineDecoder().push(text.endsWith('\n') ? text : text + '\n');
}

//#endregion

//#region Connections

/** One remote player as the engine and the registration stage see it. */
export interface Connection {
  readonly label: string;
  send(line: string): void;
  /** Next chunk from the peer, at most MAX_READ_BYTES. Rejects once the peer is gone. */
  read(): Promise<string>;
  close(): void;
}

/** Largest cut at or below `limit` that doesn't split a UTF-8 sequence. */
function utf8Boundary(buf: Buffer, limit: number): number {
  if (buf.length <= limit) return buf.length;
  let cut = limit;
  while (cut > 0 && (buf[cut] & 0xc0) === 0x80) cut--;
  return cut === 0 ? limit : cut;
}

interface PendingRead {
  resolve: (chunk: string) => void;
  reject: (err: Error) => void;
}

/**
 * Connection over a socket. Inbound bytes are held until someone reads them,
 * so a player typing out of turn is only seen on their next prompt.
 */
export class SocketConnection implements Connection {
  private buffered: Buffer = Buffer.alloc(0);
  private waiters: PendingRead[] = [];
  private gone = false;

  constructor(private readonly stream: Duplex, readonly label: string) {
    stream.on('data', (chunk: Buffer | string) => this.onData(typeof chunk === 'string' ? Buffer.from(chunk) : chunk));
    stream.on('end', () => this.onGone());
    stream.on('close', () => this.onGone());
    stream.on('error', () => this.onGone());
  }

  static fromSocket(socket: Socket): SocketConnection {
    return new SocketConnection(socket, `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`);
  }

  send(line: string): void {
    if (this.gone) return;
    this.stream.write(line);
  }

  read(): Promise<string> {
    if (this.buffered.length > 0) return Promise.resolve(this.take());
    if (this.gone) return Promise.reject(new PeerDisconnectedError(this.label));
    return new Promise<string>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    if (!this.gone) this.stream.end();
    this.onGone();
  }

  private take(): string {
    const chunk = this.buffered.subarray(0, utf8Boundary(this.buffered, MAX_READ_BYTES));
    this.buffered = this.buffered.subarray(chunk.length);
    return decodeText(chunk);
  }

  private onData(chunk: Buffer) {
    this.buffered = Buffer.concat([this.buffered, chunk]);
    while (this.waiters.length > 0 && this.buffered.length > 0) {
      const waiter = this.waiters.shift();
      waiter?.resolve(this.take());
    }
  }

  private onGone() {
    this.gone = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(new PeerDisconnectedError(this.label));
  }
}

//#endregion
