/*
Registration stage
------------------
1) Connect: accept sockets until `maxConnections` or the connect deadline.
2) Name: the first chunk each socket sends is its name. Sockets still silent
   at the name deadline get an error line and are closed.
Both deadlines are absolute points on the monotonic clock.
*/

import { createServer, type Server, type Socket } from 'net';
import { NoNamesError, NoParticipantsError } from '../errors';
import type { Notifier } from './notifier';
import { decodeName, SocketConnection, type Connection } from './protocol';

export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

/** Connection -> chosen name, in connection order. */
export type Registration = Map<Connection, string>;

export const LATE_NAME_ERROR = "You didn't send a name in time!";

export interface ConnectionListener {
  /** Next accepted connection, or null once `timeoutMs` passes without one. */
  accept(timeoutMs: number): Promise<Connection | null>;
  close(): Promise<void>;
}

//#region TCP listener

export class TcpListener implements ConnectionListener {
  private queued: Socket[] = [];
  private waiter: ((socket: Socket | null) => void) | null = null;

  private constructor(private readonly server: Server) {
    server.on('connection', socket => {
      // Queued sockets have no other error listener.
      socket.on('error', () => socket.destroy());
      socket.once('close', () => {
        this.queued = this.queued.filter(s => s !== socket);
      });
      if (this.waiter) {
        const w = this.waiter;
        this.waiter = null;
        w(socket);
      } else {
        this.queued.push(socket);
      }
    });
  }

  static open(host: string, port: number, backlog: number): Promise<TcpListener> {
    const server = createServer();
    const listener = new TcpListener(server);
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen({ host, port, backlog }, () => {
        server.off('error', reject);
        resolve(listener);
      });
    });
  }

  port(): number {
    const addr = this.server.address();
    return addr !== null && typeof addr === 'object' ? addr.port : 0;
  }

  address(): string {
    const addr = this.server.address();
    if (addr === null) return 'closed';
    return typeof addr === 'string' ? addr : `${addr.address}:${addr.port}`;
  }

  accept(timeoutMs: number): Promise<Connection | null> {
    const ready = this.queued.shift();
    if (ready) return Promise.resolve(SocketConnection.fromSocket(ready));
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = socket => {
        clearTimeout(timer);
        resolve(socket ? SocketConnection.fromSocket(socket) : null);
      };
    });
  }

  close(): Promise<void> {
    for (const s of this.queued) s.destroy();
    this.queued = [];
    return new Promise((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }
}

//#endregion

//#region Stages

export async function awaitConnections(
  listener: ConnectionListener,
  maxConnections: number,
  timeoutSeconds: number,
  notifier: Notifier,
  clock: Clock = monotonicClock,
): Promise<Connection[]> {
  const deadline = clock() + timeoutSeconds * 1000;
  const connected: Connection[] = [];

  while (connected.length < maxConnections) {
    const remaining = deadline - clock();
    if (remaining <= 0) break;
    const conn = await listener.accept(remaining);
    if (conn) {
      connected.push(conn);
      notifier.broadcast(connected, `${conn.label} connected!`);
    }
  }

  if (connected.length === 0) throw new NoParticipantsError();
  return connected;
}

export async function awaitNames(
  connections: Connection[],
  timeoutSeconds: number,
  notifier: Notifier,
  clock: Clock = monotonicClock,
): Promise<Registration> {
  const deadline = clock() + timeoutSeconds * 1000;
  const names = new Map<Connection, string>();

  await new Promise<void>((resolve, reject) => {
    let done = false;
    const finish = (err?: Error) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      if (err) reject(err);
      else resolve();
    };
    const timer = setTimeout(() => finish(), Math.max(0, deadline - clock()));

    for (const conn of connections) {
      conn.read().then(
        chunk => {
          if (done) return;
          const name = decodeName(chunk);
          names.set(conn, name);
          notifier.broadcast(connections, `${conn.label} has chosen name ${name}!`);
          if (names.size === connections.length) finish();
        },
        (err: Error) => finish(err),
      );
    }
  });

  for (const conn of connections) {
    if (names.has(conn)) continue;
    notifier.sendError(conn, LATE_NAME_ERROR);
    conn.close();
  }

  if (names.size === 0) throw new NoNamesError();

  const registration: Registration = new Map();
  for (const conn of connections) {
    const name = names.get(conn);
    if (name !== undefined) registration.set(conn, name);
  }
  return registration;
}

export interface RegistrationOptions {
  maxConnections: number;
  connectTimeout: number;
  nameTimeout: number;
  notifier: Notifier;
  clock?: Clock;
}

export async function register(listener: ConnectionListener, opts: RegistrationOptions): Promise<Registration> {
  const connected = await awaitConnections(listener, opts.maxConnections, opts.connectTimeout, opts.notifier, opts.clock);
  try {
    return await awaitNames(connected, opts.nameTimeout, opts.notifier, opts.clock);
  } catch (err) {
    for (const conn of connected) conn.close();
    throw err;
  }
}

//#endregion
