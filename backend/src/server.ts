/*
Uno Table – TCP game server
---------------------------
- Listens for raw TCP players speaking the line protocol (see net/protocol.ts).
- Runs registration (connect, then name) and a single game.
- Serves a read-only status API next to it:
    GET /health  -> { status: 'ok' }
    GET /game    -> public game state, or { status: 'REGISTERING' } before the deal
- On completion closes every player connection, the listener and the status API.
*/

import express from 'express';
import http from 'http';
import cors from 'cors';

import type { ServerConfig } from './config';
import { UnoGame, type GameOptions, type PublicState } from './engine/UnoGame';
import { Notifier } from './net/notifier';
import { register, TcpListener, type ConnectionListener, type Registration } from './net/registration';

export type StatusView = PublicState | { status: 'REGISTERING' };

export function createStatusApp(getState: () => StatusView): express.Express {
  const app = express();
  app.use(cors());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/game', (_req, res) => {
    res.json(getState());
  });

  return app;
}

function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

export interface RunOptions {
  /** Defaults to a TCP listener on config.host:config.port. */
  listener?: ConnectionListener;
  notifier?: Notifier;
  /** Start the HTTP status API on config.statusPort. */
  serveStatus?: boolean;
  game?: Omit<GameOptions, 'aiPlayers' | 'notifier'>;
}

/** Registers players, plays one game and tears everything down. Resolves with the winner's name. */
export async function runGame(config: ServerConfig, options: RunOptions = {}): Promise<string> {
  const notifier = options.notifier ?? new Notifier();
  const listener = options.listener ?? (await TcpListener.open(config.host, config.port, config.maxConnections));

  let game: UnoGame | null = null;
  let status: http.Server | null = null;
  let registration: Registration = new Map();

  try {
    if (options.serveStatus ?? true) {
      status = http.createServer(createStatusApp(() => game?.getPublicState() ?? { status: 'REGISTERING' }));
      await listen(status, config.statusPort, config.host);
    }

    registration = await register(listener, {
      maxConnections: config.maxConnections,
      connectTimeout: config.connectTimeout,
      nameTimeout: config.nameTimeout,
      notifier,
    });

    game = new UnoGame(registration, {
      aiDelayMs: config.aiDelayMs,
      ...options.game,
      aiPlayers: config.aiPlayers,
      notifier,
    });
    console.log(`Game ${game.id} starting with ${registration.size} player(s) and ${config.aiPlayers} computer player(s)`);
    return await game.play();
  } finally {
    for (const conn of registration.keys()) conn.close();
    await listener.close();
    if (status) await closeServer(status);
  }
}
