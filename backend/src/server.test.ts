import { describe, it, expect, afterEach } from 'vitest';
import http from 'http';
import { createStatusApp, runGame, type StatusView } from './server';
import type { ServerConfig } from './config';
import { NoParticipantsError, PeerDisconnectedError } from './errors';
import { Notifier } from './net/notifier';
import type { Connection } from './net/protocol';
import { UnoGame } from './engine/UnoGame';
import { card, stackedDeck, FakeConnection, FakeListener } from './testUtils';

const config: ServerConfig = {
  maxConnections: 1,
  connectTimeout: 0.05,
  nameTimeout: 0.05,
  aiPlayers: 1,
  host: '127.0.0.1',
  port: 0,
  statusPort: 0,
  aiDelayMs: 0,
};

describe('createStatusApp', () => {
  let server: http.Server | null = null;

  async function serve(getState: () => StatusView): Promise<string> {
    const s = http.createServer(createStatusApp(getState));
    server = s;
    await new Promise<void>(resolve => s.listen(0, '127.0.0.1', () => resolve()));
    const addr = s.address();
    const port = addr !== null && typeof addr === 'object' ? addr.port : 0;
    return `http://127.0.0.1:${port}`;
  }

  afterEach(async () => {
    const s = server;
    server = null;
    if (s) await new Promise<void>(resolve => s.close(() => resolve()));
  });

  it('answers GET /health', async () => {
    const base = await serve(() => ({ status: 'REGISTERING' }));
    const response = await fetch(`${base}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('reports registration before a game exists', async () => {
    const base = await serve(() => ({ status: 'REGISTERING' }));
    const response = await fetch(`${base}/game`);
    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect(await response.json()).toEqual({ status: 'REGISTERING' });
  });

  it('reports the public state once a game is dealt', async () => {
    const henry = new FakeConnection('10.0.0.1:4000');
    const game = new UnoGame(new Map<Connection, string>([[henry, 'Henry']]), {
      aiPlayers: 1,
      handSize: 1,
      notifier: new Notifier(() => undefined),
      deck: stackedDeck([[card('5', 'RED')], [card('9', 'GREEN')]], card('5', 'BLUE')),
    });
    const base = await serve(() => game.getPublicState());

    const body = await (await fetch(`${base}/game`)).json();

    expect(body).toEqual({
      gameId: game.id,
      status: 'LOBBY',
      currentTurn: 0,
      currentCard: null,
      deckCount: 1,
      discardCount: 0,
      players: [
        { name: 'Henry', kind: 'human', cardCount: 1 },
        { name: 'Player 0', kind: 'ai', cardCount: 1 },
      ],
      winner: null,
    });
  });
});

describe('runGame', () => {
  it('registers, plays to a winner and closes everything', async () => {
    const logs: string[] = [];
    const henry = new FakeConnection('10.0.0.1:4000', ['Henry', '1']);
    const listener = new FakeListener([henry]);

    const winner = await runGame(config, {
      listener,
      notifier: new Notifier(line => logs.push(line)),
      serveStatus: false,
      game: {
        handSize: 1,
        rng: () => 0,
        deck: stackedDeck([[card('5', 'RED')], [card('9', 'GREEN')]], card('5', 'BLUE')),
      },
    });

    expect(winner).toBe('Henry');
    expect(logs).toEqual([
      '10.0.0.1:4000 connected!',
      '10.0.0.1:4000 has chosen name Henry!',
      'Start Card: 5 BLUE',
      "It's Henry's turn! Current card is 5 BLUE",
      'Henry won!',
    ]);
    expect(henry.closed).toBe(true);
    expect(listener.closed).toBe(true);
  });

  it('gives up when nobody connects and still closes the listener', async () => {
    const listener = new FakeListener([]);
    await expect(
      runGame(config, { listener, notifier: new Notifier(() => undefined), serveStatus: false }),
    ).rejects.toBeInstanceOf(NoParticipantsError);
    expect(listener.closed).toBe(true);
  });

  it('closes the connected players when one hangs up while naming', async () => {
    const gone = new FakeConnection('10.0.0.1:4000');
    const waiting = new FakeConnection('10.0.0.2:4001', [], false);
    const listener = new FakeListener([gone, waiting]);

    await expect(
      runGame(
        { ...config, maxConnections: 2, nameTimeout: 5 },
        { listener, notifier: new Notifier(() => undefined), serveStatus: false },
      ),
    ).rejects.toBeInstanceOf(PeerDisconnectedError);

    expect(waiting.closed).toBe(true);
    expect(listener.closed).toBe(true);
  });
});
