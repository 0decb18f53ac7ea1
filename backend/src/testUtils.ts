import type { Card, CardColor, Rank } from './engine/cards';
import { PeerDisconnectedError } from './errors';
import { decodeServerLines, type Connection, type ServerLine } from './net/protocol';
import type { ConnectionListener } from './net/registration';

export const card = (rank: Rank, color: CardColor): Card => ({ rank, color });

/**
 * Builds a deck that deals `hands` in order (hands come off the end), then
 * flips `start`, then hands out `drawPile` front to back.
 */
export function stackedDeck(hands: Card[][], start: Card, drawPile: Card[] = []): Card[] {
  const deck = [...drawPile].reverse();
  deck.push(start);
  for (const hand of [...hands].reverse()) deck.push(...[...hand].reverse());
  return deck;
}

/**
 * Scripted peer. Answers come from `script`; once it runs dry the peer either
 * hangs up (default) or stays silent until `deliver` is called.
 */
export class FakeConnection implements Connection {
  readonly sent: string[] = [];
  closed = false;
  private readonly queued: string[];
  private waiting: { resolve: (text: string) => void; reject: (err: Error) => void } | null = null;

  constructor(readonly label: string, script: string[] = [], private readonly hangUpWhenDone = true) {
    this.queued = [...script];
  }

  send(line: string) {
    this.sent.push(line);
  }

  read(): Promise<string> {
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.hangUpWhenDone || this.closed) return Promise.reject(new PeerDisconnectedError(this.label));
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  deliver(text: string) {
    const w = this.waiting;
    this.waiting = null;
    if (w) w.resolve(text);
    else this.queued.push(text);
  }

  close() {
    this.closed = true;
    const w = this.waiting;
    this.waiting = null;
    w?.reject(new PeerDisconnectedError(this.label));
  }

  lines(): ServerLine[] {
    return decodeServerLines(this.sent.join(''));
  }

  texts(kind: ServerLine['kind']): string[] {
    return this.lines().filter(l => l.kind === kind).map(l => l.text);
  }
}

/** Hands out the given connections immediately, then times out like an idle socket. */
export class FakeListener implements ConnectionListener {
  closed = false;
  private readonly pending: Connection[];

  constructor(connections: Connection[]) {
    this.pending = [...connections];
  }

  accept(timeoutMs: number): Promise<Connection | null> {
    const next = this.pending.shift();
    if (next) return Promise.resolve(next);
    return new Promise(resolve => setTimeout(() => resolve(null), timeoutMs));
  }

  async close() {
    this.closed = true;
  }
}
