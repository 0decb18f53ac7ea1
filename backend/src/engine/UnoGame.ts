/*
Uno Table Engine
----------------
Runs one game over the players that survived registration plus a number of
computer players.

Rules (simplified variant)
--------------------------
1) Everyone is dealt 7 cards; the start card is flipped without effect.
2) A card may be played when it is a wild or matches the current card's rank
   or color. A human may answer DRAW instead; a computer player draws when it
   has nothing legal.
3) DRAW2 / WILD4: the next player picks up 2 / 4 cards.
   REVERSE: the play order is reversed in place and counting continues from
   the same index, so with two players the one who reversed goes again.
   SKIP: the next player loses their turn.
4) The first player to empty their hand with a play wins. Drawing never ends
   the game.

Exported API (high-level)
-------------------------
- class UnoGame
  - constructor(registration: Registration, options: GameOptions)
  - play(): Promise<string>            resolves with the winner's name
  - getPublicState(): PublicState
  - getPlayerView(seat: number): PlayerView

Notes
-----
- One decision is outstanding at a time; a human prompt suspends the whole
  table until that player answers. A peer that drops mid-game rejects play()
  with PeerDisconnectedError.
*/

import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError } from '../errors';
import { Notifier } from '../net/notifier';
import type { Connection } from '../net/protocol';
import type { Registration } from '../net/registration';
import {
  CARDS_TOTAL,
  HAND_SIZE,
  defaultRng,
  drawCard,
  drawPenalty,
  formatCard,
  formatHand,
  generateDeck,
  generateHand,
  isColor,
  isLegalPlay,
  isWild,
  type Card,
  type Color,
  type Rng,
} from './cards';
import { chooseComputerAction, chooseWildColor, thinkingUnits } from './computerPlayer';

//#region Types

export interface HumanSeat {
  kind: 'human';
  name: string;
  connection: Connection;
  hand: Card[];
}

export interface ComputerSeat {
  kind: 'ai';
  name: string;
  hand: Card[];
}

export type Seat = HumanSeat | ComputerSeat;

export type GameStatus = 'LOBBY' | 'ACTIVE' | 'ENDED';

export interface GameOptions {
  aiPlayers: number;
  notifier?: Notifier;
  rng?: Rng;
  /** Length of one computer "thinking" unit; each turn waits 1-4 units. */
  aiDelayMs?: number;
  handSize?: number;
  /** Used as-is instead of a freshly shuffled deck; hands come off its end. */
  deck?: Card[];
}

export interface SeatSummary {
  name: string;
  kind: Seat['kind'];
  cardCount: number;
}

export interface PublicState {
  gameId: string;
  status: GameStatus;
  currentTurn: number;
  currentCard: Card | null;
  deckCount: number;
  discardCount: number;
  players: SeatSummary[];
  winner: string | null;
}

export interface PlayerView extends PublicState {
  you: SeatSummary;
  yourHand: Card[];
}

//#endregion

//#region Helpers

export const COLOR_PROMPT = 'Select a color (RED, YELLOW, GREEN, BLUE): ';
export const CARD_PROMPT = 'Select your card: ';

/** Rejects negative or fractional AI counts and tables the deck can't deal. */
export function assertTableSize(aiPlayers: number, humans: number, handSize = HAND_SIZE) {
  if (!Number.isInteger(aiPlayers) || aiPlayers < 0) {
    throw new ConfigurationError('aiPlayers must be a non-negative integer!');
  }
  const players = aiPlayers + humans;
  if (players === 0 || Math.floor(CARDS_TOTAL / players) < handSize) {
    throw new ConfigurationError('Cannot start a game with too many players!');
  }
}

/** 1-based answer to 0-based index, wrapping past either end of the hand. */
export function wrapIndex(answer: string, handLength: number): number {
  const n = BigInt(handLength);
  return Number((((BigInt(answer) - 1n) % n) + n) % n);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function summarize(seat: Seat): SeatSummary {
  return { name: seat.name, kind: seat.kind, cardCount: seat.hand.length };
}

//#endregion

//#region Game Class

export class UnoGame {
  readonly id = uuidv4().slice(0, 8).toUpperCase();

  private readonly notifier: Notifier;
  private readonly rng: Rng;
  private readonly aiDelayMs: number;
  private readonly connections: Connection[];
  private seats: Seat[];
  private deck: Card[];
  private discard: Card[] = [];
  private status: GameStatus = 'LOBBY';
  private currentTurn = 0;
  private skipPending = false;
  private winner: string | null = null;

  constructor(registration: Registration, options: GameOptions) {
    const handSize = options.handSize ?? HAND_SIZE;
    assertTableSize(options.aiPlayers, registration.size, handSize);

    this.notifier = options.notifier ?? new Notifier();
    this.rng = options.rng ?? defaultRng;
    this.aiDelayMs = options.aiDelayMs ?? 1000;
    this.connections = [...registration.keys()];
    this.deck = options.deck ? options.deck.slice() : generateDeck(this.rng);

    this.seats = [];
    for (const [connection, name] of registration) {
      this.seats.push({ kind: 'human', name, connection, hand: generateHand(this.deck, handSize) });
    }
    for (let n = 0; n < options.aiPlayers; n++) {
      this.seats.push({ kind: 'ai', name: `Player ${n}`, hand: generateHand(this.deck, handSize) });
    }
  }

  getPublicState(): PublicState {
    return {
      gameId: this.id,
      status: this.status,
      currentTurn: this.currentTurn,
      currentCard: this.top() ?? null,
      deckCount: this.deck.length,
      discardCount: this.discard.length,
      players: this.seats.map(summarize),
      winner: this.winner,
    };
  }

  getPlayerView(seat: number): PlayerView {
    const s = this.seats[seat];
    if (!s) throw new Error('Unknown seat');
    return {
      ...this.getPublicState(),
      you: summarize(s),
      yourHand: s.hand.map(c => ({ ...c })),
    };
  }

  async play(): Promise<string> {
    if (this.status !== 'LOBBY') throw new Error('Game already started');
    this.status = 'ACTIVE';

    const start = drawCard(this.deck, this.discard, this.rng);
    this.discard.push(start);
    this.broadcast(`Start Card: ${formatCard(start)}`);

    for (;;) {
      const winner = await this.takeTurn();
      if (winner !== null) return winner;
    }
  }

  private async takeTurn(): Promise<string | null> {
    const seat = this.seats[this.currentTurn];

    if (this.skipPending) {
      this.skipPending = false;
      this.broadcast(`${seat.name} was skipped`);
      this.advance();
      return null;
    }

    const card = seat.kind === 'human' ? await this.humanDecision(seat) : await this.computerDecision(seat);

    if (card === null) {
      seat.hand.push(drawCard(this.deck, this.discard, this.rng));
      this.broadcast(`${seat.name} drew a card`);
      this.advance();
      return null;
    }

    if (seat.hand.length === 0) {
      this.discard.push(card);
      this.status = 'ENDED';
      this.winner = seat.name;
      this.broadcast(`${seat.name} won!`);
      return seat.name;
    }

    this.applyEffects(seat, card);
    this.advance();
    return null;
  }

  private applyEffects(seat: Seat, card: Card) {
    this.discard.push(card);
    this.broadcast(`${seat.name} played ${formatCard(card)}`);

    if (card.rank === 'REVERSE') this.seats.reverse();
    if (card.rank === 'SKIP') this.skipPending = true;

    const penalty = drawPenalty(card);
    if (penalty > 0) {
      const victim = this.seats[(this.currentTurn + 1) % this.seats.length];
      for (let i = 0; i < penalty; i++) victim.hand.push(drawCard(this.deck, this.discard, this.rng));
      this.broadcast(`${victim.name} drew ${penalty} cards`);
    }
  }

  /** The played card (recolored if wild), or null to draw. */
  private async humanDecision(seat: HumanSeat): Promise<Card | null> {
    const top = this.top();
    this.broadcast(`It's ${seat.name}'s turn! Current card is ${top ? formatCard(top) : 'nothing'}`);
    this.notifier.sendUser(seat.connection, `It's your turn! ${formatHand(seat.hand)}`);

    for (;;) {
      const answer = (await this.notifier.sendInput(seat.connection, CARD_PROMPT)).trim();

      if (answer.toUpperCase() === 'DRAW') return null;

      if (!/^[0-9]+$/.test(answer)) {
        this.notifier.sendUser(seat.connection, "That isn't a valid index! Send a number!");
        continue;
      }

      const index = wrapIndex(answer, seat.hand.length);
      const chosen = seat.hand[index];
      if (!isLegalPlay(chosen, top)) {
        const shown = top ? formatCard(top) : 'nothing';
        this.notifier.sendUser(seat.connection, `You cannot play ${formatCard(chosen)} on a ${shown} try again!`);
        continue;
      }

      seat.hand.splice(index, 1);
      if (seat.hand.length === 0 || !isWild(chosen)) return chosen;
      return { ...chosen, color: await this.askColor(seat) };
    }
  }

  private async askColor(seat: HumanSeat): Promise<Color> {
    for (;;) {
      const answer = (await this.notifier.sendInput(seat.connection, COLOR_PROMPT)).trim().toUpperCase();
      if (isColor(answer)) return answer;
      this.notifier.sendUser(seat.connection, 'That color is invalid! Try again');
    }
  }

  private async computerDecision(seat: ComputerSeat): Promise<Card | null> {
    this.broadcast(`It is ${seat.name}'s turn!`);
    await sleep(thinkingUnits(this.rng) * this.aiDelayMs);

    const action = chooseComputerAction(seat.hand, this.top(), this.rng);
    if (action.type === 'DRAW') return null;

    const [card] = seat.hand.splice(action.index, 1);
    if (!isWild(card)) return card;
    return { ...card, color: chooseWildColor(seat.hand, this.rng) };
  }

  private top(): Card | undefined {
    return this.discard[this.discard.length - 1];
  }

  private advance() {
    this.currentTurn = (this.currentTurn + 1) % this.seats.length;
  }

  private broadcast(text: string) {
    this.notifier.broadcast(this.connections, text);
  }
}

//#endregion
