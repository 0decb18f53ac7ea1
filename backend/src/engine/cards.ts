/*
Cards, deck and the matching rule
---------------------------------
- 108 cards: one "0" per color, two of each 1-9 / SKIP / REVERSE / DRAW2 per
  color, four WILD and four WILD4 (color ALL until played).
- Piles are plain arrays; the *end* of an array is its top.
- A played wild carries the chosen color, never ALL.
*/

import { DeckExhaustedError } from '../errors';

//#region Types

export type Color = 'RED' | 'BLUE' | 'GREEN' | 'YELLOW';
export type CardColor = Color | 'ALL';

export type NumberRank = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9';
export type Rank = NumberRank | 'SKIP' | 'REVERSE' | 'DRAW2' | 'WILD' | 'WILD4';

export interface Card {
  rank: Rank;
  color: CardColor;
}

export type Rng = () => number;

export const defaultRng: Rng = () => Math.random();

//#endregion

//#region Canonical deck

export const COLORS: readonly Color[] = ['RED', 'BLUE', 'GREEN', 'YELLOW'];

const FACE_RANKS: NumberRank[] = ['1', '2', '3', '4', '5', '6', '7', '8', '9'];
const ACTION_RANKS: Rank[] = ['SKIP', 'REVERSE', 'DRAW2'];

export const HAND_SIZE = 7;

function buildCards(): Card[] {
  const cards: Card[] = COLORS.map((color): Card => ({ rank: '0', color }));
  const twoCycles = [...COLORS, ...COLORS];
  for (const color of twoCycles) {
    for (const rank of FACE_RANKS) cards.push({ rank, color });
  }
  for (const color of twoCycles) {
    for (const rank of ACTION_RANKS) cards.push({ rank, color });
  }
  for (let i = 0; i < 4; i++) {
    cards.push({ rank: 'WILD', color: 'ALL' }, { rank: 'WILD4', color: 'ALL' });
  }
  return cards;
}

const CARDS: readonly Card[] = buildCards();

export const CARDS_TOTAL = CARDS.length;

export function canonicalCards(): Card[] {
  return CARDS.map(c => ({ ...c }));
}

//#endregion

//#region Deck operations

export function shuffle<T>(arr: T[], rng: Rng = defaultRng): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export function generateDeck(rng: Rng = defaultRng): Card[] {
  return shuffle(canonicalCards(), rng);
}

/** Takes `n` cards off the top (tail) of the deck. */
export function generateHand(deck: Card[], n = HAND_SIZE): Card[] {
  const hand: Card[] = [];
  for (let i = 0; i < n; i++) {
    const card = deck.pop();
    if (!card) throw new DeckExhaustedError();
    hand.push(card);
  }
  return hand;
}

/**
 * Pops the deck's top card. An empty deck is refilled from the discard pile,
 * keeping the discard top where it is. When the top is the only card left
 * anywhere it is drawn itself, leaving the discard pile empty.
 */
export function drawCard(deck: Card[], discard: Card[], rng: Rng = defaultRng): Card {
  const fromDeck = deck.pop();
  if (fromDeck) return fromDeck;

  const top = discard.pop();
  if (!top) throw new DeckExhaustedError();
  deck.push(...shuffle(discard, rng));
  discard.length = 0;
  discard.push(top);

  const refilled = deck.pop();
  if (refilled) return refilled;
  discard.pop();
  return top;
}

//#endregion

//#region Rules

export function isWild(card: Card): boolean {
  return card.rank.startsWith('WILD');
}

/** Wilds always match; an empty discard pile accepts anything. */
export function isLegalPlay(card: Card, top: Card | undefined): boolean {
  if (!top) return true;
  return isWild(card) || card.rank === top.rank || card.color === top.color;
}

export function legalIndices(hand: Card[], top: Card | undefined): number[] {
  const out: number[] = [];
  hand.forEach((card, i) => {
    if (isLegalPlay(card, top)) out.push(i);
  });
  return out;
}

/** Cards the next player picks up: the number after DRAW / WILD, if any. */
export function drawPenalty(card: Card): number {
  const m = /^(?:DRAW|WILD)(\d+)$/.exec(card.rank);
  return m ? parseInt(m[1], 10) : 0;
}

export function isColor(value: string): value is Color {
  return COLORS.some(c => c === value);
}

//#endregion

//#region Formatting

export function formatCard(card: Card): string {
  return `${card.rank} ${card.color}`;
}

export function formatHand(hand: Card[]): string {
  return hand.map(formatCard).join(', ');
}

//#endregion
