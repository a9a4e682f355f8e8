/** Utility helpers shared across engine modules. */
import { GameRuleError, type Player } from "./types";

export type RandomFn = () => number;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/** Wall-clock helper for chat timestamps. */
export const nowMs = () => Date.now();

/** mulberry32: small reseedable RNG so a whole game can be replayed from one seed. */
export function seededRandom(seed: number): RandomFn {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates shuffle (pure). */
export function shuffle<T>(items: readonly T[], random: RandomFn = defaultRandom): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** Picks a random element, throwing on empty lists. */
export function randomItem<T>(items: readonly T[], random: RandomFn = defaultRandom): T {
  if (items.length === 0) {
    throw new GameRuleError("EMPTY_SELECTION", "Cannot select from empty list");
  }
  return items[Math.floor(random() * items.length)];
}

/** Strict majority threshold: floor(n/2) + 1. */
export function majorityThreshold(voterCount: number): number {
  return Math.floor(voterCount / 2) + 1;
}

/** Seat index after `index`, wrapping around the table. */
export function nextSeat(index: number, playerCount: number): number {
  return (index + 1) % playerCount;
}

/** Safe player lookup, null when missing. */
export function getPlayer(players: readonly Player[], playerId: string): Player | null {
  return players.find(p => p.playerId === playerId) ?? null;
}
