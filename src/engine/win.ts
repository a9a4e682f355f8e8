import type { GameState, QuestRecord, Winner } from "./types";
import { QUESTS_TO_WIN } from "./rules";

export interface QuestScore {
  successes: number;
  fails: number;
}

export function questScore(history: readonly QuestRecord[]): QuestScore {
  const successes = history.filter(q => q.succeeded).length;
  return { successes, fails: history.length - successes };
}

/**
 * Computes the terminal winner (if any) from the quest track alone.
 * - Evil wins outright on three failed quests.
 * - Three successes do not decide the game: the assassination still has to run.
 */
export function checkWin(state: GameState): Winner | null {
  if (state.winner) return state.winner;
  const { fails } = questScore(state.questHistory);
  if (fails >= QUESTS_TO_WIN) return "evil";
  return null;
}

/** True once good has banked enough quests to trigger the assassination. */
export function goodReachedQuota(state: GameState): boolean {
  return questScore(state.questHistory).successes >= QUESTS_TO_WIN;
}
