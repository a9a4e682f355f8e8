/**
 * Fixed quest tables. Indexed by player count, then quest number (1-based).
 */
import { ConfigError, GameRuleError } from "./types";

export const MIN_PLAYERS = 5;
export const MAX_PLAYERS = 10;
export const TOTAL_QUESTS = 5;
/** Successes (or failures) that end the quest stage. */
export const QUESTS_TO_WIN = 3;
/** Quests after which the Lady of the Lake may be used. */
export const LADY_QUESTS: readonly number[] = [2, 3, 4];

type QuestRow = readonly [number, number, number, number, number];

const TEAM_SIZES: Readonly<Record<number, QuestRow>> = {
  5: [2, 3, 2, 3, 3],
  6: [2, 3, 4, 3, 4],
  7: [2, 3, 3, 4, 4],
  8: [3, 4, 4, 5, 5],
  9: [3, 4, 4, 5, 5],
  10: [3, 4, 4, 5, 5]
};

const TWO_FAIL_QUEST = 4;
const TWO_FAIL_MIN_PLAYERS = 7;

function row(playerCount: number): QuestRow {
  const sizes = TEAM_SIZES[playerCount];
  if (!sizes) {
    throw new ConfigError(
      "UNSUPPORTED_PLAYER_COUNT",
      `Player count must be between ${MIN_PLAYERS} and ${MAX_PLAYERS}, got ${playerCount}`
    );
  }
  return sizes;
}

function assertQuest(questNumber: number): void {
  if (!Number.isInteger(questNumber) || questNumber < 1 || questNumber > TOTAL_QUESTS) {
    throw new GameRuleError("INVALID_QUEST", `Quest number must be 1-${TOTAL_QUESTS}, got ${questNumber}`);
  }
}

export function teamSize(playerCount: number, questNumber: number): number {
  const sizes = row(playerCount);
  assertQuest(questNumber);
  return sizes[questNumber - 1];
}

/** Fail cards needed to sink a quest: 2 on quest 4 at seven or more players, else 1. */
export function requiredFails(playerCount: number, questNumber: number): number {
  row(playerCount);
  assertQuest(questNumber);
  return questNumber === TWO_FAIL_QUEST && playerCount >= TWO_FAIL_MIN_PLAYERS ? 2 : 1;
}
