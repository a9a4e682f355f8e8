import * as transitions from "../src/engine/transitions";
import type { CreateGameInput } from "../src/engine/transitions";
import { GameRuleError, type GameState, type RoleName, type SeatInput } from "../src/engine/types";
import { computeVisibility } from "../src/engine/visibility";

export const FIVE_ROLES: RoleName[] = ["merlin", "percival", "loyal_servant", "assassin", "minion"];

export const TEN_ROLES: RoleName[] = [
  "merlin",
  "percival",
  "loyal_servant",
  "loyal_servant",
  "loyal_servant",
  "loyal_servant",
  "assassin",
  "morgana",
  "mordred",
  "oberon"
];

/** Seats p1..pN named P1..PN. */
export function seats(count: number, isBot = false): SeatInput[] {
  return Array.from({ length: count }, (_, i) => ({ playerId: `p${i + 1}`, name: `P${i + 1}`, isBot }));
}

/** A lobby whose human seats are all claimed and ready. */
export function readyLobby(count: number, overrides: Partial<CreateGameInput> = {}): GameState {
  const game = transitions.createGame("game", { players: seats(count), ...overrides });
  return { ...game, players: game.players.map(p => ({ ...p, claimed: true, ready: true })) };
}

/**
 * A started game where seat i holds `roles[i]`, so tests can name who is who.
 * Leader is p1; with the Lady enabled the last seat holds her.
 */
export function dealt(roles: RoleName[], overrides: Partial<CreateGameInput> = {}): GameState {
  const started = transitions.startGame(readyLobby(roles.length, { roles, ...overrides }), () => 0);
  const players = started.players.map((p, i) => ({ ...p, role: roles[i] }));
  return { ...started, players, visibility: computeVisibility(players) };
}

/** Every seat votes; `approvals` lists who approves (default: everyone). */
export function voteAll(game: GameState, approvals?: string[]): GameState {
  let next = game;
  for (const p of game.players) {
    next = transitions.recordTeamVote(next, p.playerId, approvals ? approvals.includes(p.playerId) : true);
  }
  return next;
}

/**
 * Current leader proposes `team`, the table approves unanimously, and members
 * play success unless listed in `failBy`.
 */
export function playQuest(game: GameState, team: string[], failBy: string[] = []): GameState {
  const leader = transitions.currentLeader(game).playerId;
  let next = voteAll(transitions.proposeTeam(game, leader, team));
  for (const id of team) {
    next = transitions.recordQuestVote(next, id, !failBy.includes(id));
  }
  return next;
}

/** Runs `fn` and returns the GameRuleError code it threw, or undefined when it did not throw. */
export function ruleCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof GameRuleError) return err.code;
    throw err;
  }
  return undefined;
}
