/**
 * Core domain types for the Round Table game engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** Hidden team membership of every role. */
export type Alignment = "good" | "evil";

export type RoleName =
  | "merlin"
  | "percival"
  | "loyal_servant"
  | "assassin"
  | "morgana"
  | "mordred"
  | "oberon"
  | "minion";

/** What a role privately learns about the table when roles are dealt. */
export type KnowledgeRule =
  | "sees_all_evil_except_one"
  | "sees_evil_team"
  | "sees_merlin_ambiguous_with_one_decoy"
  | "no_special_knowledge";

/**
 * Static role definition. The boolean flags are the only inputs the visibility
 * calculator reads; no code path branches on a role's name.
 */
export interface RoleDefinition {
  name: RoleName;
  label: string;
  alignment: Alignment;
  knowledge: KnowledgeRule;
  /** At most one copy per game. */
  unique: boolean;
  /** Exactly one copy per game. */
  required: boolean;
  /** Invisible to `sees_all_evil_except_one`. */
  hiddenFromSeer: boolean;
  /** Invisible to `sees_evil_team`. */
  hiddenFromEvil: boolean;
  /** Shown as an ambiguous candidate to `sees_merlin_ambiguous_with_one_decoy`. */
  seerCandidate: boolean;
  /** Killing this role during assassination wins the game for evil. */
  assassinationTarget: boolean;
  canAssassinate: boolean;
  requires: RoleName | null;
}

/** What one player may see about another. */
export type Sighting = "evil" | "ambiguous_good_candidate" | "unknown";

/** viewerId -> targetId -> sighting. Never contains the viewer itself. */
export type VisibilityMap = Record<string, Record<string, Sighting>>;

export type Phase =
  | "lobby"
  | "team_proposal"
  | "team_vote"
  | "quest"
  | "lady_of_lake"
  | "assassination"
  | "game_over";

export type Winner = Alignment;

export type WinReason = "QUESTS_FAILED" | "QUESTS_SUCCEEDED" | "MERLIN_ASSASSINATED";

/**
 * Server-side representation of a seated player.
 * Seats are fixed at creation; `role` is set exactly once when the game starts.
 */
export interface Player {
  playerId: string;
  name: string;
  isBot: boolean;
  seat: number;
  role: RoleName | null;
  claimed: boolean;
  ready: boolean;
}

/** Seat payload supplied when creating a game. */
export interface SeatInput {
  playerId: string;
  name: string;
  isBot?: boolean;
}

/** Immutable per-game rule switches, validated against the seat count. */
export interface GameConfig {
  roles: RoleName[];
  hammerAutoApprove: boolean;
  ladyOfLakeEnabled: boolean;
  /** Consecutive rejections after which the next proposal is force-approved. */
  hammerThreshold: number;
}

export interface QuestRecord {
  questNumber: number;
  leaderId: string;
  team: string[];
  failVotes: number;
  requiredFails: number;
  succeeded: boolean;
}

/** A resolved team vote. Individual team votes are public once resolved. */
export interface TeamVoteRecord {
  questNumber: number;
  leaderId: string;
  team: string[];
  votes: Record<string, boolean>;
  approved: boolean;
  hammered: boolean;
}

/** A private Lady of the Lake result, visible only to `holderId`. */
export interface LadyPeek {
  afterQuest: number;
  holderId: string;
  targetId: string;
  alignment: Alignment;
}

export interface ChatMessage {
  playerId: string;
  text: string;
  timestamp: number;
}

/**
 * Immutable snapshot of the entire game world.
 * Key invariants:
 * - `rolesAssigned === false` implies `phase === "lobby"`.
 * - `winner !== null` implies `phase === "game_over"`.
 * - `proposedTeam.length` equals the rules-table size whenever it is non-empty.
 * - `phaseAfterLady !== null` implies `phase === "lady_of_lake"`.
 */
export interface GameState {
  gameId: string;
  config: GameConfig;
  players: Player[];
  phase: Phase;
  questNumber: number;
  leaderIndex: number;
  proposedTeam: string[];
  teamVotes: Record<string, boolean>; // voterId -> approve
  questVotes: Record<string, boolean>; // teamMemberId -> success
  rejectionCount: number;
  questHistory: QuestRecord[];
  voteHistory: TeamVoteRecord[];
  ladyHolderId: string | null;
  ladyPreviousHolders: string[];
  ladyHistory: LadyPeek[];
  ladyUsedAfterQuests: number[];
  phaseAfterLady: "team_proposal" | "assassination" | null;
  rolesAssigned: boolean;
  visibility: VisibilityMap;
  assassinTargetId: string | null;
  winner: Winner | null;
  winReason: WinReason | null;
  chat: ChatMessage[];
}

/** Application-level error for invalid transitions. Surfaces to clients as structured error codes. */
export class GameRuleError extends Error {
  constructor(public code: string, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}

/** Bad game setup. Fatal to creation, never retried automatically. */
export class ConfigError extends GameRuleError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "ConfigError";
  }
}

export class InvalidTeamError extends GameRuleError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "InvalidTeamError";
  }
}

/** Wrong actor, wrong phase or malformed payload. */
export class InvalidActionForPhaseError extends GameRuleError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "InvalidActionForPhaseError";
  }
}

export class DuplicateVoteError extends GameRuleError {
  constructor(message: string) {
    super("DUPLICATE_VOTE", message);
    this.name = "DuplicateVoteError";
  }
}

export class UnknownPlayerError extends GameRuleError {
  constructor(playerId: string) {
    super("PLAYER_NOT_FOUND", `Player ${playerId} not found`);
    this.name = "UnknownPlayerError";
  }
}

export class GameOverError extends GameRuleError {
  constructor() {
    super("GAME_OVER", "The game is over; no further actions are accepted");
    this.name = "GameOverError";
  }
}

/** Raised when a bot misses its decision deadline; recovered inside the session. */
export class BotTimeoutError extends GameRuleError {
  constructor(playerId: string, timeoutMs: number) {
    super("BOT_TIMEOUT", `Bot ${playerId} did not decide within ${timeoutMs}ms`);
    this.name = "BotTimeoutError";
  }
}
