import {
  ConfigError,
  DuplicateVoteError,
  GameOverError,
  GameRuleError,
  InvalidActionForPhaseError,
  InvalidTeamError,
  UnknownPlayerError,
  type GameConfig,
  type GameState,
  type Phase,
  type Player,
  type QuestRecord,
  type SeatInput,
  type TeamVoteRecord
} from "./types";
import { alignmentOf, defaultRoles, getRole, validateRoles } from "./roles";
import { LADY_QUESTS, requiredFails, teamSize } from "./rules";
import { tallyQuestVote, tallyTeamVote } from "./tally";
import { computeVisibility } from "./visibility";
import { checkWin, goodReachedQuota } from "./win";
import { type RandomFn, defaultRandom, getPlayer, nextSeat, shuffle } from "./utils";

/** Everything a caller may choose when opening a table. */
export interface CreateGameInput {
  players: SeatInput[];
  /** Omit to use the recommended set for the table size. */
  roles?: readonly string[];
  hammerAutoApprove?: boolean;
  ladyOfLakeEnabled?: boolean;
  hammerThreshold?: number;
}

/** Default rule switches; the hammer threshold depends on the seat count. */
export const DEFAULT_RULES = {
  hammerAutoApprove: true,
  ladyOfLakeEnabled: false
} as const;

/** One less than the seat count: every other seat has led and been rejected. */
export function defaultHammerThreshold(playerCount: number): number {
  return playerCount - 1;
}

/** Validates a creation request against the seat count and freezes it into a GameConfig. */
export function buildConfig(input: CreateGameInput): GameConfig {
  const playerCount = input.players.length;
  const roles = validateRoles(playerCount, input.roles ?? defaultRoles(playerCount));
  const hammerThreshold = input.hammerThreshold ?? defaultHammerThreshold(playerCount);
  if (!Number.isInteger(hammerThreshold) || hammerThreshold < 1) {
    throw new ConfigError("INVALID_HAMMER_THRESHOLD", "Hammer threshold must be a positive integer");
  }
  return {
    roles,
    hammerAutoApprove: input.hammerAutoApprove ?? DEFAULT_RULES.hammerAutoApprove,
    ladyOfLakeEnabled: input.ladyOfLakeEnabled ?? DEFAULT_RULES.ladyOfLakeEnabled,
    hammerThreshold
  };
}

/**
 * Ensures the state machine is in one of the allowed phases before continuing.
 * A finished game always answers with GameOverError.
 */
export function ensurePhase(game: GameState, expected: Phase | Phase[], message: string): void {
  const allowed = Array.isArray(expected) ? expected : [expected];
  if (allowed.includes(game.phase)) return;
  if (game.phase === "game_over") {
    throw new GameOverError();
  }
  throw new InvalidActionForPhaseError("INVALID_PHASE", message);
}

/** Looks up a seated player or throws UnknownPlayerError. */
export function assertPlayer(game: GameState, playerId: string): Player {
  const player = getPlayer(game.players, playerId);
  if (!player) {
    throw new UnknownPlayerError(playerId);
  }
  return player;
}

/** Promotes a seat payload to a lobby Player. Bot seats are born claimed and ready. */
export function toPlayer(seat: SeatInput, index: number): Player {
  const isBot = Boolean(seat.isBot);
  return {
    playerId: seat.playerId,
    name: seat.name,
    isBot,
    seat: index,
    role: null,
    claimed: isBot,
    ready: isBot
  };
}

/**
 * Creates the lobby for a table. Throws ConfigError on any invalid seat or
 * role/player-count combination.
 */
export function createGame(gameId: string, input: CreateGameInput): GameState {
  const ids = new Set<string>();
  for (const seat of input.players) {
    if (!seat.playerId || !seat.name.trim()) {
      throw new ConfigError("INVALID_SEAT", "Every seat needs an id and a name");
    }
    if (ids.has(seat.playerId)) {
      throw new ConfigError("DUPLICATE_PLAYER_ID", `Player id ${seat.playerId} is used twice`);
    }
    ids.add(seat.playerId);
  }
  const config = buildConfig(input);

  return {
    gameId,
    config,
    players: input.players.map(toPlayer),
    phase: "lobby",
    questNumber: 1,
    leaderIndex: 0,
    proposedTeam: [],
    teamVotes: {},
    questVotes: {},
    rejectionCount: 0,
    questHistory: [],
    voteHistory: [],
    ladyHolderId: null,
    ladyPreviousHolders: [],
    ladyHistory: [],
    ladyUsedAfterQuests: [],
    phaseAfterLady: null,
    rolesAssigned: false,
    visibility: {},
    assassinTargetId: null,
    winner: null,
    winReason: null,
    chat: []
  };
}

function updatePlayer(game: GameState, playerId: string, patch: Partial<Player>): GameState {
  return {
    ...game,
    players: game.players.map(p => (p.playerId === playerId ? { ...p, ...patch } : p))
  };
}

function cleanName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > 40) {
    throw new InvalidActionForPhaseError("BAD_NAME", "Names must be 1-40 characters");
  }
  return trimmed;
}

/** A human takes an unclaimed seat before the game starts. */
export function claimSeat(game: GameState, playerId: string, name: string): GameState {
  ensurePhase(game, "lobby", "Seats can only be claimed in the lobby");
  const player = assertPlayer(game, playerId);
  if (player.isBot) {
    throw new InvalidActionForPhaseError("SEAT_IS_BOT", "Bot seats cannot be claimed");
  }
  if (player.claimed) {
    throw new InvalidActionForPhaseError("SEAT_TAKEN", `Seat ${player.seat} is already claimed`);
  }
  return updatePlayer(game, playerId, { claimed: true, name: cleanName(name) });
}

/** Toggles the ready flag of a claimed human seat. */
export function setReady(game: GameState, playerId: string, ready: boolean): GameState {
  ensurePhase(game, "lobby", "Readiness only applies in the lobby");
  const player = assertPlayer(game, playerId);
  if (!player.claimed) {
    throw new InvalidActionForPhaseError("SEAT_NOT_CLAIMED", "Claim the seat before readying up");
  }
  return updatePlayer(game, playerId, { ready });
}

export function renamePlayer(game: GameState, playerId: string, name: string): GameState {
  ensurePhase(game, "lobby", "Players can only be renamed in the lobby");
  assertPlayer(game, playerId);
  return updatePlayer(game, playerId, { name: cleanName(name) });
}

/** One-time role deal: a uniform permutation of the configured roles over the seats. */
export function assignRoles(game: GameState, random: RandomFn = defaultRandom): GameState {
  ensurePhase(game, "lobby", "Roles are assigned from the lobby phase");
  if (game.rolesAssigned) return game;

  const dealt = shuffle(game.config.roles, random);
  const players = game.players.map((p, index) => ({ ...p, role: dealt[index] }));
  return { ...game, players, rolesAssigned: true, visibility: computeVisibility(players) };
}

/**
 * Lobby-only entry point: deals roles and opens the first proposal.
 * Leader starts at seat 0; the Lady token starts with the last seat.
 */
export function startGame(game: GameState, random: RandomFn = defaultRandom): GameState {
  ensurePhase(game, "lobby", "Game can only start in the lobby phase");
  const waiting = game.players.filter(p => !p.isBot && !(p.claimed && p.ready));
  if (waiting.length > 0) {
    throw new InvalidActionForPhaseError(
      "PLAYERS_NOT_READY",
      `Waiting for ${waiting.map(p => p.name).join(", ")}`
    );
  }

  const assigned = assignRoles(game, random);
  const ladyHolder = game.config.ladyOfLakeEnabled ? assigned.players[assigned.players.length - 1] : null;
  return {
    ...assigned,
    phase: "team_proposal",
    questNumber: 1,
    leaderIndex: 0,
    rejectionCount: 0,
    ladyHolderId: ladyHolder?.playerId ?? null,
    ladyPreviousHolders: ladyHolder ? [ladyHolder.playerId] : []
  };
}

export function currentLeader(game: GameState): Player {
  return game.players[game.leaderIndex];
}

/** True when the next proposal will skip the vote. */
export function isHammerArmed(game: GameState): boolean {
  return game.config.hammerAutoApprove && game.rejectionCount >= game.config.hammerThreshold;
}

// Own keys only: seat ids are arbitrary strings and may shadow Object.prototype members.
function hasBallot(votes: Record<string, boolean>, playerId: string): boolean {
  return Object.prototype.hasOwnProperty.call(votes, playerId);
}

function validateTeam(game: GameState, team: readonly string[]): void {
  const size = teamSize(game.players.length, game.questNumber);
  if (team.length !== size) {
    throw new InvalidTeamError("TEAM_SIZE", `Quest ${game.questNumber} needs a team of ${size}`);
  }
  if (new Set(team).size !== team.length) {
    throw new InvalidTeamError("DUPLICATE_MEMBER", "A player appears twice on the team");
  }
  const unknown = team.find(id => !getPlayer(game.players, id));
  if (unknown !== undefined) {
    throw new InvalidTeamError("UNKNOWN_MEMBER", `Player ${unknown} is not seated at this table`);
  }
}

/**
 * Leader submits a team. Moves to the team vote, or straight to the quest when
 * the hammer is armed.
 */
export function proposeTeam(game: GameState, leaderId: string, team: readonly string[]): GameState {
  ensurePhase(game, "team_proposal", "Teams can only be proposed during team proposal");
  const leader = assertPlayer(game, leaderId);
  if (leader.playerId !== currentLeader(game).playerId) {
    throw new InvalidActionForPhaseError("NOT_LEADER", "Only the current leader may propose a team");
  }
  validateTeam(game, team);

  const proposedTeam = [...team];
  if (isHammerArmed(game)) {
    const record: TeamVoteRecord = {
      questNumber: game.questNumber,
      leaderId: leader.playerId,
      team: proposedTeam,
      votes: {},
      approved: true,
      hammered: true
    };
    return {
      ...game,
      phase: "quest",
      proposedTeam,
      teamVotes: {},
      questVotes: {},
      rejectionCount: 0,
      voteHistory: [...game.voteHistory, record]
    };
  }

  return { ...game, phase: "team_vote", proposedTeam, teamVotes: {} };
}

/**
 * Records one approve/reject ballot. The tally runs exactly once, when the last
 * seated player has voted.
 */
export function recordTeamVote(game: GameState, voterId: string, approve: boolean): GameState {
  ensurePhase(game, "team_vote", "Team votes only apply during the team vote");
  const voter = assertPlayer(game, voterId);
  if (hasBallot(game.teamVotes, voter.playerId)) {
    throw new DuplicateVoteError(`${voter.name} already voted on this team`);
  }

  const updated: GameState = { ...game, teamVotes: { ...game.teamVotes, [voter.playerId]: approve } };
  if (Object.keys(updated.teamVotes).length < game.players.length) {
    return updated;
  }
  return resolveTeamVote(updated);
}

function resolveTeamVote(game: GameState): GameState {
  const outcome = tallyTeamVote(game.teamVotes);
  const record: TeamVoteRecord = {
    questNumber: game.questNumber,
    leaderId: currentLeader(game).playerId,
    team: game.proposedTeam,
    votes: game.teamVotes,
    approved: outcome.approved,
    hammered: false
  };
  const voteHistory = [...game.voteHistory, record];

  if (outcome.approved) {
    return { ...game, phase: "quest", teamVotes: {}, questVotes: {}, rejectionCount: 0, voteHistory };
  }
  return {
    ...game,
    phase: "team_proposal",
    proposedTeam: [],
    teamVotes: {},
    rejectionCount: game.rejectionCount + 1,
    leaderIndex: nextSeat(game.leaderIndex, game.players.length),
    voteHistory
  };
}

/**
 * Records a team member's success/fail card. Good-aligned players may only play
 * success. Resolves the quest when the last card is in.
 */
export function recordQuestVote(game: GameState, memberId: string, success: boolean): GameState {
  ensurePhase(game, "quest", "Quest cards only apply during a quest");
  const member = assertPlayer(game, memberId);
  if (!game.proposedTeam.includes(member.playerId)) {
    throw new InvalidActionForPhaseError("NOT_ON_TEAM", "Only team members play quest cards");
  }
  if (hasBallot(game.questVotes, member.playerId)) {
    throw new DuplicateVoteError(`${member.name} already played a quest card`);
  }
  if (!success && member.role && alignmentOf(member.role) === "good") {
    throw new InvalidActionForPhaseError("GOOD_MUST_SUCCEED", "Good players must play success");
  }

  const updated: GameState = { ...game, questVotes: { ...game.questVotes, [member.playerId]: success } };
  if (Object.keys(updated.questVotes).length < game.proposedTeam.length) {
    return updated;
  }
  return resolveQuest(updated);
}

/** Seats that may still receive the Lady: anyone who never held the token. */
export function eligibleLadyTargets(game: GameState): string[] {
  return game.players.map(p => p.playerId).filter(id => !game.ladyPreviousHolders.includes(id));
}

function ladyDue(game: GameState, resolvedQuest: number): boolean {
  return (
    game.config.ladyOfLakeEnabled &&
    game.ladyHolderId !== null &&
    LADY_QUESTS.includes(resolvedQuest) &&
    !game.ladyUsedAfterQuests.includes(resolvedQuest) &&
    eligibleLadyTargets(game).length > 0
  );
}

function resolveQuest(game: GameState): GameState {
  const playerCount = game.players.length;
  const outcome = tallyQuestVote(game.questVotes, requiredFails(playerCount, game.questNumber));
  const record: QuestRecord = {
    questNumber: game.questNumber,
    leaderId: currentLeader(game).playerId,
    team: game.proposedTeam,
    failVotes: outcome.fails,
    requiredFails: outcome.requiredFails,
    succeeded: outcome.succeeded
  };

  const base: GameState = {
    ...game,
    questHistory: [...game.questHistory, record],
    proposedTeam: [],
    teamVotes: {},
    questVotes: {},
    rejectionCount: 0,
    leaderIndex: nextSeat(game.leaderIndex, playerCount)
  };

  const winner = checkWin(base);
  if (winner) {
    return { ...base, phase: "game_over", winner, winReason: "QUESTS_FAILED" };
  }

  const next = goodReachedQuota(base) ? "assassination" : "team_proposal";
  const questNumber = next === "team_proposal" ? game.questNumber + 1 : game.questNumber;
  if (ladyDue(base, record.questNumber)) {
    return { ...base, questNumber, phase: "lady_of_lake", phaseAfterLady: next };
  }
  return { ...base, questNumber, phase: next };
}

/**
 * The Lady holder privately learns the target's true alignment, then hands the
 * token over. Play resumes where the quest resolution was heading.
 */
export function useLadyOfLake(game: GameState, holderId: string, targetId: string): GameState {
  ensurePhase(game, "lady_of_lake", "The Lady of the Lake can only be used in her phase");
  const holder = assertPlayer(game, holderId);
  if (holder.playerId !== game.ladyHolderId) {
    throw new InvalidActionForPhaseError("NOT_LADY_HOLDER", "Only the Lady holder may use her");
  }
  const target = assertPlayer(game, targetId);
  if (target.playerId === holder.playerId) {
    throw new InvalidActionForPhaseError("LADY_SELF", "The Lady cannot be used on yourself");
  }
  if (game.ladyPreviousHolders.includes(target.playerId)) {
    throw new InvalidActionForPhaseError("LADY_ALREADY_HELD", `${target.name} has already held the Lady`);
  }
  if (!target.role || !game.phaseAfterLady) {
    throw new GameRuleError("ROLES_NOT_ASSIGNED", "Lady of the Lake requires dealt roles");
  }

  const afterQuest = game.questHistory[game.questHistory.length - 1]?.questNumber ?? game.questNumber;
  return {
    ...game,
    phase: game.phaseAfterLady,
    phaseAfterLady: null,
    ladyHolderId: target.playerId,
    ladyPreviousHolders: [...game.ladyPreviousHolders, target.playerId],
    ladyUsedAfterQuests: [...game.ladyUsedAfterQuests, afterQuest],
    ladyHistory: [
      ...game.ladyHistory,
      { afterQuest, holderId: holder.playerId, targetId: target.playerId, alignment: alignmentOf(target.role) }
    ]
  };
}

/** The assassin names one player. Hitting the assassination target hands evil the win. */
export function assassinate(game: GameState, assassinId: string, targetId: string): GameState {
  ensurePhase(game, "assassination", "Assassination only happens after three successful quests");
  const assassin = assertPlayer(game, assassinId);
  if (!assassin.role || !getRole(assassin.role).canAssassinate) {
    throw new InvalidActionForPhaseError("NOT_ASSASSIN", "Only the assassin may strike");
  }
  const target = assertPlayer(game, targetId);
  if (target.playerId === assassin.playerId) {
    throw new InvalidActionForPhaseError("ASSASSIN_SELF", "The assassin cannot target themselves");
  }

  const hit = target.role !== null && getRole(target.role).assassinationTarget;
  return {
    ...game,
    phase: "game_over",
    assassinTargetId: target.playerId,
    winner: hit ? "evil" : "good",
    winReason: hit ? "MERLIN_ASSASSINATED" : "QUESTS_SUCCEEDED"
  };
}

/** Players whose action the current phase is waiting on, in seat order. */
export function pendingActors(game: GameState): string[] {
  switch (game.phase) {
    case "team_proposal":
      return [currentLeader(game).playerId];
    case "team_vote":
      return game.players.map(p => p.playerId).filter(id => !hasBallot(game.teamVotes, id));
    case "quest":
      return game.proposedTeam.filter(id => !hasBallot(game.questVotes, id));
    case "lady_of_lake":
      return game.ladyHolderId ? [game.ladyHolderId] : [];
    case "assassination":
      return game.players.filter(p => p.role && getRole(p.role).canAssassinate).map(p => p.playerId);
    case "lobby":
    case "game_over":
      return [];
    default: {
      const exhaustive: never = game.phase;
      throw new GameRuleError("INVALID_PHASE", `Unknown phase ${exhaustive}`);
    }
  }
}
