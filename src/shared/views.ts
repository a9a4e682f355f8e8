import type {
  Alignment,
  ChatMessage,
  GameState,
  LadyPeek,
  Phase,
  QuestRecord,
  RoleName,
  Sighting,
  TeamVoteRecord,
  WinReason,
  Winner
} from "../engine/types";
import { UnknownPlayerError } from "../engine/types";
import { alignmentOf, getRole } from "../engine/roles";
import { teamSize } from "../engine/rules";
import { currentLeader, eligibleLadyTargets, isHammerArmed, pendingActors } from "../engine/transitions";
import { questScore } from "../engine/win";

/** Public info exposed to every viewer, with all secret info stripped. */
export interface PublicPlayerView {
  playerId: string;
  name: string;
  isBot: boolean;
  seat: number;
  claimed: boolean;
  ready: boolean;
}

/** Who used the Lady on whom; the result itself stays private. */
export interface PublicLadyUse {
  afterQuest: number;
  holderId: string;
  targetId: string;
}

/** Table state every client may poll. Contains no roles or alignments until the game is over. */
export interface PublicState {
  gameId: string;
  phase: Phase;
  questNumber: number;
  leaderId: string | null;
  players: PublicPlayerView[];
  rules: {
    roles: RoleName[];
    hammerAutoApprove: boolean;
    ladyOfLakeEnabled: boolean;
    hammerThreshold: number;
  };
  requiredTeamSize: number | null;
  proposedTeam: string[];
  /** Only who has voted, never how, until the vote resolves. */
  teamVotesCast: string[];
  questVotesCast: string[];
  rejectionCount: number;
  hammerArmed: boolean;
  questHistory: QuestRecord[];
  voteHistory: TeamVoteRecord[];
  score: { successes: number; fails: number };
  ladyHolderId: string | null;
  ladyEligibleTargets: string[];
  ladyHistory: PublicLadyUse[];
  waitingOn: string[];
  assassinTargetId: string | null;
  winner: Winner | null;
  winReason: WinReason | null;
  /** Filled only once the game is over. */
  revealedRoles: Record<string, RoleName> | null;
  chat: ChatMessage[];
}

export interface SightingView {
  playerId: string;
  name: string;
  sighting: Sighting;
}

/** A player's private view extends the public shape with their own hidden knowledge. */
export interface PrivateState extends PublicState {
  you: {
    playerId: string;
    name: string;
    role: RoleName | null;
    roleLabel: string | null;
    alignment: Alignment | null;
  };
  sightings: SightingView[];
  ladyPeeks: LadyPeek[];
  /** Whether the current phase is waiting on this viewer. */
  yourTurn: boolean;
}

function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function revealRoles(game: GameState): Record<string, RoleName> | null {
  if (game.phase !== "game_over") return null;
  return Object.fromEntries(
    game.players.flatMap(p => (p.role ? [[p.playerId, p.role] as const] : []))
  );
}

/** Builds the redacted table view shared by every client. Nothing in it aliases the game state. */
export function buildPublicView(game: GameState, recentChat?: number): PublicState {
  const inPlay = game.phase !== "lobby" && game.phase !== "game_over";
  return {
    gameId: game.gameId,
    phase: game.phase,
    questNumber: game.questNumber,
    leaderId: game.rolesAssigned ? currentLeader(game).playerId : null,
    players: game.players.map(p => ({
      playerId: p.playerId,
      name: p.name,
      isBot: p.isBot,
      seat: p.seat,
      claimed: p.claimed,
      ready: p.ready
    })),
    rules: {
      roles: [...game.config.roles],
      hammerAutoApprove: game.config.hammerAutoApprove,
      ladyOfLakeEnabled: game.config.ladyOfLakeEnabled,
      hammerThreshold: game.config.hammerThreshold
    },
    requiredTeamSize: inPlay ? teamSize(game.players.length, game.questNumber) : null,
    proposedTeam: [...game.proposedTeam],
    teamVotesCast: Object.keys(game.teamVotes),
    questVotesCast: Object.keys(game.questVotes),
    rejectionCount: game.rejectionCount,
    hammerArmed: isHammerArmed(game),
    questHistory: game.questHistory.map(q => ({ ...q, team: [...q.team] })),
    voteHistory: game.voteHistory.map(v => ({ ...v, team: [...v.team], votes: { ...v.votes } })),
    score: questScore(game.questHistory),
    ladyHolderId: game.ladyHolderId,
    ladyEligibleTargets: game.phase === "lady_of_lake" ? eligibleLadyTargets(game) : [],
    ladyHistory: game.ladyHistory.map(({ afterQuest, holderId, targetId }) => ({ afterQuest, holderId, targetId })),
    // Naming the pending assassin would out a hidden role.
    waitingOn: game.phase === "assassination" ? [] : pendingActors(game),
    assassinTargetId: game.assassinTargetId,
    winner: game.winner,
    winReason: game.winReason,
    revealedRoles: revealRoles(game),
    chat: (recentChat === undefined ? game.chat : game.chat.slice(-recentChat)).map(m => ({ ...m }))
  };
}

/**
 * Builds a per-player view: the public table plus the viewer's own role, the
 * sightings dealt to them and the Lady results they personally received.
 */
export function buildPrivateView(game: GameState, viewerId: string, recentChat?: number): PrivateState {
  const viewer = game.players.find(p => p.playerId === viewerId);
  if (!viewer) {
    throw new UnknownPlayerError(viewerId);
  }

  const seen = ownEntry(game.visibility, viewer.playerId) ?? {};
  const sightings: SightingView[] = game.players
    .filter(p => p.playerId !== viewer.playerId)
    .map(p => ({ playerId: p.playerId, name: p.name, sighting: ownEntry(seen, p.playerId) ?? "unknown" }));

  return {
    ...buildPublicView(game, recentChat),
    you: {
      playerId: viewer.playerId,
      name: viewer.name,
      role: viewer.role,
      roleLabel: viewer.role ? getRole(viewer.role).label : null,
      alignment: viewer.role ? alignmentOf(viewer.role) : null
    },
    sightings,
    ladyPeeks: game.ladyHistory.filter(peek => peek.holderId === viewer.playerId).map(peek => ({ ...peek })),
    yourTurn: pendingActors(game).includes(viewer.playerId)
  };
}
