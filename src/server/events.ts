import { tallyTeamVote } from "../engine/tally";
import { currentLeader } from "../engine/transitions";
import type { GameState, WinReason, Winner } from "../engine/types";

/**
 * Public table history. Only facts every seat is entitled to appear here:
 * resolved votes and quest fail counts, never individual quest cards, Lady
 * results or ballots still being collected.
 */
export type GameEventBody =
  | { type: "game_created"; playerCount: number }
  | { type: "game_started"; leaderId: string }
  | { type: "team_proposed"; questNumber: number; leaderId: string; team: string[] }
  | { type: "team_hammered"; questNumber: number; team: string[] }
  | { type: "team_approved"; questNumber: number; approvals: number; rejections: number; votes: Record<string, boolean> }
  | {
      type: "team_rejected";
      questNumber: number;
      approvals: number;
      rejections: number;
      votes: Record<string, boolean>;
      rejectionCount: number;
    }
  | { type: "quest_resolved"; questNumber: number; team: string[]; failVotes: number; succeeded: boolean }
  | { type: "lady_peek"; afterQuest: number; holderId: string; targetId: string }
  | { type: "assassination"; targetId: string }
  | { type: "game_over"; winner: Winner; reason: WinReason | null };

export type GameEventType = GameEventBody["type"];

export type GameEvent = GameEventBody & { seq: number; timestamp: number };

/** Events implied by one committed transition, in the order they happened. */
export function describeTransition(previous: GameState, next: GameState): GameEventBody[] {
  const events: GameEventBody[] = [];

  if (previous.phase === "lobby" && next.phase !== "lobby") {
    events.push({ type: "game_started", leaderId: currentLeader(next).playerId });
  }

  if (previous.phase === "team_proposal" && next.phase === "team_vote") {
    events.push({
      type: "team_proposed",
      questNumber: next.questNumber,
      leaderId: currentLeader(next).playerId,
      team: [...next.proposedTeam]
    });
  }

  for (const record of next.voteHistory.slice(previous.voteHistory.length)) {
    if (record.hammered) {
      const team = [...record.team];
      events.push({ type: "team_proposed", questNumber: record.questNumber, leaderId: record.leaderId, team });
      events.push({ type: "team_hammered", questNumber: record.questNumber, team: [...team] });
      continue;
    }
    const { approvals, rejections, approved } = tallyTeamVote(record.votes);
    const votes = { ...record.votes };
    events.push(
      approved
        ? { type: "team_approved", questNumber: record.questNumber, approvals, rejections, votes }
        : {
            type: "team_rejected",
            questNumber: record.questNumber,
            approvals,
            rejections,
            votes,
            rejectionCount: next.rejectionCount
          }
    );
  }

  for (const quest of next.questHistory.slice(previous.questHistory.length)) {
    events.push({
      type: "quest_resolved",
      questNumber: quest.questNumber,
      team: [...quest.team],
      failVotes: quest.failVotes,
      succeeded: quest.succeeded
    });
  }

  for (const peek of next.ladyHistory.slice(previous.ladyHistory.length)) {
    events.push({ type: "lady_peek", afterQuest: peek.afterQuest, holderId: peek.holderId, targetId: peek.targetId });
  }

  if (previous.assassinTargetId === null && next.assassinTargetId !== null) {
    events.push({ type: "assassination", targetId: next.assassinTargetId });
  }

  if (!previous.winner && next.winner) {
    events.push({ type: "game_over", winner: next.winner, reason: next.winReason });
  }

  return events;
}
