import { majorityThreshold } from "./utils";

export interface TeamVoteOutcome {
  approvals: number;
  rejections: number;
  approved: boolean;
}

export interface QuestVoteOutcome {
  successes: number;
  fails: number;
  requiredFails: number;
  succeeded: boolean;
}

/** Approved iff strictly more than half of the ballots approve; ties reject. */
export function tallyTeamVote(votes: Readonly<Record<string, boolean>>): TeamVoteOutcome {
  const ballots = Object.values(votes);
  const approvals = ballots.filter(Boolean).length;
  return {
    approvals,
    rejections: ballots.length - approvals,
    approved: ballots.length > 0 && approvals >= majorityThreshold(ballots.length)
  };
}

/** The quest fails once the fail cards reach `requiredFails`. */
export function tallyQuestVote(
  votes: Readonly<Record<string, boolean>>,
  requiredFails: number
): QuestVoteOutcome {
  const ballots = Object.values(votes);
  const fails = ballots.filter(success => !success).length;
  return {
    successes: ballots.length - fails,
    fails,
    requiredFails,
    succeeded: fails < requiredFails
  };
}
