import type { GameAction } from "../engine/actions";
import { GameRuleError } from "../engine/types";
import type { PrivateState } from "../shared/views";

/**
 * Deterministic action that is always legal for the viewer's pending decision.
 * Applied when a bot times out, throws, or answers with an illegal action.
 */
export function fallbackAction(self: PrivateState): GameAction {
  const me = self.you.playerId;
  switch (self.phase) {
    case "team_proposal": {
      const size = self.requiredTeamSize ?? 0;
      const seat = self.players.findIndex(p => p.playerId === me);
      const clockwise = [...self.players.slice(seat), ...self.players.slice(0, seat)];
      return { type: "propose_team", payload: { team: clockwise.slice(0, size).map(p => p.playerId) } };
    }
    case "team_vote":
      return { type: "vote_team", payload: { approve: true } };
    case "quest":
      return { type: "quest_vote", payload: { success: true } };
    case "lady_of_lake": {
      const [targetId] = self.ladyEligibleTargets;
      if (!targetId) {
        throw new GameRuleError("NO_LADY_TARGET", "No eligible Lady of the Lake target");
      }
      return { type: "lady_peek", payload: { targetId } };
    }
    case "assassination": {
      const target = self.players.find(p => p.playerId !== me);
      if (!target) {
        throw new GameRuleError("NO_TARGET", "No assassination target available");
      }
      return { type: "assassinate", payload: { targetId: target.playerId } };
    }
    default:
      throw new GameRuleError("NOTHING_TO_DECIDE", `No decision is due during ${self.phase}`);
  }
}
