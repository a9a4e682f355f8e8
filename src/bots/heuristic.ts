import type { GameAction } from "../engine/actions";
import { GameRuleError } from "../engine/types";
import { type RandomFn, defaultRandom, randomItem, shuffle } from "../engine/utils";
import type { PrivateState, PublicState } from "../shared/views";
import type { BotDecider } from "./types";

const EVIL_APPROVE_ODDS = 0.3;
const GOOD_APPROVE_ODDS = 0.4;
const EVIL_SABOTAGE_ODDS = 0.7;

/**
 * Rule-of-thumb player. Uses only what its private view reveals: good seats
 * reject teams carrying a known evil player, evil seats back teams with an ally
 * aboard and usually sabotage quests.
 */
export class HeuristicBot implements BotDecider {
  readonly kind = "heuristic";

  constructor(private random: RandomFn = defaultRandom) {}

  decide(table: PublicState, self: PrivateState): GameAction {
    const me = self.you.playerId;
    const knownEvil = new Set(self.sightings.filter(s => s.sighting === "evil").map(s => s.playerId));
    const isEvil = self.you.alignment === "evil";

    switch (table.phase) {
      case "team_proposal": {
        const size = table.requiredTeamSize ?? 0;
        const others = table.players.map(p => p.playerId).filter(id => id !== me);
        // Good leaders leave known evil off the team whenever enough seats remain.
        const trusted = isEvil ? others : others.filter(id => !knownEvil.has(id));
        const pool = trusted.length >= size - 1 ? trusted : others;
        return { type: "propose_team", payload: { team: [me, ...shuffle(pool, this.random).slice(0, size - 1)] } };
      }
      case "team_vote": {
        const onTeam = table.proposedTeam.includes(me);
        const allyAboard = table.proposedTeam.some(id => knownEvil.has(id));
        const approve = isEvil
          ? onTeam || allyAboard || this.random() < EVIL_APPROVE_ODDS
          : !allyAboard && (onTeam || table.hammerArmed || this.random() < GOOD_APPROVE_ODDS);
        return { type: "vote_team", payload: { approve } };
      }
      case "quest":
        return { type: "quest_vote", payload: { success: isEvil ? this.random() >= EVIL_SABOTAGE_ODDS : true } };
      case "lady_of_lake":
        return { type: "lady_peek", payload: { targetId: randomItem(table.ladyEligibleTargets, this.random) } };
      case "assassination": {
        const suspects = table.players.map(p => p.playerId).filter(id => id !== me && !knownEvil.has(id));
        return { type: "assassinate", payload: { targetId: randomItem(suspects, this.random) } };
      }
      default:
        throw new GameRuleError("NOTHING_TO_DECIDE", `No decision is due during ${table.phase}`);
    }
  }
}
