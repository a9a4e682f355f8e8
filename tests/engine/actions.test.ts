import { describe, it, expect } from "vitest";
import { ACTION_TYPES, parseAction, submitAction } from "../../src/engine/actions";
import { GameOverError, InvalidActionForPhaseError, UnknownPlayerError, type GameState } from "../../src/engine/types";
import { FIVE_ROLES, dealt, readyLobby, ruleCode } from "../fixtures";

describe("parseAction", () => {
  it("knows every action type", () => {
    expect(ACTION_TYPES).toEqual(["propose_team", "vote_team", "quest_vote", "lady_peek", "assassinate"]);
  });

  it("returns the typed action", () => {
    expect(parseAction("vote_team", { approve: false })).toEqual({ type: "vote_team", payload: { approve: false } });
  });

  it("rejects unknown types and malformed payloads", () => {
    expect(() => parseAction("dance", {})).toThrowError(InvalidActionForPhaseError);
    expect(ruleCode(() => parseAction("vote_team", { approve: "yes" }))).toBe("INVALID_PAYLOAD");
    expect(() => parseAction("propose_team", { team: "p1" })).toThrowError(/Malformed propose_team action at payload.team/);
  });
});

describe("submitAction", () => {
  const game = dealt(FIVE_ROLES);

  it("applies a valid action and leaves the input untouched", () => {
    const next = submitAction(game, "p1", "propose_team", { team: ["p1", "p2"] });
    expect(next.phase).toBe("team_vote");
    expect(game.phase).toBe("team_proposal");
    expect(game.proposedTeam).toEqual([]);
  });

  it("refuses actions before the game starts", () => {
    expect(ruleCode(() => submitAction(readyLobby(5), "p1", "vote_team", { approve: true }))).toBe("INVALID_PHASE");
  });

  it("refuses unknown players before parsing", () => {
    expect(() => submitAction(game, "ghost", "dance", {})).toThrowError(UnknownPlayerError);
  });

  it("refuses an action for the wrong phase", () => {
    expect(ruleCode(() => submitAction(game, "p1", "vote_team", { approve: true }))).toBe("INVALID_PHASE");
  });

  it("answers every action with GameOverError once the game ended", () => {
    const over: GameState = { ...game, phase: "game_over", winner: "evil", winReason: "QUESTS_FAILED" };
    expect(() => submitAction(over, "p1", "vote_team", { approve: true })).toThrowError(GameOverError);
    expect(ruleCode(() => submitAction(over, "ghost", "dance", null))).toBe("GAME_OVER");
  });
});
