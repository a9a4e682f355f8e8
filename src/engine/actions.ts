import { z } from "zod";
import { InvalidActionForPhaseError, type GameState } from "./types";
import * as transitions from "./transitions";

const playerIdSchema = z.string().min(1);

/** Every in-game action, tagged by `type`. Shape is checked here; phase and actor in transitions. */
export const GameActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("propose_team"), payload: z.object({ team: z.array(playerIdSchema) }) }),
  z.object({ type: z.literal("vote_team"), payload: z.object({ approve: z.boolean() }) }),
  z.object({ type: z.literal("quest_vote"), payload: z.object({ success: z.boolean() }) }),
  z.object({ type: z.literal("lady_peek"), payload: z.object({ targetId: playerIdSchema }) }),
  z.object({ type: z.literal("assassinate"), payload: z.object({ targetId: playerIdSchema }) })
]);

export type GameAction = z.infer<typeof GameActionSchema>;
export type ActionType = GameAction["type"];

export const ACTION_TYPES: readonly ActionType[] = GameActionSchema.options.map(o => o.shape.type.value);

/** Parses an untrusted action, throwing InvalidActionForPhaseError on a bad shape. */
export function parseAction(actionType: string, payload: unknown): GameAction {
  const parsed = GameActionSchema.safeParse({ type: actionType, payload });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new InvalidActionForPhaseError(
      "INVALID_PAYLOAD",
      `Malformed ${actionType} action${where}: ${issue?.message ?? "invalid input"}`
    );
  }
  return parsed.data;
}

/** Applies an already parsed action. */
export function applyAction(game: GameState, playerId: string, action: GameAction): GameState {
  switch (action.type) {
    case "propose_team":
      return transitions.proposeTeam(game, playerId, action.payload.team);
    case "vote_team":
      return transitions.recordTeamVote(game, playerId, action.payload.approve);
    case "quest_vote":
      return transitions.recordQuestVote(game, playerId, action.payload.success);
    case "lady_peek":
      return transitions.useLadyOfLake(game, playerId, action.payload.targetId);
    case "assassinate":
      return transitions.assassinate(game, playerId, action.payload.targetId);
    default: {
      const exhaustive: never = action;
      throw new InvalidActionForPhaseError("INVALID_TYPE", `Unknown action ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Transport-facing entry point: one atomic transition from an untrusted request.
 * Returns a new snapshot or throws a GameRuleError; the input state is never touched.
 */
export function submitAction(
  game: GameState,
  playerId: string,
  actionType: string,
  payload: unknown
): GameState {
  transitions.ensurePhase(
    game,
    ["team_proposal", "team_vote", "quest", "lady_of_lake", "assassination"],
    "The game has not started yet"
  );
  transitions.assertPlayer(game, playerId);
  return applyAction(game, playerId, parseAction(actionType, payload));
}
