import { z } from "zod";
import type { PrivateState, PublicState } from "./views";

const playerId = z.string().min(1);
const gameId = z.string().min(1);

/** POST /games. Seat ids are generated server-side unless supplied. */
export const CreateGameRequestSchema = z.object({
  players: z
    .array(
      z.object({
        playerId: playerId.optional(),
        name: z.string().trim().min(1).max(40),
        isBot: z.boolean().default(false)
      })
    )
    .min(1),
  roles: z.array(z.string()).optional(),
  hammerAutoApprove: z.boolean().optional(),
  ladyOfLakeEnabled: z.boolean().optional(),
  hammerThreshold: z.number().int().positive().optional(),
  /** Seeds role dealing and heuristic bots for a replayable game. */
  seed: z.number().int().optional()
});

export const ClaimSeatRequestSchema = z.object({ name: z.string() });

export const RenameRequestSchema = ClaimSeatRequestSchema;

export const ReadyRequestSchema = z.object({ ready: z.boolean().default(true) });

/** POST /games/:gameId/actions. The payload shape is checked by the engine per action type. */
export const ActionRequestSchema = z.object({
  playerId,
  actionType: z.string().min(1),
  payload: z.unknown()
});

/** GET /games/:gameId/events. Clients pass the last `seq` they saw. */
export const EventsQuerySchema = z.object({ after: z.coerce.number().int().nonnegative().default(0) });

export const ChatRequestSchema = z.object({ playerId, text: z.string() });

export type CreateGameRequest = z.infer<typeof CreateGameRequestSchema>;

/**
 * Messages a client may send over the state stream. The stream is read-only:
 * all game actions go through HTTP.
 */
export const ClientMessageSchema = z.discriminatedUnion("type", [
  /** Start receiving views of a game; with a player id the views are private. */
  z.object({ type: z.literal("SUBSCRIBE"), payload: z.object({ gameId, playerId: playerId.optional() }) }),
  z.object({ type: z.literal("UNSUBSCRIBE"), payload: z.object({}).optional() })
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/** Messages emitted by the server over the state stream. */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "STATE"; payload: { game: PublicState | PrivateState } };
