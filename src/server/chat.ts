import { InvalidActionForPhaseError, type GameState, type Player } from "../engine/types";
import { assertPlayer } from "../engine/transitions";

export type ChatChannel = "LOBBY" | "TABLE" | "POST_GAME";

export const DEFAULT_CHAT_MAX_LENGTH = 300;

/**
 * Determines which channel a message lands in for the current phase.
 * Everyone seated may talk in every phase; in the lobby only claimed seats speak.
 */
export function resolveChatChannel(game: GameState, sender: Player): ChatChannel {
  switch (game.phase) {
    case "lobby":
      if (!sender.claimed) {
        throw new InvalidActionForPhaseError("INVALID_CHAT", "Claim a seat before chatting");
      }
      return "LOBBY";
    case "team_proposal":
    case "team_vote":
    case "quest":
    case "lady_of_lake":
    case "assassination":
      return "TABLE";
    case "game_over":
      return "POST_GAME";
    default: {
      const exhaustive: never = game.phase;
      throw new InvalidActionForPhaseError("INVALID_CHAT", `Chat not available during ${exhaustive}`);
    }
  }
}

/** Appends one message to the append-only chat log. */
export function postChatMessage(
  game: GameState,
  playerId: string,
  rawText: string,
  now: number,
  maxLength = DEFAULT_CHAT_MAX_LENGTH
): GameState {
  const sender = assertPlayer(game, playerId);
  resolveChatChannel(game, sender);

  const text = rawText.trim();
  if (text.length === 0 || text.length > maxLength) {
    throw new InvalidActionForPhaseError("BAD_TEXT", `Chat must be 1-${maxLength} characters`);
  }
  return { ...game, chat: [...game.chat, { playerId: sender.playerId, text, timestamp: now }] };
}
