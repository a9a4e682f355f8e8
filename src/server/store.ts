import { GameRuleError } from "../engine/types";
import type { GameSession } from "./session";

/**
 * Extremely small in-memory session registry.
 * The HTTP and WS layers both treat it as the single source of truth per process;
 * sessions share nothing, so no lock spans more than one game.
 */
export class GameStore {
  private sessions = new Map<string, GameSession>();

  /** Inserts a brand new session, throwing if the ID already exists. */
  create(session: GameSession): GameSession {
    if (this.sessions.has(session.gameId)) {
      throw new GameRuleError("DUPLICATE_GAME", `Game ${session.gameId} already exists`);
    }
    this.sessions.set(session.gameId, session);
    return session;
  }

  /** Fetches a session by ID or undefined when missing. */
  get(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  /** Like `get`, but missing games are a client error. */
  require(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) {
      throw new GameRuleError("GAME_NOT_FOUND", `Game ${gameId} not found`);
    }
    return session;
  }

  /** Removes a game entirely (used when cleaning up finished games). */
  delete(gameId: string): void {
    this.sessions.delete(gameId);
  }

  /** Returns all sessions, useful for diagnostics. */
  list(): GameSession[] {
    return Array.from(this.sessions.values());
  }
}
