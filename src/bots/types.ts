import type { GameAction } from "../engine/actions";
import type { PrivateState, PublicState } from "../shared/views";

/**
 * The only capability the engine needs from an automated seat. Implementations
 * may be synchronous (heuristics) or slow and remote (model-backed); the session
 * bounds every call with a timeout either way.
 */
export interface BotDecider {
  readonly kind: string;
  decide(table: PublicState, self: PrivateState): GameAction | Promise<GameAction>;
}
