import { EventEmitter } from "events";
import { submitAction } from "../engine/actions";
import * as transitions from "../engine/transitions";
import { BotTimeoutError, GameRuleError, type GameState, type Player } from "../engine/types";
import { type RandomFn, defaultRandom, nowMs } from "../engine/utils";
import { fallbackAction } from "../bots/fallback";
import { HeuristicBot } from "../bots/heuristic";
import type { BotDecider } from "../bots/types";
import { buildPrivateView, buildPublicView, type PrivateState, type PublicState } from "../shared/views";
import { postChatMessage } from "./chat";
import { type GameEvent, type GameEventBody, describeTransition } from "./events";
import { createLogger } from "./logger";

const log = createLogger("session");

export interface GameSessionOptions {
  /** Upper bound for a single bot decision. Non-positive disables the bound. */
  botTimeoutMs?: number;
  /** Bot actions run after one mutation before the session yields. */
  maxBotSteps?: number;
  random?: RandomFn;
  /** Explicit deciders by seat id; other bot seats get `createBot`. */
  bots?: Record<string, BotDecider>;
  createBot?: (player: Player) => BotDecider;
  chatMaxLength?: number;
  recentChat?: number;
  now?: () => number;
}

const DEFAULTS = {
  botTimeoutMs: 120_000,
  maxBotSteps: 500
};

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => reject(onTimeout()), timeoutMs);
    })
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

/**
 * Owns one game's mutable state.
 * - Every mutation runs through a single promise queue, so transitions never interleave.
 * - Reads return the current snapshot; snapshots are immutable, so a reader never
 *   observes a half-applied transition.
 * - Bot seats are driven from inside the same queued task, each decision bounded by
 *   `botTimeoutMs` and replaced by a fallback action when it fails.
 */
export class GameSession {
  private state: GameState;
  private queue: Promise<unknown> = Promise.resolve();
  private changes = new EventEmitter();
  private history: GameEvent[] = [];
  private bots = new Map<string, BotDecider>();
  private random: RandomFn;
  private botTimeoutMs: number;
  private maxBotSteps: number;
  private now: () => number;

  constructor(initial: GameState, private options: GameSessionOptions = {}) {
    this.state = initial;
    this.random = options.random ?? defaultRandom;
    this.botTimeoutMs = options.botTimeoutMs ?? DEFAULTS.botTimeoutMs;
    this.maxBotSteps = options.maxBotSteps ?? DEFAULTS.maxBotSteps;
    this.now = options.now ?? nowMs;

    this.record([{ type: "game_created", playerCount: initial.players.length }]);

    const createBot = options.createBot ?? (() => new HeuristicBot(this.random));
    for (const player of initial.players) {
      if (!player.isBot) continue;
      const explicit = options.bots && Object.prototype.hasOwnProperty.call(options.bots, player.playerId)
        ? options.bots[player.playerId]
        : undefined;
      this.bots.set(player.playerId, explicit ?? createBot(player));
    }
  }

  get gameId(): string {
    return this.state.gameId;
  }

  snapshot(): GameState {
    return this.state;
  }

  publicView(): PublicState {
    return buildPublicView(this.state, this.options.recentChat);
  }

  privateView(playerId: string): PrivateState {
    return buildPrivateView(this.state, playerId, this.options.recentChat);
  }

  /** Subscribes to committed snapshots. Returns the unsubscribe function. */
  onChange(listener: (game: GameState) => void): () => void {
    this.changes.on("change", listener);
    return () => {
      this.changes.off("change", listener);
    };
  }

  /** Public event log, oldest first. `afterSeq` skips events already seen. */
  eventLog(afterSeq = 0): GameEvent[] {
    return this.history.filter(event => event.seq > afterSeq).map(event => structuredClone(event));
  }

  claimSeat(playerId: string, name: string): Promise<GameState> {
    return this.exclusive(() => this.commit(transitions.claimSeat(this.state, playerId, name)));
  }

  setReady(playerId: string, ready: boolean): Promise<GameState> {
    return this.exclusive(() => this.commit(transitions.setReady(this.state, playerId, ready)));
  }

  renamePlayer(playerId: string, name: string): Promise<GameState> {
    return this.exclusive(() => this.commit(transitions.renamePlayer(this.state, playerId, name)));
  }

  start(): Promise<GameState> {
    return this.exclusive(async () => {
      this.commit(transitions.startGame(this.state, this.random));
      log.info("Game started", { gameId: this.gameId, players: this.state.players.length });
      await this.runBots();
      return this.state;
    });
  }

  /**
   * Applies one human action and then lets any bots that are now due act.
   * A rejected action throws and leaves the state exactly as it was.
   */
  submit(playerId: string, actionType: string, payload: unknown): Promise<GameState> {
    return this.exclusive(async () => {
      this.commit(submitAction(this.state, playerId, actionType, payload));
      log.debug("Action applied", { gameId: this.gameId, playerId, actionType });
      await this.runBots();
      return this.state;
    });
  }

  chat(playerId: string, text: string): Promise<GameState> {
    return this.exclusive(() =>
      this.commit(postChatMessage(this.state, playerId, text, this.now(), this.options.chatMaxLength))
    );
  }

  /** Single-consumer queue: each task starts after the previous one settled. */
  private exclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private commit(next: GameState): GameState {
    if (next === this.state) return next;
    const previous = this.state;
    this.state = next;
    if (previous.phase !== next.phase) {
      log.info("Phase changed", { gameId: next.gameId, from: previous.phase, to: next.phase, quest: next.questNumber });
    }
    if (next.winner && !previous.winner) {
      log.info("Game over", { gameId: next.gameId, winner: next.winner, reason: next.winReason });
    }
    this.record(describeTransition(previous, next));
    this.changes.emit("change", next);
    return next;
  }

  private record(bodies: GameEventBody[]): void {
    for (const body of bodies) {
      this.history.push({ ...body, seq: this.history.length + 1, timestamp: this.now() });
    }
  }

  private async runBots(): Promise<void> {
    for (let step = 0; step < this.maxBotSteps; step++) {
      const botId = transitions.pendingActors(this.state).find(id => this.bots.has(id));
      if (!botId) return;
      const acted = await this.actForBot(botId);
      if (!acted) return;
    }
    log.warn("Bot step budget exhausted", { gameId: this.gameId, maxBotSteps: this.maxBotSteps });
  }

  /** Runs one bot decision. Returns false when even the fallback could not be applied. */
  private async actForBot(playerId: string): Promise<boolean> {
    const bot = this.bots.get(playerId);
    if (!bot) return false;
    const table = this.publicView();
    const self = this.privateView(playerId);

    let action: unknown;
    try {
      action = await withTimeout(
        Promise.resolve().then(() => bot.decide(table, self)),
        this.botTimeoutMs,
        () => new BotTimeoutError(playerId, this.botTimeoutMs)
      );
    } catch (err) {
      if (err instanceof BotTimeoutError) {
        log.warn("Bot timed out, using fallback", { gameId: this.gameId, playerId, timeoutMs: this.botTimeoutMs });
      } else {
        log.error("Bot decision failed, using fallback", { gameId: this.gameId, playerId, err });
      }
      action = fallbackAction(self);
    }

    try {
      this.commit(this.applyBotAction(playerId, action));
      return true;
    } catch (err) {
      if (!(err instanceof GameRuleError)) throw err;
      log.warn("Bot action rejected, using fallback", { gameId: this.gameId, playerId, code: err.code });
    }

    try {
      const fallback = fallbackAction(self);
      this.commit(submitAction(this.state, playerId, fallback.type, fallback.payload));
      return true;
    } catch (err) {
      if (!(err instanceof GameRuleError)) throw err;
      log.error("Fallback action rejected; bots paused", { gameId: this.gameId, playerId, code: err.code });
      return false;
    }
  }

  // Bot output is parsed exactly like a client request.
  private applyBotAction(playerId: string, action: unknown): GameState {
    if (typeof action !== "object" || action === null || !("type" in action) || typeof action.type !== "string") {
      throw new GameRuleError("INVALID_PAYLOAD", "Bot returned a malformed action");
    }
    const payload = "payload" in action ? action.payload : undefined;
    return submitAction(this.state, playerId, action.type, payload);
  }
}
