import { randomUUID } from "crypto";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { ZodError } from "zod";
import * as transitions from "../engine/transitions";
import {
  DuplicateVoteError,
  GameOverError,
  GameRuleError,
  UnknownPlayerError
} from "../engine/types";
import { seededRandom } from "../engine/utils";
import {
  ActionRequestSchema,
  ChatRequestSchema,
  ClaimSeatRequestSchema,
  CreateGameRequestSchema,
  EventsQuerySchema,
  ReadyRequestSchema,
  RenameRequestSchema
} from "../shared/messages";
import { createLogger } from "./logger";
import { GameSession, type GameSessionOptions } from "./session";
import type { GameStore } from "./store";

const log = createLogger("http");

export type SessionDefaults = Pick<GameSessionOptions, "botTimeoutMs" | "maxBotSteps" | "chatMaxLength" | "recentChat">;

/** HTTP status for a rule violation. Everything not listed is a plain 400. */
export function statusForError(err: GameRuleError): number {
  if (err instanceof UnknownPlayerError || err.code === "GAME_NOT_FOUND") return 404;
  if (err instanceof DuplicateVoteError || err.code === "DUPLICATE_GAME") return 409;
  if (err instanceof GameOverError) return 410;
  return 400;
}

// Express 4 does not forward rejected promises to the error middleware.
function route(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Request/poll API. Clients create a table, claim seats, start, then submit
 * actions and poll their view; no connection state is kept between requests.
 */
export function createHttpApp(store: GameStore, defaults: SessionDefaults = {}) {
  const app = express();
  app.use(express.json());

  /** Health check for load balancers. Returns process stats only. */
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", games: store.list().length, timestamp: Date.now() });
  });

  app.post(
    "/games",
    route((req, res) => {
      const body = CreateGameRequestSchema.parse(req.body);
      const game = transitions.createGame(randomUUID(), {
        players: body.players.map(p => ({ playerId: p.playerId ?? randomUUID(), name: p.name, isBot: p.isBot })),
        roles: body.roles,
        hammerAutoApprove: body.hammerAutoApprove,
        ladyOfLakeEnabled: body.ladyOfLakeEnabled,
        hammerThreshold: body.hammerThreshold
      });
      const random = body.seed === undefined ? undefined : seededRandom(body.seed);
      const session = store.create(new GameSession(game, { ...defaults, random }));
      log.info("Game created", { gameId: game.gameId, players: game.players.length, roles: game.config.roles });
      res.status(201).json({ gameId: game.gameId, state: session.publicView() });
    })
  );

  /** Public view, or the private view of `?playerId=`. */
  app.get(
    "/games/:gameId/state",
    route((req, res) => {
      const session = store.require(req.params.gameId);
      const playerId = queryString(req.query.playerId);
      res.json({ state: playerId ? session.privateView(playerId) : session.publicView() });
    })
  );

  /** Public event log; `?after=<seq>` returns only newer events. */
  app.get(
    "/games/:gameId/events",
    route((req, res) => {
      const session = store.require(req.params.gameId);
      const { after } = EventsQuerySchema.parse(req.query);
      res.json({ events: session.eventLog(after) });
    })
  );

  app.post(
    "/games/:gameId/players/:playerId/claim",
    route(async (req, res) => {
      const { name } = ClaimSeatRequestSchema.parse(req.body);
      const session = store.require(req.params.gameId);
      await session.claimSeat(req.params.playerId, name);
      res.json({ state: session.privateView(req.params.playerId) });
    })
  );

  app.post(
    "/games/:gameId/players/:playerId/ready",
    route(async (req, res) => {
      const { ready } = ReadyRequestSchema.parse(req.body ?? {});
      const session = store.require(req.params.gameId);
      await session.setReady(req.params.playerId, ready);
      res.json({ state: session.publicView() });
    })
  );

  app.post(
    "/games/:gameId/players/:playerId/rename",
    route(async (req, res) => {
      const { name } = RenameRequestSchema.parse(req.body);
      const session = store.require(req.params.gameId);
      await session.renamePlayer(req.params.playerId, name);
      res.json({ state: session.publicView() });
    })
  );

  app.post(
    "/games/:gameId/start",
    route(async (req, res) => {
      const session = store.require(req.params.gameId);
      await session.start();
      res.json({ state: session.publicView() });
    })
  );

  app.post(
    "/games/:gameId/actions",
    route(async (req, res) => {
      const body = ActionRequestSchema.parse(req.body);
      const session = store.require(req.params.gameId);
      await session.submit(body.playerId, body.actionType, body.payload);
      res.json({ state: session.privateView(body.playerId) });
    })
  );

  app.post(
    "/games/:gameId/chat",
    route(async (req, res) => {
      const body = ChatRequestSchema.parse(req.body);
      const session = store.require(req.params.gameId);
      await session.chat(body.playerId, body.text);
      res.json({ state: session.publicView() });
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof GameRuleError) {
      res.status(statusForError(err)).json({ error: { code: err.code, message: err.message } });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "BAD_JSON", message: "Invalid JSON payload" } });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ error: { code: "BAD_REQUEST", message: err.issues.map(i => i.message).join("; ") } });
      return;
    }
    log.error("Unhandled request error", { method: req.method, path: req.path, err });
    res.status(500).json({ error: { code: "SERVER_ERROR", message: "Internal error" } });
  });

  return app;
}
