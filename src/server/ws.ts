import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { GameRuleError, type GameState } from "../engine/types";
import { ClientMessageSchema, type ServerMessage } from "../shared/messages";
import { createLogger } from "./logger";
import type { GameStore } from "./store";

const log = createLogger("ws");

interface Subscription {
  gameId: string;
  playerId: string | null;
  unsubscribe: () => void;
}

/**
 * Read-only push channel next to the request/poll API:
 * - binds each socket to at most one game (and optionally one seat),
 * - re-sends that socket's view after every committed change,
 * - never accepts game actions; those go through HTTP.
 */
export class StateStreamGateway {
  private subscriptions = new Map<WebSocket, Subscription>();

  constructor(private store: GameStore) {}

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): WebSocketServer {
    const wss = new WebSocketServer({ server, path: "/stream" });
    wss.on("connection", socket => {
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.detach(socket));
      socket.on("error", err => log.error("WebSocket error", { err }));
    });
    return wss;
  }

  /** Parses an incoming payload and dispatches typed client messages. */
  private handleMessage(socket: WebSocket, raw: string): void {
    try {
      const parsed = ClientMessageSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.sendError(socket, "INVALID_TYPE", "Unknown or malformed message");
        return;
      }
      const msg = parsed.data;
      switch (msg.type) {
        case "SUBSCRIBE":
          this.subscribe(socket, msg.payload.gameId, msg.payload.playerId ?? null);
          break;
        case "UNSUBSCRIBE":
          this.detach(socket);
          break;
      }
    } catch (err) {
      if (err instanceof SyntaxError) {
        this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      } else if (err instanceof GameRuleError) {
        this.sendError(socket, err.code, err.message);
      } else {
        log.error("Unexpected stream error", { err });
        this.sendError(socket, "SERVER_ERROR", "Unexpected error");
      }
    }
  }

  private subscribe(socket: WebSocket, gameId: string, playerId: string | null): void {
    const session = this.store.require(gameId);
    this.detach(socket);
    // Validates the seat before anything is registered.
    const first = playerId ? session.privateView(playerId) : session.publicView();

    const unsubscribe = session.onChange(game => this.push(socket, game));
    this.subscriptions.set(socket, { gameId, playerId, unsubscribe });
    this.send(socket, { type: "STATE", payload: { game: first } });
  }

  /** Removes socket bookkeeping; safe to call more than once. */
  private detach(socket: WebSocket): void {
    const sub = this.subscriptions.get(socket);
    if (!sub) return;
    sub.unsubscribe();
    this.subscriptions.delete(socket);
  }

  private push(socket: WebSocket, game: GameState): void {
    const sub = this.subscriptions.get(socket);
    const session = sub ? this.store.get(sub.gameId) : undefined;
    if (!sub || !session || session.gameId !== game.gameId) return;
    try {
      const view = sub.playerId ? session.privateView(sub.playerId) : session.publicView();
      this.send(socket, { type: "STATE", payload: { game: view } });
    } catch (err) {
      log.error("Failed to build view", { gameId: game.gameId, err });
    }
  }

  private send(socket: WebSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: WebSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }
}
