import { createServer, type Server } from "http";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { z } from "zod";
import {
  DuplicateVoteError,
  GameOverError,
  GameRuleError,
  InvalidTeamError,
  UnknownPlayerError
} from "../../src/engine/types";
import { createHttpApp, statusForError } from "../../src/server/http";
import { GameStore } from "../../src/server/store";

describe("statusForError", () => {
  it("maps missing players and games to 404", () => {
    expect(statusForError(new UnknownPlayerError("p9"))).toBe(404);
    expect(statusForError(new GameRuleError("GAME_NOT_FOUND", "gone"))).toBe(404);
  });

  it("maps conflicts to 409", () => {
    expect(statusForError(new DuplicateVoteError("again"))).toBe(409);
    expect(statusForError(new GameRuleError("DUPLICATE_GAME", "exists"))).toBe(409);
  });

  it("maps a finished game to 410", () => {
    expect(statusForError(new GameOverError())).toBe(410);
  });

  it("treats every other rule violation as a bad request", () => {
    expect(statusForError(new InvalidTeamError("TEAM_SIZE", "wrong size"))).toBe(400);
  });
});

const CreatedSchema = z.object({ gameId: z.string() });
const EventsSchema = z.object({ events: z.array(z.object({ seq: z.number(), type: z.string() })) });

describe("http routes", () => {
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    server = createServer(createHttpApp(new GameStore()));
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  /** Sends `body` as JSON, or verbatim when it is already a string. */
  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body)
    });
    return { status: res.status, body: await res.json() };
  }

  /** Five human seats p1..p5, all claimed and ready, game started. */
  async function startedGame(): Promise<string> {
    const players = ["p1", "p2", "p3", "p4", "p5"].map(id => ({ playerId: id, name: id.toUpperCase() }));
    const created = await call("POST", "/games", { players, seed: 11 });
    expect(created.status).toBe(201);
    const { gameId } = CreatedSchema.parse(created.body);
    for (const { playerId } of players) {
      expect((await call("POST", `/games/${gameId}/players/${playerId}/claim`, { name: `Seat ${playerId}` })).status).toBe(200);
      expect((await call("POST", `/games/${gameId}/players/${playerId}/ready`, {})).status).toBe(200);
    }
    const started = await call("POST", `/games/${gameId}/start`);
    expect(started.status).toBe(200);
    expect(started.body).toMatchObject({ state: { phase: "team_proposal", leaderId: "p1" } });
    return gameId;
  }

  it("answers the health check", async () => {
    const res = await call("GET", "/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok" });
  });

  it("plays actions and serves public and private state", async () => {
    const gameId = await startedGame();

    const proposed = await call("POST", `/games/${gameId}/actions`, {
      playerId: "p1",
      actionType: "propose_team",
      payload: { team: ["p1", "p2"] }
    });
    expect(proposed.status).toBe(200);
    expect(proposed.body).toMatchObject({
      state: { phase: "team_vote", proposedTeam: ["p1", "p2"], you: { playerId: "p1", name: "Seat p1" }, yourTurn: true }
    });

    const voted = await call("POST", `/games/${gameId}/actions`, {
      playerId: "p2",
      actionType: "vote_team",
      payload: { approve: false }
    });
    expect(voted.status).toBe(200);

    const mine = await call("GET", `/games/${gameId}/state?playerId=p2`);
    expect(mine.status).toBe(200);
    expect(mine.body).toMatchObject({ state: { you: { playerId: "p2" }, teamVotesCast: ["p2"], yourTurn: false } });

    const table = await call("GET", `/games/${gameId}/state`);
    expect(table.body).toMatchObject({ state: { phase: "team_vote", teamVotesCast: ["p2"] } });
    expect(table.body).not.toHaveProperty("state.you");
  });

  it("maps rule violations to status codes", async () => {
    const gameId = await startedGame();
    const propose = { playerId: "p1", actionType: "propose_team", payload: { team: ["p1", "p2"] } };
    expect((await call("POST", `/games/${gameId}/actions`, propose)).status).toBe(200);

    expect(await call("POST", `/games/${gameId}/actions`, propose)).toEqual({
      status: 400,
      body: { error: { code: "INVALID_PHASE", message: "Teams can only be proposed during team proposal" } }
    });

    const vote = { playerId: "p3", actionType: "vote_team", payload: { approve: true } };
    expect((await call("POST", `/games/${gameId}/actions`, vote)).status).toBe(200);
    const again = await call("POST", `/games/${gameId}/actions`, vote);
    expect(again.status).toBe(409);
    expect(again.body).toMatchObject({ error: { code: "DUPLICATE_VOTE" } });

    const badPayload = await call("POST", `/games/${gameId}/actions`, {
      playerId: "p4",
      actionType: "vote_team",
      payload: { approve: "yes" }
    });
    expect(badPayload.status).toBe(400);
    expect(badPayload.body).toMatchObject({ error: { code: "INVALID_PAYLOAD" } });

    const stranger = await call("GET", `/games/${gameId}/state?playerId=p9`);
    expect(stranger).toEqual({ status: 404, body: { error: { code: "PLAYER_NOT_FOUND", message: "Player p9 not found" } } });
  });

  it("rejects unknown games and malformed requests", async () => {
    expect(await call("GET", "/games/nope/state")).toEqual({
      status: 404,
      body: { error: { code: "GAME_NOT_FOUND", message: "Game nope not found" } }
    });

    const empty = await call("POST", "/games", { players: [] });
    expect(empty.status).toBe(400);
    expect(empty.body).toMatchObject({ error: { code: "BAD_REQUEST" } });

    expect(await call("POST", "/games", "{not json")).toEqual({
      status: 400,
      body: { error: { code: "BAD_JSON", message: "Invalid JSON payload" } }
    });

    const tooFew = await call("POST", "/games", { players: [{ name: "Solo" }] });
    expect(tooFew.status).toBe(400);
    expect(tooFew.body).toMatchObject({ error: { code: "UNSUPPORTED_PLAYER_COUNT" } });
  });

  it("serves the public event log after a given sequence number", async () => {
    const gameId = await startedGame();
    await call("POST", `/games/${gameId}/actions`, {
      playerId: "p1",
      actionType: "propose_team",
      payload: { team: ["p1", "p2"] }
    });

    const all = EventsSchema.parse((await call("GET", `/games/${gameId}/events`)).body);
    expect(all.events.map(e => e.type)).toEqual(["game_created", "game_started", "team_proposed"]);

    const newer = EventsSchema.parse((await call("GET", `/games/${gameId}/events?after=2`)).body);
    expect(newer.events.map(e => [e.seq, e.type])).toEqual([[3, "team_proposed"]]);

    const negative = await call("GET", `/games/${gameId}/events?after=-1`);
    expect(negative.status).toBe(400);
    expect(negative.body).toMatchObject({ error: { code: "BAD_REQUEST" } });
  });
});
