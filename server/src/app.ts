import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import { applyMove } from "../../src/game/applyMove.ts";
import { HistoryManager } from "../../src/game/historyManager.ts";
import { generateLegalMoves, isLegalMove } from "../../src/game/movegen.ts";
import { ParseError, formatMove, parseMove } from "../../src/game/moveNotation.ts";
import { clearBoard, createInitialGameState, resetGameState } from "../../src/game/state.ts";
import type { GameState } from "../../src/game/state.ts";
import { renderUnicode } from "../../src/render/renderUnicode.ts";
import type {
  CheckMoveResponse,
  CreateRoomResponse,
  DeleteRoomResponse,
  ErrorKind,
  GetRoomSnapshotResponse,
  OnlineError,
  RoomActionResponse,
  RoomId,
  SubmitMoveResponse,
} from "../../src/shared/onlineProtocol.ts";
import {
  deserializeWireGameState,
  serializeWireGameState,
  serializeWireHistory,
  type WireSnapshot,
} from "../../src/shared/wireState.ts";
import { loadServerConfig } from "./config.ts";

type Room = {
  roomId: RoomId;
  state: GameState;
  history: HistoryManager;
};

type ServerOpts = {
  requestLog?: boolean;
  jsonLimit?: string;
};

class RoomNotFoundError extends Error {
  constructor(roomId: string) {
    super(`Unknown room: ${roomId}`);
    this.name = "RoomNotFoundError";
  }
}

class IllegalMoveError extends Error {
  constructor(notation: string) {
    super(`Illegal move: ${notation}`);
    this.name = "IllegalMoveError";
  }
}

const randId = () => Math.random().toString(16).slice(2) + Math.random().toString(16).slice(2);

function readString(body: unknown, key: string): string {
  const v: unknown = typeof body === "object" && body !== null ? Reflect.get(body, key) : undefined;
  if (typeof v !== "string") throw new Error(`Missing ${key}`);
  return v;
}

function toSnapshot(room: Room): WireSnapshot {
  return {
    state: serializeWireGameState(room.state),
    history: serializeWireHistory(room.history.exportSnapshots()),
    legalMoves: generateLegalMoves(room.state).map(formatMove),
    display: renderUnicode(room.state),
  };
}

function toError(err: unknown, fallback: string): { status: number; body: OnlineError } {
  const error = err instanceof Error ? err.message : fallback;
  let errorKind: ErrorKind = "bad_request";
  if (err instanceof ParseError) errorKind = "parse";
  else if (err instanceof IllegalMoveError) errorKind = "illegal";
  else if (err instanceof RoomNotFoundError) errorKind = "not_found";
  return { status: errorKind === "not_found" ? 404 : 400, body: { error, errorKind } };
}

export function createHexapawnApp(opts: ServerOpts = {}): { app: express.Express } {
  const rooms = new Map<RoomId, Room>();

  function requireRoom(roomId: string): Room {
    const room = rooms.get(roomId);
    if (!room) throw new RoomNotFoundError(roomId);
    return room;
  }

  function fail(res: express.Response, route: string, err: unknown): void {
    const { status, body } = toError(err, `${route} failed`);
    // eslint-disable-next-line no-console
    console.error(`[hexapawn-server] ${route} error`, body.error);
    res.status(status).json(body);
  }

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: opts.jsonLimit ?? "16kb" }));

  if (opts.requestLog) {
    app.use((req, _res, next) => {
      // eslint-disable-next-line no-console
      console.log(`[hexapawn-server] ${req.method} ${req.path}`);
      next();
    });
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  // Body may carry `state` (wire form) to start from a set-up position.
  app.post("/api/create", (req, res) => {
    try {
      const rawState: unknown = typeof req.body === "object" && req.body !== null ? Reflect.get(req.body, "state") : undefined;
      const room: Room = {
        roomId: randId(),
        state: rawState === undefined ? createInitialGameState() : deserializeWireGameState(rawState),
        history: new HistoryManager(),
      };
      room.history.restart(room.state);
      rooms.set(room.roomId, room);

      const response: CreateRoomResponse = { roomId: room.roomId, snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "create", err);
    }
  });

  app.delete("/api/room/:roomId", (req, res) => {
    try {
      const room = requireRoom(req.params.roomId);
      rooms.delete(room.roomId);
      const response: DeleteRoomResponse = { ok: true };
      res.json(response);
    } catch (err) {
      fail(res, "delete", err);
    }
  });

  app.get("/api/room/:roomId", (req, res) => {
    try {
      const room = requireRoom(req.params.roomId);
      const response: GetRoomSnapshotResponse = { snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "snapshot", err);
    }
  });

  app.post("/api/legal", (req, res) => {
    try {
      const room = requireRoom(readString(req.body, "roomId"));
      const move = parseMove(readString(req.body, "move"));
      const response: CheckMoveResponse = { legal: isLegalMove(room.state, move) };
      res.json(response);
    } catch (err) {
      fail(res, "legal", err);
    }
  });

  app.post("/api/submitMove", (req, res) => {
    try {
      const room = requireRoom(readString(req.body, "roomId"));
      const move = parseMove(readString(req.body, "move"));
      if (!isLegalMove(room.state, move)) throw new IllegalMoveError(formatMove(move));

      room.state = applyMove(room.state, move);
      room.history.push(room.state, formatMove(move));

      const response: SubmitMoveResponse = { snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "submitMove", err);
    }
  });

  app.post("/api/undo", (req, res) => {
    try {
      const room = requireRoom(readString(req.body, "roomId"));
      const prev = room.history.undo();
      if (!prev) throw new Error("Nothing to undo");
      room.state = prev;

      const response: RoomActionResponse = { snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "undo", err);
    }
  });

  app.post("/api/redo", (req, res) => {
    try {
      const room = requireRoom(readString(req.body, "roomId"));
      const next = room.history.redo();
      if (!next) throw new Error("Nothing to redo");
      room.state = next;

      const response: RoomActionResponse = { snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "redo", err);
    }
  });

  app.post("/api/reset", (req, res) => {
    try {
      const room = requireRoom(readString(req.body, "roomId"));
      resetGameState(room.state);
      room.history.restart(room.state);

      const response: RoomActionResponse = { snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "reset", err);
    }
  });

  app.post("/api/clear", (req, res) => {
    try {
      const room = requireRoom(readString(req.body, "roomId"));
      clearBoard(room.state);
      room.history.restart(room.state);

      const response: RoomActionResponse = { snapshot: toSnapshot(room) };
      res.json(response);
    } catch (err) {
      fail(res, "clear", err);
    }
  });

  return { app };
}

export async function startHexapawnServer(args: { port?: number; requestLog?: boolean; jsonLimit?: string } = {}): Promise<{
  app: express.Express;
  server: Server;
  url: string;
}> {
  const config = loadServerConfig();
  const { app } = createHexapawnApp({
    requestLog: args.requestLog ?? config.requestLog,
    jsonLimit: args.jsonLimit ?? config.jsonLimit,
  });

  const port = args.port ?? config.port;
  const server = createServer(app);
  server.listen(port);

  await new Promise<void>((resolve, reject) => {
    server.once("listening", () => resolve());
    server.once("error", reject);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;
  return { app, server, url: `http://localhost:${actualPort}` };
}
