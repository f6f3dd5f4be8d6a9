import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { Server } from "node:http";

import { startHexapawnServer } from "../server/src/app.ts";
import type { ErrorKind } from "./shared/onlineProtocol.ts";
import type { WireSnapshot } from "./shared/wireState.ts";

type Json = Record<string, unknown>;

type ApiBody = {
  ok?: boolean;
  roomId?: string;
  snapshot?: WireSnapshot;
  legal?: boolean;
  error?: string;
  errorKind?: ErrorKind;
};

describe("hexapawn server", () => {
  let server: Server;
  let url: string;

  beforeAll(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const s = await startHexapawnServer({ port: 0, requestLog: false });
    server = s.server;
    url = s.url;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  async function post(path: string, body: Json) {
    const res = await fetch(`${url}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
    return { status: res.status, json: (await res.json()) as ApiBody };
  }

  async function createRoom(): Promise<string> {
    const { json } = await post("/api/create", {});
    if (!json.roomId) throw new Error("create failed");
    return json.roomId;
  }

  it("reports health", async () => {
    const res = await fetch(`${url}/api/health`);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("creates a room at the starting position", async () => {
    const { status, json } = await post("/api/create", {});
    expect(status).toBe(200);
    expect(typeof json.roomId).toBe("string");
    expect(json.snapshot?.state.toMove).toBe("W");
    expect(json.snapshot?.legalMoves).toEqual(["a1a2", "b1b2", "c1c2"]);
    expect(json.snapshot?.display).toBe("♙ ♙ ♙ \n□ ■ □ \n♟ ♟ ♟ ");
    expect(json.snapshot?.history.currentIndex).toBe(0);
  });

  it("answers legality queries without changing the room", async () => {
    const roomId = await createRoom();

    expect((await post("/api/legal", { roomId, move: "a1a2" })).json).toEqual({ legal: true });
    expect((await post("/api/legal", { roomId, move: "a1b2" })).json).toEqual({ legal: false });

    const snap = (await fetch(`${url}/api/room/${roomId}`).then((r) => r.json())) as ApiBody;
    expect(snap.snapshot?.state.toMove).toBe("W");
    expect(snap.snapshot?.legalMoves).toEqual(["a1a2", "b1b2", "c1c2"]);
  });

  it("plays moves and alternates turns", async () => {
    const roomId = await createRoom();

    const first = await post("/api/submitMove", { roomId, move: "b1b2" });
    expect(first.status).toBe(200);
    expect(first.json.snapshot?.state.toMove).toBe("B");
    expect(first.json.snapshot?.legalMoves).toEqual(["a3a2", "a3b2", "c3b2", "c3c2"]);

    const second = await post("/api/submitMove", { roomId, move: "a3b2" });
    expect(second.json.snapshot?.state).toEqual({
      board: [["a1", "W"], ["b2", "B"], ["b3", "B"], ["c1", "W"], ["c3", "B"]],
      toMove: "W",
    });
    expect(second.json.snapshot?.history.notation).toEqual(["", "b1b2", "a3b2"]);
  });

  it("distinguishes bad notation from illegal moves", async () => {
    const roomId = await createRoom();

    const parse = await post("/api/submitMove", { roomId, move: "c2d3" });
    expect(parse.status).toBe(400);
    expect(parse.json).toEqual({ error: "Invalid move notation: 'c2d3'", errorKind: "parse" });

    const illegal = await post("/api/submitMove", { roomId, move: "a1b2" });
    expect(illegal.status).toBe(400);
    expect(illegal.json).toEqual({ error: "Illegal move: a1b2", errorKind: "illegal" });

    const missing = await post("/api/legal", { roomId });
    expect(missing.json).toEqual({ error: "Missing move", errorKind: "bad_request" });
  });

  it("returns 404 for unknown rooms", async () => {
    const res = await fetch(`${url}/api/room/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Unknown room: nope", errorKind: "not_found" });
  });

  it("undoes the last move", async () => {
    const roomId = await createRoom();
    expect((await post("/api/undo", { roomId })).json).toEqual({ error: "Nothing to undo", errorKind: "bad_request" });

    await post("/api/submitMove", { roomId, move: "c1c2" });
    const undone = await post("/api/undo", { roomId });
    expect(undone.json.snapshot?.state.toMove).toBe("W");
    expect(undone.json.snapshot?.legalMoves).toEqual(["a1a2", "b1b2", "c1c2"]);
  });

  it("redoes an undone move", async () => {
    const roomId = await createRoom();
    expect((await post("/api/redo", { roomId })).json).toEqual({ error: "Nothing to redo", errorKind: "bad_request" });

    await post("/api/submitMove", { roomId, move: "c1c2" });
    await post("/api/undo", { roomId });
    const redone = await post("/api/redo", { roomId });
    expect(redone.json.snapshot?.state.toMove).toBe("B");
    expect(redone.json.snapshot?.legalMoves).toEqual(["a3a2", "b3b2", "b3c2"]);
    expect(redone.json.snapshot?.history.currentIndex).toBe(1);
  });

  it("starts from a supplied position", async () => {
    const { status, json } = await post("/api/create", {
      state: { board: [["b2", "W"], ["a3", "B"]], toMove: "W" },
    });
    expect(status).toBe(200);
    expect(json.snapshot?.legalMoves).toEqual(["b2a3", "b2b3"]);

    const bad = await post("/api/create", { state: { board: [["a1", "W"], ["a1", "B"]], toMove: "W" } });
    expect(bad.status).toBe(400);
    expect(bad.json).toEqual({ error: "Invalid wire state: duplicate square a1", errorKind: "bad_request" });
  });

  it("deletes rooms", async () => {
    const roomId = await createRoom();
    const res = await fetch(`${url}/api/room/${roomId}`, { method: "DELETE" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });

    const gone = await fetch(`${url}/api/room/${roomId}`);
    expect(gone.status).toBe(404);

    const again = await fetch(`${url}/api/room/${roomId}`, { method: "DELETE" });
    expect(again.status).toBe(404);
  });

  it("clear keeps the side to move, reset restores the start", async () => {
    const roomId = await createRoom();
    await post("/api/submitMove", { roomId, move: "a1a2" });

    const cleared = await post("/api/clear", { roomId });
    expect(cleared.json.snapshot?.state).toEqual({ board: [], toMove: "B" });
    expect(cleared.json.snapshot?.legalMoves).toEqual([]);

    const reset = await post("/api/reset", { roomId });
    expect(reset.json.snapshot?.state.toMove).toBe("W");
    expect(reset.json.snapshot?.state.board).toHaveLength(6);
    expect(reset.json.snapshot?.history.notation).toEqual([""]);
  });

  it("logs each request when request logging is on", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logged = await startHexapawnServer({ port: 0, requestLog: true });
    try {
      await fetch(`${logged.url}/api/health`);
      expect(log).toHaveBeenCalledWith("[hexapawn-server] GET /api/health");
    } finally {
      await new Promise<void>((resolve) => logged.server.close(() => resolve()));
      log.mockRestore();
    }
  });
});
