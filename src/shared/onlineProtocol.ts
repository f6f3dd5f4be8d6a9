import type { WireGameState, WireSnapshot } from "./wireState.ts";

export type RoomId = string;

export type ErrorKind = "parse" | "illegal" | "not_found" | "bad_request";

export type OnlineError = {
  error: string;
  errorKind: ErrorKind;
};

export type CreateRoomRequest = {
  /** Starting position; the standard layout when omitted. */
  state?: WireGameState;
};

export type CreateRoomResponse =
  | {
      roomId: RoomId;
      snapshot: WireSnapshot;
    }
  | OnlineError;

export type GetRoomSnapshotResponse = { snapshot: WireSnapshot } | OnlineError;

export type CheckMoveRequest = {
  roomId: RoomId;
  /** Move notation, e.g. "b1b2". */
  move: string;
};

export type CheckMoveResponse = { legal: boolean } | OnlineError;

export type SubmitMoveRequest = {
  roomId: RoomId;
  move: string;
};

export type SubmitMoveResponse = { snapshot: WireSnapshot } | OnlineError;

export type RoomActionRequest = {
  roomId: RoomId;
};

export type RoomActionResponse = { snapshot: WireSnapshot } | OnlineError;

export type DeleteRoomResponse = { ok: true } | OnlineError;
