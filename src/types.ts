export type ProjectName = string;
export type RoomName = string;

export type RoomAddress = {
  project: ProjectName;
  room: RoomName;
};

export type TerminalSize = {
  rows: number;
  cols: number;
};

export type ResizeMessage = { type: "resize" } & TerminalSize;

/** What a client sent on the terminal socket, after decoding. */
export type TerminalInput =
  | { kind: "data"; data: Buffer }
  | { kind: "resize"; size: TerminalSize }
  | { kind: "ignored" };

export type RoomCapture = {
  text: string;
  alive: boolean;
};

/** WebSocket close codes sent by the terminal bridge. */
export const CloseCode = {
  Normal: 1000,
  GoingAway: 1001,
  InvalidTarget: 1008,
  InternalError: 1011,
  TargetNotFound: 4404,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];
