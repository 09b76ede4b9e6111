import { vi } from "vitest";
import type { Mock } from "vitest";
import type { PeerConnection } from "../../src/interfaces.js";

type SendFn = (data: Buffer | string, cb?: (err?: Error) => void) => void;

export interface MockConnection extends PeerConnection {
  readyState: number;
  send: Mock<SendFn>;
  close: Mock<(code?: number, reason?: string) => void>;
  terminate: Mock<() => void>;
}

export function createMockConnection(state = 1): MockConnection {
  return {
    readyState: state,
    OPEN: 1,
    send: vi.fn<SendFn>(),
    close: vi.fn<(code?: number, reason?: string) => void>(),
    terminate: vi.fn<() => void>(),
  };
}

/** JSON control messages written to the connection, in order. */
export function sentMessages(conn: MockConnection): unknown[] {
  return conn.send.mock.calls
    .map(([data]) => data)
    .filter((data): data is string => typeof data === "string")
    .map((data) => JSON.parse(data) as unknown);
}

/** Binary frames written to the connection, in order. */
export function sentFrames(conn: MockConnection): Buffer[] {
  return conn.send.mock.calls
    .map(([data]) => data)
    .filter((data): data is Buffer => Buffer.isBuffer(data));
}
