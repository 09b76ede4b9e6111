import type { EventEmitter } from "eventemitter3";
import type {
  ControlMessage,
  DeviceName,
  IdleReason,
  RawFrame,
  RecordingSummary,
  RelayStatus,
  ServerMessage,
  SessionId,
} from "./types.js";

// ── PeerConnection ──────────────────────────
// The slice of a `ws` WebSocket the relay touches

export interface PeerConnection {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: Buffer | string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

// ── IPeerSession ────────────────────────────

export interface IPeerSession {
  readonly id: SessionId;
  readonly connection: PeerConnection;
  readonly remoteAddress: string | undefined;
  readonly connectedAt: number;
  readonly deviceName: DeviceName | undefined;
  readonly isTransmitting: boolean;
  readonly lastActivity: number;
  register(device: DeviceName): boolean;
  setTransmitting(value: boolean): void;
  touch(): void;
  isOpen(): boolean;
  send(data: Buffer | string, onError: (err: Error) => void): void;
  sendMessage(message: ServerMessage, onError: (err: Error) => void): void;
  label(): string;
}

// ── IConnectionRegistry ─────────────────────

export interface IConnectionRegistry {
  readonly size: number;
  admit(connection: PeerConnection, remoteAddress?: string): IPeerSession;
  remove(session: IPeerSession): boolean;
  forEachExcept(
    session: IPeerSession,
    fn: (peer: IPeerSession) => void,
  ): void;
  get(connection: PeerConnection): IPeerSession | undefined;
  list(): IPeerSession[];
}

// ── ITransmissionTracker ────────────────────
// Events: "started" → session
//         "idle"    → previous session, IdleReason

export interface TrackerEvents {
  started: (session: IPeerSession) => void;
  idle: (previous: IPeerSession, reason: IdleReason) => void;
}

export type StartOutcome =
  | { accepted: true; replaced: IPeerSession | null }
  | { accepted: false; holder: IPeerSession };

export interface ITransmissionTracker extends EventEmitter<TrackerEvents> {
  start(session: IPeerSession): StartOutcome;
  end(session: IPeerSession): boolean;
  clear(session: IPeerSession): boolean;
  getTransmitter(): IPeerSession | null;
  isIdle(): boolean;
}

// ── IFanoutEngine ───────────────────────────

export interface IFanoutEngine {
  relayAudio(sender: IPeerSession, frame: Buffer): number;
  notify(sender: IPeerSession, message: ServerMessage): number;
}

// ── IRecordingSink ──────────────────────────

export interface IRecordingSink {
  begin(deviceName: DeviceName): void;
  capture(payload: Buffer): void;
  finish(): Promise<RecordingSummary | null>;
  isRecording(): boolean;
}

// ── IMessageDispatcher ──────────────────────

export interface IMessageDispatcher {
  dispatch(
    session: IPeerSession,
    data: RawFrame,
    isBinary: boolean,
  ): void;
  handleControl(session: IPeerSession, message: ControlMessage): void;
}

// ── IRelayHub ───────────────────────────────

export interface IRelayHub {
  handleOpen(connection: PeerConnection, remoteAddress?: string): IPeerSession;
  handleMessage(
    session: IPeerSession,
    data: RawFrame,
    isBinary: boolean,
  ): void;
  handleClose(session: IPeerSession): void;
  getStatus(): RelayStatus;
  shutdown(): Promise<void>;
}
