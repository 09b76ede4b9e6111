// ── Core IDs ────────────────────────────────

export type SessionId = string;
export type DeviceName = string;

// ── Control Messages (device → server) ─────

export type ControlMessage =
  | { type: "register"; device: DeviceName }
  | { type: "start_transmission" }
  | { type: "end_transmission" }
  | { type: "unknown"; rawType: string };

// ── Inbound Frames ──────────────────────────

// Shape of a `ws` message payload; text frames may also arrive as strings
export type RawFrame = Buffer | ArrayBuffer | Buffer[] | string;

export type InboundFrame =
  | { kind: "audio"; payload: Buffer }
  | { kind: "control"; message: ControlMessage }
  | { kind: "malformed"; reason: string };

// ── Server Messages (server → device) ──────

export type ServerMessage =
  | { type: "welcome"; message: string; clients: number }
  | { type: "registered"; clients: number }
  | { type: "transmission_started"; device: DeviceName }
  | { type: "transmission_ended"; device: DeviceName }
  | { type: "transmission_rejected"; device: DeviceName };

// ── Transmission ────────────────────────────

export type TalkPolicy = "open" | "exclusive";

export type IdleReason = "ended" | "disconnected";

// ── Recording ───────────────────────────────

export interface RecordingAnalysis {
  durationSec: number;
  avgAmplitude: number;
  avgEndAmplitude: number;
  hasSilenceAtEnd: boolean;
  packetCount: number;
  avgInterPacketDelayMs: number;
  minInterPacketDelayMs: number;
  maxInterPacketDelayMs: number;
}

export interface RecordingSummary {
  filePath: string;
  deviceName: DeviceName;
  bytes: number;
  analysis: RecordingAnalysis;
}

// ── Status ──────────────────────────────────

export interface RelayStatus {
  clients: number;
  transmitter: DeviceName | null;
  policy: TalkPolicy;
}

// ── AppConfig ───────────────────────────────

export interface RecordingConfig {
  enabled: boolean;
  directory: string;
  sampleRate: number;
}

export interface AppConfig {
  port: number;
  host: string;
  wsPath: string;
  healthPath: string;
  talkPolicy: TalkPolicy;
  recording: RecordingConfig;
}
