import type { InboundFrame, RawFrame } from "../types.js";

type TextFrame = Exclude<InboundFrame, { kind: "audio" }>;

export function toBuffer(data: RawFrame): Buffer {
  if (typeof data === "string") return Buffer.from(data, "utf8");
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(reason: string): TextFrame {
  return { kind: "malformed", reason };
}

export function decodeControl(text: string): TextFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return malformed(`invalid JSON: ${message}`);
  }

  if (!isRecord(parsed)) return malformed("control frame is not a JSON object");

  const type = parsed.type;
  if (typeof type !== "string") return malformed('missing string field "type"');

  switch (type) {
    case "register": {
      const device = parsed.device;
      if (typeof device !== "string" || device.length === 0) {
        return malformed('register requires a non-empty string "device"');
      }
      return { kind: "control", message: { type: "register", device } };
    }
    case "start_transmission":
      return { kind: "control", message: { type: "start_transmission" } };
    case "end_transmission":
      return { kind: "control", message: { type: "end_transmission" } };
    default:
      return { kind: "control", message: { type: "unknown", rawType: type } };
  }
}

/**
 * Classifies one inbound frame. Binary frames are always audio, whatever
 * their size; text frames are decoded into a control message or reported
 * as malformed with the reason.
 */
export function decodeFrame(data: RawFrame, isBinary: boolean): InboundFrame {
  if (isBinary) {
    return { kind: "audio", payload: toBuffer(data) };
  }
  const text = typeof data === "string" ? data : toBuffer(data).toString("utf8");
  return decodeControl(text);
}
