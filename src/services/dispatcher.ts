import type { ControlMessage, RawFrame, ServerMessage } from "../types.js";
import type {
  IConnectionRegistry,
  IFanoutEngine,
  IMessageDispatcher,
  IPeerSession,
  IRecordingSink,
  ITransmissionTracker,
} from "../interfaces.js";
import { decodeFrame } from "./message-decoder.js";

export interface DispatcherDeps {
  registry: IConnectionRegistry;
  tracker: ITransmissionTracker;
  fanout: IFanoutEngine;
  recorder: IRecordingSink | null;
}

export class MessageDispatcher implements IMessageDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  dispatch(session: IPeerSession, data: RawFrame, isBinary: boolean): void {
    session.touch();
    const frame = decodeFrame(data, isBinary);

    switch (frame.kind) {
      case "audio":
        this.deps.fanout.relayAudio(session, frame.payload);
        if (session.isTransmitting) {
          this.deps.recorder?.capture(frame.payload);
        }
        break;
      case "control":
        this.handleControl(session, frame.message);
        break;
      case "malformed":
        console.warn(
          `[relay] Dropped malformed frame from ${session.label()}: ${frame.reason}`,
        );
        break;
    }
  }

  handleControl(session: IPeerSession, message: ControlMessage): void {
    switch (message.type) {
      case "register":
        this.register(session, message.device);
        break;
      case "start_transmission":
        this.startTransmission(session);
        break;
      case "end_transmission":
        this.endTransmission(session);
        break;
      case "unknown":
        console.log(
          `[relay] Unknown message type from ${session.label()}: ${message.rawType}`,
        );
        break;
    }
  }

  private register(session: IPeerSession, device: string): void {
    if (!session.register(device)) {
      console.log(
        `[relay] ${session.id} already registered as ${session.label()}, ignoring "${device}"`,
      );
      return;
    }
    console.log(`[relay] ${session.id} registered as ${device}`);
    this.reply(session, {
      type: "registered",
      clients: this.deps.registry.size,
    });
  }

  private startTransmission(session: IPeerSession): void {
    const outcome = this.deps.tracker.start(session);
    if (!outcome.accepted) {
      this.reply(session, {
        type: "transmission_rejected",
        device: deviceOf(outcome.holder),
      });
      return;
    }
    session.setTransmitting(true);
    this.deps.fanout.notify(session, {
      type: "transmission_started",
      device: deviceOf(session),
    });
  }

  private endTransmission(session: IPeerSession): void {
    this.deps.tracker.end(session);
    if (!session.isTransmitting) {
      console.log(
        `[relay] ${session.label()} sent end_transmission without transmitting`,
      );
      return;
    }
    session.setTransmitting(false);
    this.deps.fanout.notify(session, {
      type: "transmission_ended",
      device: deviceOf(session),
    });
  }

  private reply(session: IPeerSession, message: ServerMessage): void {
    session.sendMessage(message, (err) =>
      console.error(
        `[relay] Reply ${message.type} to ${session.label()} failed: ${err.message}`,
      ),
    );
  }
}

function deviceOf(session: IPeerSession): string {
  return session.deviceName ?? "unknown";
}
