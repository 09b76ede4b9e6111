import type { AppConfig, RawFrame, RelayStatus } from "../types.js";
import type {
  IPeerSession,
  IRecordingSink,
  IRelayHub,
  PeerConnection,
} from "../interfaces.js";
import { ConnectionRegistry } from "./connection-registry.js";
import { MessageDispatcher } from "./dispatcher.js";
import { FanoutEngine } from "./fanout.js";
import { RecordingSink } from "./recording.js";
import { TransmissionTracker } from "./transmission-tracker.js";

const WELCOME_TEXT = "Connected to push-to-talk relay";

export class RelayHub implements IRelayHub {
  readonly tracker: TransmissionTracker;
  readonly registry: ConnectionRegistry;
  readonly recorder: IRecordingSink | null;
  private readonly fanout: FanoutEngine;
  private readonly dispatcher: MessageDispatcher;
  private pendingFlush: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: AppConfig,
    recorder?: IRecordingSink | null,
  ) {
    this.tracker = new TransmissionTracker(config.talkPolicy);
    this.registry = new ConnectionRegistry(this.tracker);
    this.fanout = new FanoutEngine(this.registry);
    if (recorder === undefined) {
      this.recorder = config.recording.enabled
        ? new RecordingSink(config.recording)
        : null;
    } else {
      this.recorder = recorder;
    }
    this.dispatcher = new MessageDispatcher({
      registry: this.registry,
      tracker: this.tracker,
      fanout: this.fanout,
      recorder: this.recorder,
    });

    const recorderRef = this.recorder;
    if (recorderRef) {
      this.tracker.on("started", (session) => {
        recorderRef.begin(session.deviceName ?? "unknown");
      });
    }
  }

  handleOpen(connection: PeerConnection, remoteAddress?: string): IPeerSession {
    const session = this.registry.admit(connection, remoteAddress);
    session.sendMessage(
      {
        type: "welcome",
        message: WELCOME_TEXT,
        clients: this.registry.size,
      },
      (err) =>
        console.error(
          `[relay] Welcome to ${session.label()} failed: ${err.message}`,
        ),
    );
    return session;
  }

  handleMessage(session: IPeerSession, data: RawFrame, isBinary: boolean): void {
    // Frames still buffered on a socket that fan-out already evicted
    if (this.registry.get(session.connection) !== session) {
      console.log(`[relay] Dropping frame from removed session ${session.label()}`);
      return;
    }
    try {
      this.dispatcher.dispatch(session, data, isBinary);
    } catch (err) {
      console.error(`[relay] Error handling frame from ${session.label()}:`, err);
    }
    this.settleRecording();
  }

  handleClose(session: IPeerSession): void {
    if (this.registry.remove(session)) {
      console.log(
        `[relay] ${session.label()} disconnected, ${this.registry.size} clients`,
      );
      this.settleRecording();
    }
  }

  getStatus(): RelayStatus {
    const transmitter = this.tracker.getTransmitter();
    return {
      clients: this.registry.size,
      transmitter: transmitter ? (transmitter.deviceName ?? "unknown") : null,
      policy: this.config.talkPolicy,
    };
  }

  async shutdown(): Promise<void> {
    for (const session of this.registry.list()) {
      session.connection.close(1001, "Server shutting down");
      this.registry.remove(session);
    }
    if (this.recorder?.isRecording()) {
      this.flushRecording(this.recorder);
    }
    await this.pendingFlush;
  }

  /** Writes the active recording once no live session is flagged as transmitting. */
  private settleRecording(): void {
    if (!this.recorder?.isRecording()) return;
    if (this.registry.list().some((peer) => peer.isTransmitting)) return;
    this.flushRecording(this.recorder);
  }

  private flushRecording(recorder: IRecordingSink): void {
    const flush = recorder
      .finish()
      .then(() => undefined)
      .catch((err) => console.error("[recording] Save failed:", err));
    this.pendingFlush = Promise.all([this.pendingFlush, flush]).then(
      () => undefined,
    );
  }
}
