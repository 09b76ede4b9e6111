import { EventEmitter } from "eventemitter3";
import type { IdleReason, TalkPolicy } from "../types.js";
import type {
  IPeerSession,
  ITransmissionTracker,
  StartOutcome,
  TrackerEvents,
} from "../interfaces.js";

type TransmissionState =
  | { status: "idle" }
  | { status: "transmitting"; session: IPeerSession };

/**
 * Holds the single "current transmitter" slot.
 *
 * With the `open` policy a new start always takes the slot, even from
 * another active transmitter. With `exclusive` it is refused while someone
 * else holds it. Nothing clears the slot on a timer.
 */
export class TransmissionTracker
  extends EventEmitter<TrackerEvents>
  implements ITransmissionTracker
{
  private state: TransmissionState = { status: "idle" };

  constructor(private readonly policy: TalkPolicy = "open") {
    super();
  }

  start(session: IPeerSession): StartOutcome {
    const previous = this.getTransmitter();

    if (previous && previous !== session && this.policy === "exclusive") {
      console.log(
        `[tracker] Rejected start from ${session.label()}, ${previous.label()} is transmitting`,
      );
      return { accepted: false, holder: previous };
    }

    this.state = { status: "transmitting", session };
    const replaced = previous && previous !== session ? previous : null;
    if (replaced) {
      console.log(
        `[tracker] ${session.label()} took over transmission from ${replaced.label()}`,
      );
    } else {
      console.log(`[tracker] ${session.label()} started transmitting`);
    }
    if (previous !== session) {
      this.emit("started", session);
    }
    return { accepted: true, replaced };
  }

  end(session: IPeerSession): boolean {
    if (this.getTransmitter() !== session) {
      console.log(
        `[tracker] Ignoring end from ${session.label()}, not the current transmitter`,
      );
      return false;
    }
    this.toIdle(session, "ended");
    return true;
  }

  clear(session: IPeerSession): boolean {
    if (this.getTransmitter() !== session) return false;
    this.toIdle(session, "disconnected");
    return true;
  }

  getTransmitter(): IPeerSession | null {
    return this.state.status === "transmitting" ? this.state.session : null;
  }

  isIdle(): boolean {
    return this.state.status === "idle";
  }

  private toIdle(previous: IPeerSession, reason: IdleReason): void {
    this.state = { status: "idle" };
    console.log(`[tracker] Idle (${previous.label()} ${reason})`);
    this.emit("idle", previous, reason);
  }
}
