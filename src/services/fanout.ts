import type { ServerMessage } from "../types.js";
import type {
  IConnectionRegistry,
  IFanoutEngine,
  IPeerSession,
} from "../interfaces.js";

export class FanoutEngine implements IFanoutEngine {
  constructor(private readonly registry: IConnectionRegistry) {}

  /** Sends an audio frame to every live session except the sender. */
  relayAudio(sender: IPeerSession, frame: Buffer): number {
    return this.deliver(sender, frame);
  }

  notify(sender: IPeerSession, message: ServerMessage): number {
    const count = this.deliver(sender, JSON.stringify(message));
    console.log(
      `[fanout] ${message.type} from ${sender.label()} sent to ${count} peers`,
    );
    return count;
  }

  private deliver(sender: IPeerSession, data: Buffer | string): number {
    let attempted = 0;
    this.registry.forEachExcept(sender, (peer) => {
      if (this.sendTo(peer, data)) attempted++;
    });
    return attempted;
  }

  private sendTo(peer: IPeerSession, data: Buffer | string): boolean {
    if (!peer.isOpen()) {
      console.log(`[fanout] Skipping ${peer.label()}, connection not open`);
      this.evict(peer);
      return false;
    }

    try {
      peer.send(data, (err) => {
        console.error(`[fanout] Send to ${peer.label()} failed: ${err.message}`);
        this.evict(peer);
      });
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[fanout] Send to ${peer.label()} threw: ${message}`);
      this.evict(peer);
      return false;
    }
  }

  // Lazy cleanup; the peer's own close handler converges on the same removal
  private evict(peer: IPeerSession): void {
    if (this.registry.remove(peer)) {
      peer.connection.terminate();
    }
  }
}
