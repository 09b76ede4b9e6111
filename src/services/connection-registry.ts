import type {
  IConnectionRegistry,
  IPeerSession,
  ITransmissionTracker,
  PeerConnection,
} from "../interfaces.js";
import { PeerSession } from "./session.js";

export class ConnectionRegistry implements IConnectionRegistry {
  private sessions = new Map<PeerConnection, IPeerSession>();
  private nextId = 1;

  constructor(private readonly tracker: ITransmissionTracker) {}

  get size(): number {
    return this.sessions.size;
  }

  admit(connection: PeerConnection, remoteAddress?: string): IPeerSession {
    const existing = this.sessions.get(connection);
    if (existing) return existing;

    const session = new PeerSession(
      `peer-${this.nextId++}`,
      connection,
      remoteAddress,
    );
    this.sessions.set(connection, session);
    console.log(
      `[registry] Admitted ${session.id}${remoteAddress ? ` from ${remoteAddress}` : ""} (${this.sessions.size} live)`,
    );
    return session;
  }

  remove(session: IPeerSession): boolean {
    if (this.sessions.get(session.connection) !== session) return false;

    this.sessions.delete(session.connection);
    this.tracker.clear(session);
    session.setTransmitting(false);
    console.log(
      `[registry] Removed ${session.id} (${session.label()}), ${this.sessions.size} live`,
    );
    return true;
  }

  forEachExcept(
    session: IPeerSession,
    fn: (peer: IPeerSession) => void,
  ): void {
    // Snapshot: fn may remove peers (lazy cleanup) while we iterate
    for (const peer of [...this.sessions.values()]) {
      if (peer === session) continue;
      if (this.sessions.get(peer.connection) !== peer) continue;
      fn(peer);
    }
  }

  get(connection: PeerConnection): IPeerSession | undefined {
    return this.sessions.get(connection);
  }

  list(): IPeerSession[] {
    return [...this.sessions.values()];
  }
}
