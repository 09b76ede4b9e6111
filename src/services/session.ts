import type { DeviceName, ServerMessage, SessionId } from "../types.js";
import type { IPeerSession, PeerConnection } from "../interfaces.js";

/**
 * Server-side state of one connected device.
 *
 * Identity and transmitting fields are only written from the handler that
 * owns this connection's inbound frames; other sessions reach it through
 * `send`.
 */
export class PeerSession implements IPeerSession {
  readonly connectedAt = Date.now();
  private device: DeviceName | undefined;
  private transmitting = false;
  private activity = this.connectedAt;

  constructor(
    readonly id: SessionId,
    readonly connection: PeerConnection,
    readonly remoteAddress: string | undefined = undefined,
  ) {}

  get deviceName(): DeviceName | undefined {
    return this.device;
  }

  get isTransmitting(): boolean {
    return this.transmitting;
  }

  get lastActivity(): number {
    return this.activity;
  }

  /** Sets the device name once; later calls return false and change nothing. */
  register(device: DeviceName): boolean {
    if (this.device !== undefined) return false;
    this.device = device;
    return true;
  }

  setTransmitting(value: boolean): void {
    this.transmitting = value;
  }

  touch(): void {
    this.activity = Date.now();
  }

  isOpen(): boolean {
    return this.connection.readyState === this.connection.OPEN;
  }

  send(data: Buffer | string, onError: (err: Error) => void): void {
    this.connection.send(data, (err) => {
      if (err) onError(err);
    });
  }

  sendMessage(message: ServerMessage, onError: (err: Error) => void): void {
    this.send(JSON.stringify(message), onError);
  }

  label(): string {
    return this.device ?? this.remoteAddress ?? this.id;
  }
}
