import WebSocket from "ws";
import type { ServerEvent } from "@shared/schema";
import type { SessionTransport } from "./types";

/** The part of a ws socket the transport writes to. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

const DEFAULT_MAX_BUFFERED_EVENTS = 100;

/**
 * Outbound side of a client connection that survives reconnects. While no
 * socket is attached, events are held (oldest dropped first) and flushed in
 * order once the client reconnects.
 */
export class ClientTransport implements SessionTransport {
  private socket: ClientSocket | null = null;
  private readonly outbox: ServerEvent[] = [];
  private droppedEvents = 0;

  constructor(
    private readonly sessionId: string,
    private readonly maxBufferedEvents = DEFAULT_MAX_BUFFERED_EVENTS,
  ) {}

  get bufferedCount(): number {
    return this.outbox.length;
  }

  isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  attach(socket: ClientSocket): void {
    this.socket = socket;
    this.flush();
  }

  detach(): void {
    this.socket = null;
  }

  send(event: ServerEvent): void {
    if (this.isConnected() && this.outbox.length === 0 && this.write(event)) {
      return;
    }
    this.buffer(event);
  }

  private flush(): void {
    if (this.droppedEvents > 0) {
      console.warn(
        `[ClientTransport] ${this.sessionId} dropped ${this.droppedEvents} event(s) while disconnected`,
      );
      this.droppedEvents = 0;
    }
    while (this.outbox.length > 0 && this.isConnected()) {
      const next = this.outbox[0];
      if (!this.write(next)) return;
      this.outbox.shift();
    }
  }

  private buffer(event: ServerEvent): void {
    this.outbox.push(event);
    if (this.outbox.length > this.maxBufferedEvents) {
      this.outbox.shift();
      this.droppedEvents += 1;
    }
  }

  private write(event: ServerEvent): boolean {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return false;
    try {
      socket.send(JSON.stringify(event));
      return true;
    } catch (error) {
      console.warn(`[ClientTransport] ${this.sessionId} failed to send ${event.type}: ${error}`);
      return false;
    }
  }
}
