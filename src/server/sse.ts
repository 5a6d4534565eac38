/**
 * Server-sent event streams bound to observer hub scopes.
 */
import type { ObserverHub, Unsubscribe } from "../events/observerHub.js";
import type { OrchestratorEvent } from "../jobs/events.js";
import { formatSseMessage, toWireEvent, type WireEvent } from "./wireEvents.js";

export const HEARTBEAT_INTERVAL_MS = 15_000;

type StreamSignal = "drain" | "close";

/**
 * The part of ServerResponse an event stream writes to.
 * `write` returns false while the socket buffer is full, until "drain".
 */
export interface SseClient {
  write(chunk: string): boolean;
  end(): unknown;
  on(event: StreamSignal, listener: () => void): unknown;
  off(event: StreamSignal, listener: () => void): unknown;
}

export interface StreamOptions {
  /** Written before any published event */
  initial?: WireEvent[] | undefined;
  /** Published events for which this returns false are not forwarded */
  filter?: ((event: OrchestratorEvent) => boolean) | undefined;
}

interface Connection {
  unsubscribe: Unsubscribe;
  /** Aborted when the client is removed, releasing a pending drain wait */
  released: AbortController;
}

/**
 * Resolves when the client can take more data, closes, or is released.
 */
function waitForDrain(client: SseClient, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const settle = () => {
      client.off("drain", settle);
      client.off("close", settle);
      signal.removeEventListener("abort", settle);
      resolve();
    };
    client.on("drain", settle);
    client.on("close", settle);
    signal.addEventListener("abort", settle, { once: true });
  });
}

export class SseHub {
  private readonly clients = new Map<SseClient, Connection>();
  private heartbeatTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly events: ObserverHub<OrchestratorEvent>,
    private readonly heartbeatIntervalMs: number = HEARTBEAT_INTERVAL_MS
  ) {}

  /**
   * Streams every event of one scope to the client until it is removed.
   * While the client's buffer is full, further events wait in its mailbox,
   * where progress events are dropped once the mailbox is full.
   */
  open(client: SseClient, scope: string, options: StreamOptions = {}): void {
    for (const wire of options.initial ?? []) {
      client.write(formatSseMessage(wire));
    }

    const released = new AbortController();
    const filter = options.filter ?? (() => true);
    const unsubscribe = this.events.subscribe(scope, async (event) => {
      if (!filter(event) || released.signal.aborted) return;
      if (!client.write(formatSseMessage(toWireEvent(event)))) {
        await waitForDrain(client, released.signal);
      }
    });

    this.clients.set(client, { unsubscribe, released });
    this.ensureHeartbeatTimer();
  }

  removeClient(client: SseClient): void {
    const connection = this.clients.get(client);
    if (!connection) return;

    this.release(connection);
    this.clients.delete(client);
    if (this.clients.size === 0) {
      this.clearHeartbeatTimer();
    }
  }

  get size(): number {
    return this.clients.size;
  }

  closeAll(): void {
    for (const [client, connection] of this.clients) {
      this.release(connection);
      client.end();
    }
    this.clients.clear();
    this.clearHeartbeatTimer();
  }

  private release(connection: Connection): void {
    connection.released.abort();
    connection.unsubscribe();
  }

  private ensureHeartbeatTimer(): void {
    if (this.heartbeatTimer) {
      return;
    }

    this.heartbeatTimer = setInterval(() => {
      for (const client of this.clients.keys()) {
        client.write(": heartbeat\n\n");
      }
    }, this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private clearHeartbeatTimer(): void {
    if (!this.heartbeatTimer) {
      return;
    }
    clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
  }
}
