/**
 * Publish/subscribe registry keyed by scope (a job id or a batch id).
 *
 * Each subscriber owns a bounded Mailbox, so publishing only enqueues and a slow
 * or stalled subscriber never holds up the publisher or other subscribers.
 * Events for a scope reach each subscriber in publish order. There is no replay:
 * a subscriber sees only what is published after it subscribed.
 */
import { Mailbox, type Listener } from "./mailbox.js";

export type Unsubscribe = () => void;

export interface SubscribeOptions {
  /** Overrides the hub's default mailbox capacity */
  capacity?: number | undefined;
}

export interface ObserverHubOptions<E> {
  /** Default mailbox capacity per subscriber */
  capacity?: number | undefined;
  /** Events that may be dropped when a subscriber falls behind */
  isDroppable?: ((event: E) => boolean) | undefined;
  /** Receives errors thrown by listeners */
  onListenerError?: ((error: unknown, scope: string, event: E) => void) | undefined;
}

export const DEFAULT_MAILBOX_CAPACITY = 256;

export class ObserverHub<E> {
  private readonly scopes = new Map<string, Set<Mailbox<E>>>();
  private readonly capacity: number;
  private readonly isDroppable: (event: E) => boolean;
  private readonly onListenerError: (error: unknown, scope: string, event: E) => void;

  constructor(options: ObserverHubOptions<E> = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_MAILBOX_CAPACITY);
    this.isDroppable = options.isDroppable ?? (() => false);
    this.onListenerError = options.onListenerError ?? (() => undefined);
  }

  /**
   * Registers a listener for one scope.
   * @returns A function that removes the listener and discards its pending events.
   */
  subscribe(scope: string, listener: Listener<E>, options: SubscribeOptions = {}): Unsubscribe {
    const mailbox = new Mailbox<E>(listener, {
      capacity: Math.max(1, options.capacity ?? this.capacity),
      isDroppable: this.isDroppable,
      onError: (error, event) => this.onListenerError(error, scope, event),
    });

    let subscribers = this.scopes.get(scope);
    if (!subscribers) {
      subscribers = new Set();
      this.scopes.set(scope, subscribers);
    }
    subscribers.add(mailbox);

    return () => {
      mailbox.close();
      const current = this.scopes.get(scope);
      if (!current) return;
      current.delete(mailbox);
      if (current.size === 0) {
        this.scopes.delete(scope);
      }
    };
  }

  /**
   * Delivers an event to every current subscriber of the scope.
   */
  publish(scope: string, event: E): void {
    const subscribers = this.scopes.get(scope);
    if (!subscribers) return;

    // Snapshot so listeners that unsubscribe during delivery don't affect this pass
    for (const mailbox of [...subscribers]) {
      mailbox.push(event);
    }
  }

  subscriberCount(scope: string): number {
    return this.scopes.get(scope)?.size ?? 0;
  }

  /**
   * Resolves once every subscriber has received everything published so far.
   */
  async idle(): Promise<void> {
    const mailboxes = [...this.scopes.values()].flatMap((set) => [...set]);
    await Promise.all(mailboxes.map((mailbox) => mailbox.idle()));
  }

  /**
   * Drops every subscriber.
   */
  close(): void {
    for (const subscribers of this.scopes.values()) {
      for (const mailbox of subscribers) mailbox.close();
    }
    this.scopes.clear();
  }
}
