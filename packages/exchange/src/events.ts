/**
 * @souk/exchange — In-memory event log.
 *
 * Receives the events of each committed call, in order, and assigns
 * global positions starting at 1. Subscribers are dispatched
 * synchronously after the append. A subscriber that throws does not
 * undo the append or stop later subscribers; the failure is recorded
 * and passed to `onSubscriberError`.
 */

import type { DomainEvent } from "@souk/types";

/**
 * An event as held by the log.
 */
export interface LoggedEvent {
  readonly position: number;
  readonly event: DomainEvent;
}

export interface EventLogReadOptions {
  /** First position to return (inclusive, 1-based). Default: 1 */
  readonly fromPosition?: number | undefined;

  /** Maximum number of events to return. Default: unlimited */
  readonly maxCount?: number | undefined;

  /** Only events of this type */
  readonly type?: string | undefined;
}

export type EventLogHandler = (logged: LoggedEvent) => void;

export interface EventLogSubscription {
  unsubscribe(): void;
}

/**
 * A subscriber error raised while dispatching a committed event.
 */
export interface SubscriberFailure {
  readonly position: number;
  readonly error: unknown;
}

export interface ExchangeEventLogOptions {
  readonly onSubscriberError?: ((error: unknown, logged: LoggedEvent) => void) | undefined;
}

export class ExchangeEventLog {
  private readonly _log: LoggedEvent[] = [];
  private readonly _subscribers = new Set<EventLogHandler>();
  private readonly _failures: SubscriberFailure[] = [];
  private readonly onSubscriberError: ((error: unknown, logged: LoggedEvent) => void) | undefined;

  constructor(options?: ExchangeEventLogOptions) {
    this.onSubscriberError = options?.onSubscriberError;
  }

  append(events: readonly DomainEvent[]): readonly LoggedEvent[] {
    const logged = events.map((event) => {
      const entry: LoggedEvent = { position: this._log.length + 1, event };
      this._log.push(entry);
      return entry;
    });

    for (const entry of logged) {
      for (const handler of [...this._subscribers]) {
        try {
          handler(entry);
        } catch (error) {
          this._failures.push({ position: entry.position, error });
          this.onSubscriberError?.(error, entry);
        }
      }
    }

    return logged;
  }

  readAll(options?: EventLogReadOptions): readonly LoggedEvent[] {
    const from = options?.fromPosition ?? 1;
    const matching = this._log.filter(
      (entry) =>
        entry.position >= from &&
        (options?.type === undefined || entry.event.type === options.type),
    );
    return options?.maxCount !== undefined ? matching.slice(0, options.maxCount) : matching;
  }

  subscribe(handler: EventLogHandler): EventLogSubscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  /** Subscriber errors seen so far, in dispatch order. */
  get subscriberFailures(): readonly SubscriberFailure[] {
    return this._failures;
  }

  get length(): number {
    return this._log.length;
  }
}
