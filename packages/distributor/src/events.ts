/**
 * Event Publisher — stamps and delivers distributor events on commit.
 *
 * Events raised inside a transaction are held until the outermost
 * operation commits; a rollback discards them. Sequence numbers are
 * assigned at delivery, so they have no gaps.
 *
 * A listener that throws does not undo the committed operation. Its
 * error goes to `onListenerError` when one is given, and the operation
 * returns normally; without one, the error reaches the caller after
 * every other event of the operation has been delivered.
 */

import type { TransactionJournal } from "@rewardstream/accrual";
import type { Clock, DistributorEvent, Identity } from "@rewardstream/types";
import type { EventListener, ListenerErrorHook } from "./types.js";

type Unstamped<E> = E extends unknown ? Omit<E, "metadata"> : never;

/** A distributor event before metadata is attached. */
export type UnstampedEvent = Unstamped<DistributorEvent>;

export class EventPublisher {
  private sequence = 0;
  private readonly journal: TransactionJournal;
  private readonly clock: Clock;
  private readonly listener: EventListener | undefined;
  private readonly onListenerError: ListenerErrorHook | undefined;

  constructor(
    journal: TransactionJournal,
    clock: Clock,
    listener?: EventListener,
    onListenerError?: ListenerErrorHook,
  ) {
    this.journal = journal;
    this.clock = clock;
    this.listener = listener;
    this.onListenerError = onListenerError;
  }

  publish(event: UnstampedEvent, actor: Identity): void {
    const timestamp = this.clock.now();
    this.journal.onCommit(() => {
      this.sequence += 1;
      this.deliver({
        ...event,
        metadata: { sequence: this.sequence, timestamp, actor },
      });
    });
  }

  private deliver(event: DistributorEvent): void {
    if (this.listener === undefined) {
      return;
    }
    if (this.onListenerError === undefined) {
      this.listener(event);
      return;
    }
    try {
      this.listener(event);
    } catch (err) {
      this.onListenerError(err, event);
    }
  }
}
