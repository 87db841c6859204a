import type { LedgerEvent } from "@trustledger/shared-types";

export interface EventSink {
  emit(event: LedgerEvent): void;
}

export class RecordingEventSink implements EventSink {
  private events: LedgerEvent[] = [];

  emit(event: LedgerEvent): void {
    this.events.push(event);
  }

  list(): LedgerEvent[] {
    return [...this.events];
  }

  drain(): LedgerEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}

export const NULL_EVENT_SINK: EventSink = {
  emit() {},
};

/** Omit that distributes over each member of an event union. */
export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
