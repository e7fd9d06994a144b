import type { LedgerEvent, LedgerEventInput } from '../domain/types';
import { logger } from '../utils/logger';

type Subscriber = (evt: LedgerEvent) => void;

// One bus per ledger so independent deployments never see each other's events.
export class EventBus {
  private readonly subscribers = new Set<Subscriber>();
  private seq = 0;

  subscribe(fn: Subscriber): () => void {
    this.subscribers.add(fn);
    return () => {
      this.subscribers.delete(fn);
    };
  }

  emit(input: LedgerEventInput): LedgerEvent {
    this.seq += 1;
    const evt: LedgerEvent = { ...input, seq: this.seq, timestamp: new Date().toISOString() };
    for (const fn of this.subscribers) {
      try {
        fn(evt);
      } catch (err) {
        // Observers never affect the operation that produced the event.
        logger.warn(`Event subscriber failed on ${evt.type}#${evt.seq}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return evt;
  }
}
