import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { LedgerEvent } from '../domain/types';
import type { EventBus } from '../services/eventBus';

// On-disk shape: bigint amounts are written as decimal strings.
const storedEventsSchema = z.array(z.record(z.union([z.string(), z.number()])));

export type StoredLedgerEvent = Record<string, string | number>;

export function serializeEvent(evt: LedgerEvent): StoredLedgerEvent {
  const out: StoredLedgerEvent = {};
  for (const [key, value] of Object.entries(evt)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}

async function ensureFile(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  try {
    await readFile(path, 'utf8');
  } catch {
    await writeFile(path, '[]', 'utf8');
  }
}

export async function readStoredEvents(path: string): Promise<StoredLedgerEvent[]> {
  await ensureFile(path);
  const raw = await readFile(path, 'utf8');
  const parsed = storedEventsSchema.safeParse(JSON.parse(raw || '[]'));
  if (!parsed.success) throw new Error(`Event file ${path} is not a list of events`);
  return parsed.data;
}

// Append-only history of ledger events. Collects from the bus synchronously
// and writes to `path` on flush().
export class EventJournal {
  private readonly events: LedgerEvent[] = [];
  private pending: LedgerEvent[] = [];
  // Tail of the write queue; flushes run one at a time.
  private writing: Promise<unknown> = Promise.resolve();
  private readonly unsubscribe: () => void;

  constructor(bus: EventBus, private readonly path?: string) {
    this.unsubscribe = bus.subscribe((evt) => {
      this.events.push(evt);
      this.pending.push(evt);
    });
  }

  all(): LedgerEvent[] {
    return [...this.events];
  }

  flush(): Promise<number> {
    const run = this.writing.then(() => this.writePending());
    // A failed write is reported to its own caller and keeps its batch in
    // `pending`; the queue carries on.
    this.writing = run.catch(() => undefined);
    return run;
  }

  private async writePending(): Promise<number> {
    if (!this.path || this.pending.length === 0) return 0;
    const batch = this.pending;
    this.pending = [];
    try {
      const stored = await readStoredEvents(this.path);
      stored.push(...batch.map(serializeEvent));
      await writeFile(this.path, JSON.stringify(stored, null, 2), 'utf8');
    } catch (err) {
      this.pending = batch.concat(this.pending);
      throw err;
    }
    return batch.length;
  }

  close(): void {
    this.unsubscribe();
  }
}
