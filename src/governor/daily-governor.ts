/**
 * Daily volume governor
 *
 * Caps the number of in-region leads accepted per calendar day. OPEN while
 * total < limit, CLOSED until the local date changes, which resets every
 * counter. Check and increment run in one critical section together with
 * the write of the persisted snapshot.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { format } from 'date-fns';
import { z } from 'zod';
import { Mutex } from '../util/mutex.js';
import { logger as defaultLogger } from '../util/logger.js';
import type { Logger } from '../types.js';

export const DailyCounterSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  total: z.number().int().nonnegative(),
  bySource: z.record(z.string(), z.number().int().nonnegative()),
});

export type DailyCounter = z.infer<typeof DailyCounterSchema>;

export type GovernorState = 'OPEN' | 'CLOSED';

export interface GovernorStats extends DailyCounter {
  limit: number;
  remaining: number;
  state: GovernorState;
  // remaining capacity shared out per source
  allocation: Record<string, number>;
}

/**
 * A slot taken by reserve(); hand it back with release()
 */
export interface Reservation {
  source: string;
  date: string;
}

export interface CounterStore {
  read(): Promise<DailyCounter | null>;
  write(counter: DailyCounter): Promise<void>;
}

export class MemoryCounterStore implements CounterStore {
  private snapshot: DailyCounter | null = null;

  constructor(initial?: DailyCounter) {
    this.snapshot = initial ? cloneCounter(initial) : null;
  }

  async read(): Promise<DailyCounter | null> {
    return this.snapshot ? cloneCounter(this.snapshot) : null;
  }

  async write(counter: DailyCounter): Promise<void> {
    this.snapshot = cloneCounter(counter);
  }
}

/**
 * JSON snapshot on disk, replaced atomically on every write
 */
export class FileCounterStore implements CounterStore {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  async read(): Promise<DailyCounter | null> {
    if (!existsSync(this.filePath)) {
      return null;
    }
    try {
      const parsed = DailyCounterSchema.safeParse(JSON.parse(await readFile(this.filePath, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.warn('Ignoring daily counter with unexpected shape', { path: this.filePath });
      return null;
    } catch (error) {
      this.logger.warn('Ignoring unreadable daily counter', { path: this.filePath, error });
      return null;
    }
  }

  async write(counter: DailyCounter): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(counter, null, 2), 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

export interface DailyGovernorOptions {
  limit: number;
  // configured source names, in allocation order
  sources?: readonly string[];
  store?: CounterStore;
  now?: () => Date;
  logger?: Logger;
}

export class DailyVolumeGovernor {
  private readonly limit: number;
  private readonly sources: readonly string[];
  private readonly store: CounterStore;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private counter: DailyCounter;

  constructor(options: DailyGovernorOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 0) {
      throw new Error(`Daily limit must be a non-negative integer, got ${options.limit}`);
    }
    this.limit = options.limit;
    this.sources = options.sources ?? [];
    this.store = options.store ?? new MemoryCounterStore();
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.counter = emptyCounter(this.today());
  }

  /**
   * Restore today's counter from the store; a snapshot from another day is
   * discarded
   */
  load(): Promise<DailyCounter> {
    return this.mutex.runExclusive(async () => {
      const stored = await this.store.read();
      const today = this.today();
      this.counter = stored && stored.date === today ? cloneCounter(stored) : emptyCounter(today);
      this.logger.debug('Daily counter loaded', { date: today, total: this.counter.total });
      return cloneCounter(this.counter);
    });
  }

  /**
   * Advisory: another caller may take the last slot before accept() runs
   */
  canAccept(): boolean {
    this.rollover();
    return this.counter.total < this.limit;
  }

  /**
   * Atomically check and count one in-region lead for `source`
   */
  async accept(source: string): Promise<boolean> {
    return (await this.reserve(source)) !== null;
  }

  /**
   * Like accept(), but returns the slot so it can be given back
   */
  reserve(source: string): Promise<Reservation | null> {
    return this.mutex.runExclusive(async () => {
      this.rollover();
      if (this.counter.total >= this.limit) {
        return null;
      }

      this.counter.total++;
      this.counter.bySource[source] = (this.counter.bySource[source] ?? 0) + 1;
      await this.persist();

      if (this.counter.total === this.limit) {
        this.logger.info('Daily lead limit reached', { date: this.counter.date, limit: this.limit });
      }
      return { source, date: this.counter.date };
    });
  }

  /**
   * Return a reserved slot. Slots from a previous day are ignored.
   */
  release(reservation: Reservation): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.rollover();
      if (reservation.date !== this.counter.date || this.counter.total === 0) {
        return;
      }

      this.counter.total--;
      const current = this.counter.bySource[reservation.source] ?? 0;
      if (current <= 1) {
        delete this.counter.bySource[reservation.source];
      } else {
        this.counter.bySource[reservation.source] = current - 1;
      }
      await this.persist();
    });
  }

  state(): GovernorState {
    return this.canAccept() ? 'OPEN' : 'CLOSED';
  }

  /**
   * Split today's remaining capacity evenly across the configured sources
   * and any source already counted today; earlier sources take the
   * remainder, one each.
   */
  allocation(): Record<string, number> {
    this.rollover();
    const sources = Array.from(new Set([...this.sources, ...Object.keys(this.counter.bySource)]));
    if (sources.length === 0) {
      return {};
    }

    const remaining = Math.max(this.limit - this.counter.total, 0);
    const share = Math.floor(remaining / sources.length);
    const extra = remaining % sources.length;
    return Object.fromEntries(sources.map((source, index) => [source, share + (index < extra ? 1 : 0)]));
  }

  stats(): GovernorStats {
    this.rollover();
    return {
      ...cloneCounter(this.counter),
      limit: this.limit,
      remaining: Math.max(this.limit - this.counter.total, 0),
      state: this.counter.total < this.limit ? 'OPEN' : 'CLOSED',
      allocation: this.allocation(),
    };
  }

  private today(): string {
    return format(this.now(), 'yyyy-MM-dd');
  }

  private rollover(): void {
    const today = this.today();
    if (this.counter.date !== today) {
      this.logger.info('Daily counter reset', { previousDate: this.counter.date, date: today });
      this.counter = emptyCounter(today);
    }
  }

  private async persist(): Promise<void> {
    try {
      await this.store.write(cloneCounter(this.counter));
    } catch (error) {
      // in-memory counter stays authoritative for this process
      this.logger.error('Failed to persist daily counter', { error });
    }
  }
}

function emptyCounter(date: string): DailyCounter {
  return { date, total: 0, bySource: {} };
}

function cloneCounter(counter: DailyCounter): DailyCounter {
  return { date: counter.date, total: counter.total, bySource: { ...counter.bySource } };
}
