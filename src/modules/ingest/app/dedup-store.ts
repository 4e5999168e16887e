import { injectable } from 'inversify';
import { Mutex } from '@/core/mutex';
import type { IDedupStore } from '../domain/port/dedup-store.interface';

/**
 * Process-lifetime identity set. Entries are never evicted; restarting the process
 * forgets everything.
 */
@injectable()
export class InMemoryDedupStore implements IDedupStore {
  private readonly seen = new Set<string>();
  private readonly mutex = new Mutex();

  public get size(): number {
    return this.seen.size;
  }

  public async contains(id: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.seen.has(id));
  }

  public async mark(id: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.seen.add(id);
    });
  }

  public async checkAndMark(id: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      if (this.seen.has(id)) {
        return false;
      }
      this.seen.add(id);
      return true;
    });
  }
}
