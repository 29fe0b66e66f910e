/**
 * Coordinates workers that share one local image store.
 *
 * An entry claims its image references while it transfers. When it leaves,
 * references no other entry holds are handed back as removable and stay
 * reserved until the entry calls done(), so a worker starting the same image
 * waits for the removal instead of racing it. Exclusive sections (a prune of
 * everything unused) wait for every transfer to finish and hold new entries
 * back until they settle.
 */
export class EntryGate {
  private claims = new Map<string, number>();
  private reserved = new Map<string, Promise<void>>();
  private active = 0;
  private idleWaiters: Array<() => void> = [];
  private barrier: { done: Promise<void>; lift: () => void } | null = null;
  private pendingExclusive = 0;
  private exclusiveTail: Promise<void> = Promise.resolve();

  get inFlight(): number {
    return this.active;
  }

  async enter(refs: readonly string[]): Promise<void> {
    for (;;) {
      const pending = this.barrier?.done ?? refs.map(ref => this.reserved.get(ref)).find(p => p !== undefined);
      if (!pending) break;
      await pending;
    }

    this.active++;
    for (const ref of refs) {
      this.claims.set(ref, (this.claims.get(ref) ?? 0) + 1);
    }
  }

  /**
   * Drop this entry's claims. The returned references are held by nobody
   * else and stay reserved until done() is called.
   */
  leave(refs: readonly string[]): GateRelease {
    const removable: string[] = [];
    for (const ref of refs) {
      const count = (this.claims.get(ref) ?? 1) - 1;
      if (count > 0) {
        this.claims.set(ref, count);
      } else {
        this.claims.delete(ref);
        removable.push(ref);
      }
    }

    let resolve!: () => void;
    const reservation = new Promise<void>(r => { resolve = r; });
    for (const ref of removable) {
      this.reserved.set(ref, reservation);
    }

    this.active--;
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(wake => wake());
    }

    return {
      removable,
      done: () => {
        for (const ref of removable) {
          if (this.reserved.get(ref) === reservation) this.reserved.delete(ref);
        }
        resolve();
      },
    };
  }

  /**
   * Run fn once no entry is transferring. From this call until every queued
   * section has settled, new entries wait.
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.pendingExclusive++;
    if (!this.barrier) {
      let lift!: () => void;
      const done = new Promise<void>(r => { lift = r; });
      this.barrier = { done, lift };
    }

    const run = this.exclusiveTail.then(async () => {
      await this.idle();
      return fn();
    });

    // A failed section reaches its caller through run; the queue moves on
    this.exclusiveTail = run.then(() => undefined, () => undefined).then(() => {
      this.pendingExclusive--;
      if (this.pendingExclusive === 0 && this.barrier) {
        const { lift } = this.barrier;
        this.barrier = null;
        lift();
      }
    });
    return run;
  }

  private idle(): Promise<void> {
    if (this.active === 0) return Promise.resolve();
    return new Promise<void>(resolve => this.idleWaiters.push(() => resolve()));
  }
}

export interface GateRelease {
  removable: string[];
  done(): void;
}
