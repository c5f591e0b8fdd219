export type ReleaseGuard = () => void;

/**
 * Registry of subscribers with a check in flight.
 *
 * `tryAcquire` tests and inserts in one synchronous step, so a sweep and an
 * on-demand request for the same subscriber can never both get a handle.
 */
export class CheckGuard {
  private readonly active = new Set<string>();

  tryAcquire(subscriberId: string): ReleaseGuard | null {
    if (this.active.has(subscriberId)) {
      return null;
    }

    this.active.add(subscriberId);
    let released = false;

    return () => {
      if (released) {
        return;
      }

      released = true;
      this.active.delete(subscriberId);
    };
  }

  isHeld(subscriberId: string): boolean {
    return this.active.has(subscriberId);
  }

  get size(): number {
    return this.active.size;
  }
}
