import { Clock, systemClock } from './time';

/**
 * Set whose whole contents expire together once `ttlMs` has passed since it
 * was created or last cleared. Expiry is checked lazily on every access.
 */
export class ExpiringSet<T> {
  private readonly values = new Set<T>();
  private windowStart: number;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {
    this.windowStart = clock();
  }

  has(value: T): boolean {
    this.expireIfDue();
    return this.values.has(value);
  }

  add(value: T): void {
    this.expireIfDue();
    this.values.add(value);
  }

  addAll(values: Iterable<T>): void {
    this.expireIfDue();
    for (const value of values) {
      this.values.add(value);
    }
  }

  clear(): void {
    this.values.clear();
    this.windowStart = this.clock();
  }

  get size(): number {
    this.expireIfDue();
    return this.values.size;
  }

  /** Time at which the current contents expire */
  expiresAt(): number {
    return this.windowStart + this.ttlMs;
  }

  private expireIfDue(): void {
    if (this.clock() - this.windowStart >= this.ttlMs) {
      this.clear();
    }
  }
}
