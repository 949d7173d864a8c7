import { systemClock, type Clock } from "@brokerkit/contracts";

export interface NonceSource {
  next(): number;
}

/**
 * Strictly increasing nonce seeded from wall-clock milliseconds. A value is
 * consumed as soon as it is handed out, even if the request is never sent.
 */
export class NonceCounter implements NonceSource {
  private last = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  next(): number {
    this.last = Math.max(this.last + 1, this.clock.now().getTime());
    return this.last;
  }
}

/** One counter per credential generation, shared by every signer of it. */
export class NonceRegistry {
  private readonly counters = new Map<string, { readonly generation: number; readonly counter: NonceCounter }>();

  constructor(private readonly clock: Clock = systemClock) {}

  counterFor(key: string, generation: number): NonceCounter {
    const existing = this.counters.get(key);
    if (existing && existing.generation === generation) {
      return existing.counter;
    }
    const counter = new NonceCounter(this.clock);
    this.counters.set(key, { generation, counter });
    return counter;
  }

  release(key: string): void {
    this.counters.delete(key);
  }
}
