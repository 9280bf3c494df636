/**
 * Counts messages accepted into the pipeline.
 *
 * Deliveries reach the counter one callback at a time on the event loop, so
 * `increment` returning the new value is enough for an exactly-once equality
 * check against the target count.
 */
export class ReceivedMessageCounter {
  #count = 0;
  #frozen = false;

  increment(): number {
    if (this.#frozen) {
      throw new Error("Counter is frozen");
    }
    this.#count += 1;
    return this.#count;
  }

  /**
   * Stops further increments; the final value is kept for reporting
   */
  freeze(): number {
    this.#frozen = true;
    return this.#count;
  }

  get value(): number {
    return this.#count;
  }

  get frozen(): boolean {
    return this.#frozen;
  }
}
