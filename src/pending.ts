import { DuplicateCorrelationIdError } from "./errors.ts";
import type { PendingOutcome } from "./types.ts";

interface PendingSlot<T> {
  settle: (outcome: PendingOutcome<T>) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * One-shot completion slots keyed by correlation id.
 *
 * Every slot settles exactly once: resolved by a reply, timed out, or
 * cancelled. The slot leaves the table in the same step it settles, so a
 * late reply for the id finds nothing and is dropped.
 */
export class PendingTable<T> {
  private slots = new Map<string, PendingSlot<T>>();

  open(id: string, timeoutMs: number): Promise<PendingOutcome<T>> {
    if (this.slots.has(id)) throw new DuplicateCorrelationIdError(id);

    return new Promise<PendingOutcome<T>>((resolve) => {
      const timer = setTimeout(() => {
        this.settle(id, { status: "timed_out" });
      }, timeoutMs);
      this.slots.set(id, { settle: resolve, timer });
    });
  }

  resolve(id: string, value: T): boolean {
    return this.settle(id, { status: "resolved", value });
  }

  cancel(id: string, reason: string): boolean {
    return this.settle(id, { status: "cancelled", reason });
  }

  cancelAll(reason: string): number {
    const ids = [...this.slots.keys()];
    for (const id of ids) this.cancel(id, reason);
    return ids.length;
  }

  has(id: string): boolean {
    return this.slots.has(id);
  }

  get size(): number {
    return this.slots.size;
  }

  private settle(id: string, outcome: PendingOutcome<T>): boolean {
    const slot = this.slots.get(id);
    if (!slot) return false;
    clearTimeout(slot.timer);
    this.slots.delete(id);
    slot.settle(outcome);
    return true;
  }
}
