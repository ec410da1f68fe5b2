/**
 * Monotonic request numbering per slot.
 *
 * Every issued request takes the next number for its slot; a completion is
 * applied only if its number is still the latest for that slot. Responses are
 * never cancelled, only ignored when stale.
 */
export class RequestGenerations<Slot extends string> {
  private readonly latest = new Map<Slot, number>();

  issue(slot: Slot): number {
    const next = (this.latest.get(slot) ?? 0) + 1;
    this.latest.set(slot, next);
    return next;
  }

  isCurrent(slot: Slot, generation: number): boolean {
    return this.latest.get(slot) === generation;
  }

  /** Make every in-flight request of the slot stale without starting a new one. */
  invalidate(slot: Slot): void {
    this.issue(slot);
  }
}
