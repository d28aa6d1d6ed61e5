// Per-instrument signal cooldown. One instance per scan context; the scan
// loop is its only writer.

export class CooldownTracker {
  private readonly lastSignalAtMs = new Map<string, number>();

  isCooledDown(instrument: string, now: number, cooldownMs: number): boolean {
    const last = this.lastSignalAtMs.get(instrument);
    if (last === undefined) return true;
    return now - last >= Math.max(0, cooldownMs);
  }

  record(instrument: string, now: number): void {
    this.lastSignalAtMs.set(instrument, now);
  }

  /** Drops entries at least `retentionMs` old. Returns how many went. */
  sweep(now: number, retentionMs: number): number {
    let removed = 0;
    for (const [instrument, last] of this.lastSignalAtMs) {
      if (now - last >= retentionMs) {
        this.lastSignalAtMs.delete(instrument);
        removed++;
      }
    }
    return removed;
  }

  lastSignalAt(instrument: string): number | undefined {
    return this.lastSignalAtMs.get(instrument);
  }

  entries(): Array<{ instrument: string; lastSignalAt: number }> {
    return Array.from(this.lastSignalAtMs, ([instrument, lastSignalAt]) => ({ instrument, lastSignalAt }));
  }

  get size(): number {
    return this.lastSignalAtMs.size;
  }
}
