// ─── Seeded RNG ──────────────────────────────────────────────────────────────
// Park–Miller minimal standard generator. One instance is created per
// generation run and passed explicitly to every table generator, so the draw
// order (and therefore the output) is fixed by the call sequence alone.

export class SeededRNG {
  private s: number;

  constructor(seed: number) {
    const folded = Math.floor(Math.abs(seed)) % 2147483647;
    this.s = folded || 1;
  }

  /** Uniform in [0, 1). */
  next(): number { this.s = (this.s * 16807) % 2147483647; return (this.s - 1) / 2147483646; }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number { return Math.floor(this.next() * (max - min + 1)) + min; }

  float(min: number, max: number): number { return this.next() * (max - min) + min; }

  pick<T>(arr: readonly T[]): T { return arr[Math.floor(this.next() * arr.length)]; }

  /** Categorical draw; weights need not sum to 1. */
  weighted<T>(items: readonly T[], weights: readonly number[]): T {
    const total = weights.reduce((s, w) => s + w, 0);
    const r = this.next() * total;
    let cum = 0;
    for (let i = 0; i < items.length; i++) {
      cum += weights[i] ?? 0;
      if (r < cum) return items[i];
    }
    return items[items.length - 1];
  }

  bernoulli(p: number): boolean { return this.next() < p; }

  /** Box–Muller, one uniform pair per call. */
  normal(mean = 0, sd = 1): number {
    const u1 = Math.max(1e-12, this.next());
    const u2 = this.next();
    return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  /** k distinct elements, partial Fisher–Yates over a copy. */
  sample<T>(arr: readonly T[], k: number): T[] {
    const pool = [...arr];
    const n = Math.min(Math.max(0, k), pool.length);
    for (let i = 0; i < n; i++) {
      const j = this.int(i, pool.length - 1);
      const tmp = pool[i];
      pool[i] = pool[j];
      pool[j] = tmp;
    }
    return pool.slice(0, n);
  }
}
