/**
 * packages/core/src/perf/perf.ts — Frame pass instrumentation.
 *
 * Opt-in via TRELLIS_PERF=1. Zero-cost when disabled: every entry point
 * returns before touching the aggregator.
 */

export type PerfPhase = "transitions" | "layout";

export const PERF_PHASES: readonly PerfPhase[] = Object.freeze(["transitions", "layout"]);

export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in PerfPhase]?: PhaseStats }>;
}>;

/** Token returned by perfMarkStart for timing correlation. */
export type PerfToken = number;

export const PERF_ENABLED: boolean = (() => {
  const g = globalThis as { process?: { env?: { TRELLIS_PERF?: string } } };
  return g.process?.env?.TRELLIS_PERF === "1";
})();

const now: () => number = (() => {
  const g = globalThis as { performance?: { now?: () => number } };
  const perf = g.performance;
  if (perf && typeof perf.now === "function") return () => perf.now?.() ?? Date.now();
  return () => Date.now();
})();

/** Samples kept per phase; older samples are overwritten. */
const RING_CAP = 512;

class PhaseRing {
  private readonly samples = new Float64Array(RING_CAP);
  private cursor = 0;
  private size = 0;
  private total = 0;
  private peak = 0;
  private recorded = 0;

  push(ms: number): void {
    if (this.size >= RING_CAP) this.total -= this.samples[this.cursor] ?? 0;
    this.samples[this.cursor] = ms;
    this.total += ms;
    this.cursor = (this.cursor + 1) % RING_CAP;
    this.size = Math.min(this.size + 1, RING_CAP);
    this.recorded++;
    if (ms > this.peak) this.peak = ms;
  }

  stats(): PhaseStats | null {
    if (this.size === 0) return null;
    const sorted = Array.from(this.samples.subarray(0, this.size)).sort((a, b) => a - b);
    const at = (q: number): number =>
      sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
    return Object.freeze({
      count: this.recorded,
      avg: this.total / this.size,
      p50: at(0.5),
      p95: at(0.95),
      max: this.peak,
    });
  }
}

const rings = new Map<PerfPhase, PhaseRing>();

/** Record a duration directly. Exposed for tests and external timers. */
export function perfRecord(phase: PerfPhase, durationMs: number, force = false): void {
  if (!PERF_ENABLED && !force) return;
  let ring = rings.get(phase);
  if (!ring) {
    ring = new PhaseRing();
    rings.set(phase, ring);
  }
  ring.push(durationMs);
}

export function perfMarkStart(): PerfToken {
  if (!PERF_ENABLED) return 0;
  return now();
}

export function perfMarkEnd(phase: PerfPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  perfRecord(phase, now() - token);
}

export function perfSnapshot(): PerfSnapshot {
  const phases: { [K in PerfPhase]?: PhaseStats } = {};
  for (const p of PERF_PHASES) {
    const stats = rings.get(p)?.stats();
    if (stats) phases[p] = stats;
  }
  return Object.freeze({ phases: Object.freeze(phases) });
}

export function perfReset(): void {
  rings.clear();
}
