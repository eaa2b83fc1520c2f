/**
 * packages/core/src/diagnostics/collector.ts — Aggregating diagnostics sink.
 *
 * Why: Frame passes repeat the same configuration problem every tick. The
 * collector folds repeats into one entry per `code + path` with a count,
 * keeps insertion order, and evicts the oldest entry past `maxEntries`.
 *
 * Usage:
 *   const diagnostics = createDiagnosticsCollector();
 *   const root = createRootWidget({ config: { screen, diagnostics } });
 *   root.update(16);
 *   diagnostics.byCode("unit.noReference");
 */

import type {
  DiagnosticSeverity,
  DiagnosticsSink,
  LayoutDiagnostic,
  LayoutDiagnosticCode,
} from "./types.js";

export type AggregatedDiagnostic = Readonly<{
  code: LayoutDiagnosticCode;
  severity: DiagnosticSeverity;
  path: string;
  /** Detail of the most recent report. */
  detail: string;
  count: number;
  /** Sequence number of the first and latest report (1-based, monotonic). */
  firstSeq: number;
  lastSeq: number;
}>;

export type DiagnosticsListener = (diagnostic: LayoutDiagnostic) => void;

export type DiagnosticsCollector = DiagnosticsSink &
  Readonly<{
    all: () => readonly AggregatedDiagnostic[];
    byCode: (code: LayoutDiagnosticCode) => readonly AggregatedDiagnostic[];
    /** Total number of reports received, including folded repeats. */
    totalReports: () => number;
    clear: () => void;
    /** Returns an unsubscribe function. */
    subscribe: (listener: DiagnosticsListener) => () => void;
  }>;

const DEFAULT_MAX_ENTRIES = 256;

function normalizeMaxEntries(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_MAX_ENTRIES;
  return Math.max(1, Math.trunc(value));
}

export function createDiagnosticsCollector(
  opts: Readonly<{ maxEntries?: number }> = {},
): DiagnosticsCollector {
  const maxEntries = normalizeMaxEntries(opts.maxEntries);
  const entries = new Map<string, AggregatedDiagnostic>();
  const listeners = new Set<DiagnosticsListener>();
  let seq = 0;

  function report(d: LayoutDiagnostic): void {
    seq++;
    const key = `${d.code}\u0000${d.path}`;
    const prev = entries.get(key);
    if (prev) {
      entries.set(
        key,
        Object.freeze({ ...prev, detail: d.detail, count: prev.count + 1, lastSeq: seq }),
      );
    } else {
      if (entries.size >= maxEntries) {
        const oldest = entries.keys().next();
        if (!oldest.done) entries.delete(oldest.value);
      }
      entries.set(
        key,
        Object.freeze({
          code: d.code,
          severity: d.severity,
          path: d.path,
          detail: d.detail,
          count: 1,
          firstSeq: seq,
          lastSeq: seq,
        }),
      );
    }
    for (const listener of Array.from(listeners)) listener(d);
  }

  return Object.freeze({
    report,
    all: () => Object.freeze(Array.from(entries.values())),
    byCode: (code: LayoutDiagnosticCode) =>
      Object.freeze(Array.from(entries.values()).filter((e) => e.code === code)),
    totalReports: () => seq,
    clear(): void {
      entries.clear();
      seq = 0;
    },
    subscribe(listener: DiagnosticsListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  });
}
