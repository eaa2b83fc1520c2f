/**
 * packages/core/src/diagnostics/console.ts — Dev-warning diagnostics sink.
 *
 * A misconfigured widget reports the same problem every frame; this sink logs
 * each `code + path` pair once until `reset()`.
 */

import type { DiagnosticsSink, LayoutDiagnostic } from "./types.js";

type ConsoleLike = Readonly<{
  warn?: (msg: string) => void;
  error?: (msg: string) => void;
}>;

function defaultConsole(): ConsoleLike | undefined {
  return (globalThis as { console?: ConsoleLike }).console;
}

export type ConsoleDiagnostics = DiagnosticsSink &
  Readonly<{
    /** Forget which diagnostics were already logged. */
    reset: () => void;
  }>;

export function formatDiagnostic(d: LayoutDiagnostic): string {
  return `[trellis-ui] ${d.code} at ${d.path}: ${d.detail}`;
}

export function createConsoleDiagnostics(
  opts: Readonly<{ console?: ConsoleLike }> = {},
): ConsoleDiagnostics {
  const seen = new Set<string>();
  return Object.freeze({
    report(d: LayoutDiagnostic): void {
      const key = `${d.code}\u0000${d.path}`;
      if (seen.has(key)) return;
      seen.add(key);
      const c = opts.console ?? defaultConsole();
      if (d.severity === "error") c?.error?.(formatDiagnostic(d));
      else c?.warn?.(formatDiagnostic(d));
    },
    reset(): void {
      seen.clear();
    },
  });
}

export const silentDiagnostics: DiagnosticsSink = Object.freeze({
  report(): void {},
});
