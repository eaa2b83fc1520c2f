/**
 * packages/core/src/config.ts — Widget tree configuration.
 *
 * A root widget owns the resolved config; every descendant reads it through
 * its root. Values are validated once, when the root is built or reconfigured.
 */

import { isEasingName } from "./animation/easing.js";
import { DEFAULT_TRANSITION_MS } from "./animation/transition.js";
import type { EasingInput } from "./animation/types.js";
import { createConsoleDiagnostics, silentDiagnostics } from "./diagnostics/console.js";
import type { DiagnosticsSink } from "./diagnostics/types.js";
import { WidgetError } from "./errors.js";
import type { Size } from "./layout/types.js";

export type LayoutConfig = Readonly<{
  /** Screen size in pixels; the reference for `fixed` widgets and the root's screen units. */
  screen?: Size;
  /** Where recovered configuration problems are reported. */
  diagnostics?: DiagnosticsSink;
  /** Duration for transitions started without one, in milliseconds. */
  defaultTransitionMs?: number;
  /** Easing for transitions started without one. */
  defaultEasing?: EasingInput;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedLayoutConfig = Readonly<{
  screen: Size | null;
  diagnostics: DiagnosticsSink;
  defaultTransitionMs: number;
  defaultEasing: EasingInput;
}>;

type LayoutEnv = Readonly<{
  TRELLIS_DIAGNOSTICS?: string;
}>;

function readEnv(): LayoutEnv {
  const g = globalThis as { process?: { env?: LayoutEnv } };
  return g.process?.env ?? {};
}

/** Sink used when none is configured: console, or silent under `TRELLIS_DIAGNOSTICS=silent`. */
export function defaultDiagnosticsSink(env: LayoutEnv = readEnv()): DiagnosticsSink {
  const mode = env.TRELLIS_DIAGNOSTICS?.trim().toLowerCase();
  if (mode === "silent" || mode === "off" || mode === "0") return silentDiagnostics;
  return createConsoleDiagnostics();
}

function invalidConfig(detail: string): never {
  throw new WidgetError("WIDGET_INVALID_CONFIG", detail);
}

function requireNonNegative(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidConfig(`${name} must be a finite number >= 0`);
  return v;
}

function requireScreen(screen: Size): Size {
  return Object.freeze({
    w: requireNonNegative("screen.w", screen.w),
    h: requireNonNegative("screen.h", screen.h),
  });
}

function requireEasing(easing: EasingInput): EasingInput {
  if (typeof easing === "function" || isEasingName(easing)) return easing;
  return invalidConfig(`defaultEasing "${String(easing)}" is not a known easing`);
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveLayoutConfig(
  config: LayoutConfig | undefined,
  env: LayoutEnv = readEnv(),
): ResolvedLayoutConfig {
  const c = config ?? {};
  return Object.freeze({
    screen: c.screen === undefined ? null : requireScreen(c.screen),
    diagnostics: c.diagnostics ?? defaultDiagnosticsSink(env),
    defaultTransitionMs:
      c.defaultTransitionMs === undefined
        ? DEFAULT_TRANSITION_MS
        : requireNonNegative("defaultTransitionMs", c.defaultTransitionMs),
    defaultEasing: c.defaultEasing === undefined ? "linear" : requireEasing(c.defaultEasing),
  });
}
