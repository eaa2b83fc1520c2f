/**
 * packages/core/src/diagnostics/types.ts — Layout diagnostic records.
 *
 * A diagnostic describes a configuration problem the frame pass recovered
 * from by substituting a fallback value. Codes are stable strings so sinks
 * can aggregate them.
 */

export type LayoutDiagnosticCode =
  /** Parent- or screen-relative unit resolved with no such reference (fallback 0). */
  | "unit.noReference"
  /** NaN or infinite length value (fallback 0). */
  | "unit.nonFinite"
  /** Resolved min size larger than max size on some axis (min wins). */
  | "constraint.minExceedsMax"
  /** Anchor margins on a stretched axis exceed the reference extent (size 0). */
  | "anchor.marginsExceedReference"
  /** Docked size larger than the remaining free rect (clamped to remaining). */
  | "dock.sizeExceedsRemaining"
  /** Resolving a node threw; the node degraded to a zero-size rect. */
  | "node.resolveFailed";

export type DiagnosticSeverity = "warn" | "error";

export type LayoutDiagnostic = Readonly<{
  code: LayoutDiagnosticCode;
  severity: DiagnosticSeverity;
  /** Widget path from the root, e.g. `root>sidebar>title`. */
  path: string;
  detail: string;
}>;

export type DiagnosticsSink = Readonly<{
  report: (diagnostic: LayoutDiagnostic) => void;
}>;

/** Reporter handed to pure resolvers; the caller attaches path and severity. */
export type IssueReporter = (code: LayoutDiagnosticCode, detail: string) => void;

export const DIAGNOSTIC_SEVERITY: Readonly<Record<LayoutDiagnosticCode, DiagnosticSeverity>> =
  Object.freeze({
    "unit.noReference": "warn",
    "unit.nonFinite": "warn",
    "constraint.minExceedsMax": "warn",
    "anchor.marginsExceedReference": "warn",
    "dock.sizeExceedsRemaining": "warn",
    "node.resolveFailed": "error",
  });
