/**
 * packages/core/src/errors.ts — Programming-error signalling for widget operations.
 *
 * Configuration problems met during a frame (bad units, inverted bounds,
 * oversized docks) never throw; they go to the diagnostics sink. A WidgetError
 * is thrown only by a mutating call whose arguments cannot be honoured.
 */

/** Deterministic error codes surfaced as WidgetError instances. */
export type WidgetErrorCode =
  | "WIDGET_NO_PARENT"
  | "WIDGET_CYCLE"
  | "WIDGET_DISPOSED"
  | "WIDGET_INVALID_ARGUMENT"
  | "WIDGET_INVALID_CONFIG";

export class WidgetError extends Error {
  override readonly name = "WidgetError";
  readonly code: WidgetErrorCode;

  constructor(code: WidgetErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WidgetError);
    }
  }
}

export function isWidgetError(value: unknown): value is WidgetError {
  return value instanceof WidgetError;
}

/** Render an arbitrary thrown value as a single-line detail string. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  if (typeof v === "string") return v;
  try {
    return String(v);
  } catch {
    return "<unprintable thrown value>";
  }
}
