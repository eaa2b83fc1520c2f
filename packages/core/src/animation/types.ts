/**
 * packages/core/src/animation/types.ts — Transition and easing types.
 *
 * Why: Easing curves map progress t ∈ [0, 1] to eased progress; tweening
 * functions lift a curve onto raw start/end values and a time window, which
 * is what widget transitions consume.
 */

/** Easing function input/output in [0..1]. */
export type EasingFunction = (t: number) => number;

/** Built-in easing presets. */
export type EasingName =
  | "linear"
  | "easeInQuad"
  | "easeOutQuad"
  | "easeInOutQuad"
  | "easeInCubic"
  | "easeOutCubic"
  | "easeInOutCubic"
  | "easeInExpo"
  | "easeOutExpo"
  | "easeInOutExpo"
  | "easeInBack"
  | "easeOutBack"
  | "easeInOutBack"
  | "easeOutBounce"
  | "easeInBounce";

/** Easing value accepted by transition APIs. */
export type EasingInput = EasingName | EasingFunction;

/**
 * Pure interpolation over a time window.
 * Must return `start` at `currentTime = 0` and `end` at `currentTime = finalTime`.
 */
export type TweeningFunction = (
  start: number,
  end: number,
  currentTime: number,
  finalTime: number,
) => number;

/** Blend two raw values of one kind through a tweening function. */
export type Interpolator<T> = (
  from: T,
  to: T,
  tween: TweeningFunction,
  currentTime: number,
  finalTime: number,
) => T;

/** In-flight interpolation from one raw value to another. */
export type Transition<T> = Readonly<{
  initialRaw: T;
  targetRaw: T;
  /** Elapsed milliseconds, always within [0, finalTime]. */
  currentTime: number;
  /** Total duration in milliseconds. */
  finalTime: number;
  tween: TweeningFunction;
  /** Called by the owning widget once the raw value is pinned to the target. */
  onComplete?: (() => void) | undefined;
}>;

export type TransitionStep<T> = Readonly<{
  transition: Transition<T>;
  value: T;
  done: boolean;
}>;

/** Time-based interpolation configuration. */
export type TransitionConfig = Readonly<{
  /** Transition duration in milliseconds. */
  duration?: number;
  /** Easing curve name or custom easing function. */
  easing?: EasingInput;
  /** Full tweening function; takes precedence over `easing`. */
  tween?: TweeningFunction;
  /** Called when the transition reaches the target value. */
  onComplete?: () => void;
}>;
