/**
 * packages/core/src/animation/transition.ts — Frame-stepped transitions.
 *
 * A transition is an immutable record; advancing it returns the next record
 * and the raw value for this frame. At `currentTime == finalTime` the value is
 * exactly `targetRaw` and the step reports `done`; the owner pins its raw
 * field and drops the transition.
 */

import { tweenFromEasing } from "./easing.js";
import { normalizeDurationMs } from "./interpolate.js";
import type { Interpolator, Transition, TransitionConfig, TransitionStep } from "./types.js";

export const DEFAULT_TRANSITION_MS = 200;

export function createTransition<T>(
  initialRaw: T,
  targetRaw: T,
  config: TransitionConfig = {},
  fallbackDurationMs = DEFAULT_TRANSITION_MS,
): Transition<T> {
  return Object.freeze({
    initialRaw,
    targetRaw,
    currentTime: 0,
    finalTime: normalizeDurationMs(config.duration, fallbackDurationMs),
    tween: config.tween ?? tweenFromEasing(config.easing),
    onComplete: config.onComplete,
  });
}

function normalizeDelta(dtMs: number): number {
  return Number.isFinite(dtMs) && dtMs > 0 ? dtMs : 0;
}

export function advanceTransition<T>(
  transition: Transition<T>,
  dtMs: number,
  interpolate: Interpolator<T>,
): TransitionStep<T> {
  const currentTime = Math.min(transition.finalTime, transition.currentTime + normalizeDelta(dtMs));
  const next: Transition<T> = Object.freeze({ ...transition, currentTime });
  if (currentTime >= transition.finalTime) {
    return { transition: next, value: transition.targetRaw, done: true };
  }
  return {
    transition: next,
    value: interpolate(
      transition.initialRaw,
      transition.targetRaw,
      transition.tween,
      currentTime,
      transition.finalTime,
    ),
    done: false,
  };
}

/** Raw value the transition currently represents, without advancing it. */
export function sampleTransition<T>(transition: Transition<T>, interpolate: Interpolator<T>): T {
  return advanceTransition(transition, 0, interpolate).value;
}

export function transitionProgress(transition: Transition<unknown>): number {
  if (transition.finalTime <= 0) return 1;
  return transition.currentTime / transition.finalTime;
}
