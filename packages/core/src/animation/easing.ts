/**
 * packages/core/src/animation/easing.ts — Easing curves and tweening functions.
 */

import { clamp01 } from "./interpolate.js";
import type { EasingFunction, EasingInput, EasingName, TweeningFunction } from "./types.js";

const BACK_OVERSHOOT = 1.70158;
const BACK_IN_OUT_OVERSHOOT = BACK_OVERSHOOT * 1.525;

const easeOutBounce = (t: number): number => {
  if (t < 1 / 2.75) return 7.5625 * t * t;
  if (t < 2 / 2.75) {
    const u = t - 1.5 / 2.75;
    return 7.5625 * u * u + 0.75;
  }
  if (t < 2.5 / 2.75) {
    const u = t - 2.25 / 2.75;
    return 7.5625 * u * u + 0.9375;
  }
  const u = t - 2.625 / 2.75;
  return 7.5625 * u * u + 0.984375;
};

const backIn = (t: number, s: number): number => t * t * ((s + 1) * t - s);

const EASING_PRESETS: Readonly<Record<EasingName, EasingFunction>> = Object.freeze({
  linear: (t: number): number => t,
  easeInQuad: (t: number): number => t * t,
  easeOutQuad: (t: number): number => 1 - (1 - t) * (1 - t),
  easeInOutQuad: (t: number): number => (t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2),
  easeInCubic: (t: number): number => t * t * t,
  easeOutCubic: (t: number): number => 1 - (1 - t) ** 3,
  easeInOutCubic: (t: number): number => (t < 0.5 ? 4 * t * t * t : 1 - (-2 * t + 2) ** 3 / 2),
  easeInExpo: (t: number): number => (t === 0 ? 0 : 2 ** (10 * (t - 1))),
  easeOutExpo: (t: number): number => (t === 1 ? 1 : 1 - 2 ** (-10 * t)),
  easeInOutExpo: (t: number): number => {
    if (t === 0 || t === 1) return t;
    return t < 0.5 ? 2 ** (20 * t - 10) / 2 : (2 - 2 ** (-20 * t + 10)) / 2;
  },
  easeInBack: (t: number): number => backIn(t, BACK_OVERSHOOT),
  easeOutBack: (t: number): number => 1 - backIn(1 - t, BACK_OVERSHOOT),
  easeInOutBack: (t: number): number =>
    t < 0.5
      ? backIn(t * 2, BACK_IN_OUT_OVERSHOOT) / 2
      : 1 - backIn((1 - t) * 2, BACK_IN_OUT_OVERSHOOT) / 2,
  easeOutBounce,
  easeInBounce: (t: number): number => 1 - easeOutBounce(1 - t),
});

export function isEasingName(value: unknown): value is EasingName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(EASING_PRESETS, value);
}

export const EASING_NAMES: readonly EasingName[] = Object.freeze(
  Object.keys(EASING_PRESETS).filter(isEasingName),
);

/** Resolve user-provided easing value to a safe function. */
export function resolveEasing(input: EasingInput | undefined): EasingFunction {
  if (typeof input === "function") {
    return (t: number): number => clamp01(input(clamp01(t)));
  }
  if (!input) return EASING_PRESETS.linear;
  return EASING_PRESETS[input] ?? EASING_PRESETS.linear;
}

/**
 * Lift an easing curve onto a time window. Endpoints are exact: `end` once
 * `currentTime >= finalTime` (so a zero-length window is instant), `start` at
 * `currentTime <= 0`.
 */
export function tweenFromEasing(input: EasingInput | undefined): TweeningFunction {
  const ease = resolveEasing(input);
  return (start: number, end: number, currentTime: number, finalTime: number): number => {
    if (currentTime >= finalTime) return end;
    if (currentTime <= 0) return start;
    return start + (end - start) * ease(currentTime / finalTime);
  };
}

export const linearTween: TweeningFunction = tweenFromEasing("linear");
