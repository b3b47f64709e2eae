import { GRID_SEARCH_STEPS, GRID_SEARCH_TOLERANCE } from '../motor/constants'

export interface GridSearchOptions {
  /** Steps per pass across the current window */
  steps?: number
  /** Stop once the window around the best point is narrower than this on both sides */
  tolerance?: number
}

export interface GridSearchResult {
  argMax: number
  value: number
  passes: number
  evaluations: number
}

/**
 * Coarse-to-fine grid search for the maximum of `fn` on [lower, upper].
 *
 * Each pass samples the window at a fixed step plus its upper edge and keeps
 * the best strictly-improving sample. The window then shrinks to best ± step
 * (clamped to the original bounds) and the step is divided by `steps`.
 *
 * Stops when a pass finds no improvement, or when both half-widths of the
 * window drop below `tolerance`. This is hill climbing, not bisection: a step
 * can skip over a narrow peak, so prefer an analytic optimum when one exists.
 */
export function gridSearchMax(
  fn: (x: number) => number,
  lower: number,
  upper: number,
  options: GridSearchOptions = {}
): GridSearchResult {
  const steps = options.steps ?? GRID_SEARCH_STEPS
  const tolerance = options.tolerance ?? GRID_SEARCH_TOLERANCE

  if (!(upper > lower)) {
    return { argMax: lower, value: fn(lower), passes: 0, evaluations: 1 }
  }

  let windowMin = lower
  let windowMax = upper
  let step = (upper - lower) / steps
  let best = -Infinity
  let bestX = lower
  let passes = 0
  let evaluations = 0

  do {
    let improved = false
    passes++

    // Index-based sampling avoids accumulating x += step drift
    const count = Math.ceil((windowMax - windowMin) / step)
    for (let i = 0; i <= count; i++) {
      const x = i === count ? windowMax : windowMin + i * step
      if (x > windowMax) continue

      const value = fn(x)
      evaluations++
      if (value > best) {
        best = value
        bestX = x
        improved = true
      }
    }

    if (!improved) break

    windowMin = Math.max(bestX - step, lower)
    windowMax = Math.min(bestX + step, upper)
    step /= steps
  } while (windowMax - bestX >= tolerance || bestX - windowMin >= tolerance)

  return { argMax: bestX, value: best, passes, evaluations }
}
