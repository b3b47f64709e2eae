/** Kt·Kv product: Kt in ozf·in/A when Kv is in RPM/V */
export const KT_KV_PRODUCT = 1352

/** ozf·in → N·m */
export const OZF_IN_TO_NM = 0.00706

/** RPM → rad/s */
export const RPM_TO_RAD_PER_S = (2 * Math.PI) / 60

/** Display only, never used inside the model */
export const WATTS_PER_HORSEPOWER = 745.69987158227022

/** Offset above the no-load current so the domain floor never has zero torque */
export const CURRENT_EPSILON = 0.0001

/** Smallest usable span between no-load and maximum current (A) */
export const MIN_CURRENT_SPAN = 0.01

/** Absorbs binary rounding of decimal inputs in the span check (0.51 − 0.5 > 0.01) */
export const SPAN_ROUNDING_SLACK = 1e-9

export const GRID_SEARCH_STEPS = 10
export const GRID_SEARCH_TOLERANCE = 0.0001
