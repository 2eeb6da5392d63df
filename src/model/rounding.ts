/**
 * Statutory rounding helpers.
 *
 *   roundTo(0.0236, 3)   → 0.024
 *   roundTo(58023.5, 0)  → 58024
 *   floorToDime(1024.99) → 1024.9
 */

/** Round half away from zero to `digits` decimal places. */
export function roundTo(value: number, digits: number = 0): number {
  const scale = 10 ** digits
  const scaled = Math.abs(value) * scale
  // Nudge by a relative epsilon so 1.005 → 100.49999999999999 still rounds up.
  const rounded = Math.round(scaled + scaled * Number.EPSILON)
  if (rounded === 0) return 0
  return value < 0 ? -rounded / scale : rounded / scale
}

/** Floor to the nearest $0.10 below. */
export function floorToDime(value: number): number {
  return Math.floor(value * 10) / 10
}

/** Floor to whole dollars. */
export function floorToDollar(value: number): number {
  return Math.floor(value)
}
