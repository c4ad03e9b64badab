/**
 * Rounding shared by the economic calculations
 *
 * @module domain/shared/rounding
 */

/**
 * Round to the nearest integer, ties to the even neighbour (banker's rounding).
 * 2.5 -> 2, 3.5 -> 4, -2.5 -> -2. Non-finite values pass through.
 */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}
