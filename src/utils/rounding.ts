const HALF_TOLERANCE = 1e-9;

/**
 * Rounds to `decimals` places, sending exact halves to the even neighbour
 * (2.125 -> 2.12, 2.375 -> 2.38). Values within binary noise of a half count as a half.
 */
export function roundHalfEven(value: number, decimals = 2): number {
  const factor = Math.pow(10, decimals);
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded: number;
  if (Math.abs(fraction - 0.5) < HALF_TOLERANCE) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }

  return rounded / factor;
}
