/**
 * Rounds to `digits` decimals, sending exact halves to the even neighbour
 * (0.25 → 0.2, 12.5 → 12, 13.5 → 14).
 */
export function roundHalfEven(value: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const remainder = scaled - floor;

  let rounded: number;
  if (remainder === 0.5) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }
  return rounded / factor;
}
