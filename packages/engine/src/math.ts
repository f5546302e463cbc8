/** Round half away from zero to two decimals. */
export function round2(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n) * 100) / 100;
}
