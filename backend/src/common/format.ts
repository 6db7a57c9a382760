/**
 * Fixed-point formatting with exact halves rounded to even.
 *
 * `Number#toFixed` rounds an exact half away from zero (6.25 → "6.3");
 * rationale text rounds it to the even digit (6.25 → "6.2", 12.5 → "12").
 * Values that only look like halves in decimal (0.15 is stored below 0.15)
 * keep the `toFixed` result.
 */
export function formatFixed(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value)) return rounded;

  // Exact decimal expansion of the stored double
  const exact = value.toFixed(Math.min(100, digits + 60));
  const point = exact.indexOf('.');
  if (point < 0) return rounded;

  const tail = exact.slice(point + 1 + digits);
  if (!/^50*$/.test(tail)) return rounded;

  const truncated = digits === 0 ? exact.slice(0, point) : exact.slice(0, point + 1 + digits);
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? truncated : rounded;
}
