/**
 * Rounds to two decimals, sending exact halves to the even digit
 * (0.125 → 0.12, 0.375 → 0.38).
 */
export function roundTo2(value: number): number {
  const scaled = value * 100;
  const rounded = Math.round(scaled);
  const isTie = Math.abs(scaled % 1) === 0.5;
  return (isTie && rounded % 2 !== 0 ? rounded - 1 : rounded) / 100;
}

/**
 * Average points per scored participant, rounded to two decimals.
 * A team with nobody scored averages 0, which reads the same as a team that
 * genuinely scored 0.
 */
export function average(total: number, count: number): number {
  return count === 0 ? 0 : roundTo2(total / count);
}

export function fieldAverage(totals: number[]): number {
  if (totals.length === 0) return 0;
  return totals.reduce((sum, total) => sum + total, 0) / totals.length;
}

export function differential(teamTotal: number, field: number): number {
  return teamTotal - field;
}
