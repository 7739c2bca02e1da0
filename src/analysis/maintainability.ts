/**
 * Maintainability index on a 0..100 scale, rounded to two decimals.
 * Never increases with complexity or lines of code.
 */
export function maintainabilityIndex(complexity: number, linesOfCode: number, commentRatio: number): number {
  const ratio = Math.min(1, Math.max(0, commentRatio));
  const raw =
    171 -
    0.23 * complexity -
    16.2 * Math.log(Math.max(1, linesOfCode)) +
    50 * Math.sin(Math.sqrt(2.4 * ratio));
  const scaled = (raw * 100) / 171;
  return roundTo2(Math.min(100, Math.max(0, scaled)));
}

export function commentRatio(codeLines: number, commentLines: number): number {
  const counted = codeLines + commentLines;
  return counted === 0 ? 0 : commentLines / counted;
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
