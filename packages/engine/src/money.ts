/** Round to two decimals (paise for amounts, hundredths for percentages). */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
