export function formatHealthChange(who: string, change: number, cause: string): string {
  const sign = change >= 0 ? "+" : "-";
  return `${who}: ${sign}${Math.abs(change)} hp (${cause})`;
}
