import type { RoiTableRow } from "@hedgebot/shared";

export const ROI_EXIT_REASON = "ROI target reached";

/**
 * Required profit fraction after `elapsedMinutes`: the row with the greatest threshold
 * not above the elapsed time. Null before the first row applies.
 */
export function roiThresholdAt(table: RoiTableRow[], elapsedMinutes: number): number | null {
  let threshold: number | null = null;
  for (const row of table) {
    if (row.minutes > elapsedMinutes) break;
    threshold = row.minProfit;
  }
  return threshold;
}

export function shouldExitOnRoi(table: RoiTableRow[], elapsedMinutes: number, profitFraction: number): boolean {
  const threshold = roiThresholdAt(table, elapsedMinutes);
  return threshold !== null && profitFraction >= threshold;
}

export function elapsedMinutes(openedAt: string, now: Date): number {
  const opened = Date.parse(openedAt);
  if (!Number.isFinite(opened)) return 0;
  return Math.max(0, (now.getTime() - opened) / 60_000);
}
