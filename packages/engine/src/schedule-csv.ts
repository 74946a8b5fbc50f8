/**
 * @payadvance/engine — Amortization schedule CSV export.
 *
 * Format:
 *   Month,Payment,Principal,Interest,Balance
 *   1,88.85,78.85,10.00,921.15
 *
 * Month is an integer; money columns always carry two decimals.
 * Lines end with "\n", including the last.
 */

import type { AmortizationRow, ScheduleExport } from "@payadvance/types";

export const SCHEDULE_CSV_HEADER = "Month,Payment,Principal,Interest,Balance";
export const SCHEDULE_CSV_FILENAME = "amortization_schedule.csv";

export function encodeScheduleCsv(rows: readonly AmortizationRow[]): string {
  const lines = [SCHEDULE_CSV_HEADER];
  for (const row of rows) {
    lines.push(
      [
        String(row.month),
        row.payment.toFixed(2),
        row.principal.toFixed(2),
        row.interest.toFixed(2),
        row.balance.toFixed(2),
      ].join(","),
    );
  }
  return lines.join("\n") + "\n";
}

export function exportSchedule(rows: readonly AmortizationRow[]): ScheduleExport {
  return {
    csvData: encodeScheduleCsv(rows),
    filename: SCHEDULE_CSV_FILENAME,
  };
}
