/**
 * @payadvance/cli — Terminal rendering.
 *
 * Builds the lines printed for a decision. Colour comes from chalk and
 * drops out on its own when stdout is not a terminal.
 */

import chalk from "chalk";
import type { AdvanceDecision, AmortizationRow } from "@payadvance/types";

const USD = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function dollars(value: number): string {
  return `$${USD.format(value)}`;
}

export function banner(): string[] {
  return [
    "",
    chalk.cyan.bold("  ╔══════════════════════════════════════════╗"),
    chalk.cyan.bold("  ║") + chalk.white.bold("            SALARY ADVANCE FORM           ") + chalk.cyan.bold("║"),
    chalk.cyan.bold("  ╚══════════════════════════════════════════╝"),
    "",
  ];
}

function info(label: string, value: string): string {
  return chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value);
}

export function ok(msg: string): string {
  return chalk.green("    ✓ ") + chalk.white(msg);
}

export function fail(msg: string): string {
  return chalk.red("    ✗ ") + chalk.red(msg);
}

export function warn(msg: string): string {
  return chalk.yellow("    ! ") + chalk.yellow(msg);
}

const COLUMNS = ["Month", "Payment", "Principal", "Interest", "Balance"] as const;

function scheduleRow(row: AmortizationRow): string {
  return [
    String(row.month).padStart(5),
    USD.format(row.payment).padStart(12),
    USD.format(row.principal).padStart(12),
    USD.format(row.interest).padStart(12),
    USD.format(row.balance).padStart(12),
  ].join("  ");
}

export function renderSchedule(rows: readonly AmortizationRow[]): string[] {
  const header = COLUMNS.map((c, i) => (i === 0 ? c.padStart(5) : c.padStart(12))).join("  ");
  return [
    "",
    chalk.white.bold("    Amortization schedule"),
    chalk.gray(`    ${header}`),
    ...rows.map((row) => `    ${scheduleRow(row)}`),
  ];
}

/**
 * Lines describing a decision, schedule included when it carries one.
 */
export function renderDecision(decision: AdvanceDecision): string[] {
  const approved = decision.outcome === "approved" || decision.outcome === "approved_with_loan";
  const lines = [approved ? ok(decision.message) : fail(decision.message)];

  lines.push(info("Eligible", decision.eligible ? "yes" : "no"));
  if (decision.eligible) {
    lines.push(info("Max advance", dollars(decision.maxAdvance)));
  }
  if (approved) {
    lines.push(info("Approved", dollars(decision.approvedAmount)));
    lines.push(info("Fee", dollars(decision.fee)));
  }
  if (decision.totalRepayable !== undefined) {
    lines.push(info("Total repayable", dollars(decision.totalRepayable)));
  }
  if (decision.loanId !== undefined) {
    lines.push(info("Loan ID", decision.loanId));
  }
  if (decision.amortizationSchedule !== undefined) {
    lines.push(...renderSchedule(decision.amortizationSchedule));
  }

  return lines;
}
