/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * The wire format is snake_case; the engine speaks camelCase. Request
 * DTOs have a Zod schema and a derived TypeScript type; response DTOs are
 * plain interfaces built by the mappers at the bottom of this file.
 */

import { z } from "zod";
import type {
  AdvanceDecision,
  AdvanceOutcome,
  AdvanceRequest,
  AmortizationRow,
  LoanRecord,
  ScheduleExport,
} from "@payadvance/types";

// =============================================================================
// Request DTOs
// =============================================================================

const money = z.number().finite().min(0);

export const AdvanceRequestSchema = z.object({
  gross_salary: z.number().finite().positive(),
  // Checked by the engine so an unknown value surfaces as INVALID_INPUT
  pay_frequency: z.string().min(1),
  advance_amount: money,
  loan_amount: money.nullable().optional(),
  interest_rate: money.nullable().optional(),
  loan_term: z.number().int().nullable().optional(),
  include_amortization: z.boolean().nullable().optional(),
  export_csv: z.boolean().nullable().optional(),
});

export type AdvanceRequestDto = z.infer<typeof AdvanceRequestSchema>;

export const CalculateAdvanceQuerySchema = z.object({
  export_csv: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => v === "true" || v === "1"),
});

export type CalculateAdvanceQuery = z.infer<typeof CalculateAdvanceQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface AmortizationRowDto {
  readonly month: number;
  readonly payment: number;
  readonly principal: number;
  readonly interest: number;
  readonly balance: number;
}

export interface AdvanceDecisionDto {
  readonly outcome: AdvanceOutcome;
  readonly eligible: boolean;
  readonly advance_approved: boolean;
  readonly max_advance: number;
  readonly approved_amount: number;
  readonly fee: number;
  readonly total_repayable: number | null;
  readonly amortization_schedule: readonly AmortizationRowDto[] | null;
  readonly message: string;
  readonly loan_id: string | null;
}

export interface LoanRecordDto {
  readonly loan_id: string;
  readonly advance_amount: number;
  readonly fee: number;
  readonly timestamp: string;
  readonly gross_salary: number;
  readonly pay_frequency: string;
  readonly loan_amount: number | null;
  readonly interest_rate: number | null;
  readonly loan_term: number | null;
  readonly total_repayable: number | null;
  readonly amortization_schedule: readonly AmortizationRowDto[] | null;
}

export interface ScheduleExportDto {
  readonly csv_data: string;
  readonly filename: string;
}

// =============================================================================
// Wire Mapping
// =============================================================================

export function toAdvanceRequest(dto: AdvanceRequestDto): AdvanceRequest {
  return {
    grossSalary: dto.gross_salary,
    payFrequency: dto.pay_frequency,
    advanceAmount: dto.advance_amount,
    loanAmount: dto.loan_amount ?? undefined,
    interestRate: dto.interest_rate ?? undefined,
    loanTerm: dto.loan_term ?? undefined,
    includeAmortization: dto.include_amortization ?? false,
  };
}

function toRowDtos(
  rows: readonly AmortizationRow[] | null | undefined,
): readonly AmortizationRowDto[] | null {
  if (rows === null || rows === undefined) {
    return null;
  }
  return rows.map((r) => ({
    month: r.month,
    payment: r.payment,
    principal: r.principal,
    interest: r.interest,
    balance: r.balance,
  }));
}

export function toDecisionDto(decision: AdvanceDecision): AdvanceDecisionDto {
  return {
    outcome: decision.outcome,
    eligible: decision.eligible,
    advance_approved: decision.advanceApproved,
    max_advance: decision.maxAdvance,
    approved_amount: decision.approvedAmount,
    fee: decision.fee,
    total_repayable: decision.totalRepayable ?? null,
    amortization_schedule: toRowDtos(decision.amortizationSchedule),
    message: decision.message,
    loan_id: decision.loanId ?? null,
  };
}

export function toLoanRecordDto(record: LoanRecord): LoanRecordDto {
  return {
    loan_id: record.loanId,
    advance_amount: record.advanceAmount,
    fee: record.fee,
    timestamp: record.timestamp,
    gross_salary: record.grossSalary,
    pay_frequency: record.payFrequency,
    loan_amount: record.loanAmount,
    interest_rate: record.interestRate,
    loan_term: record.loanTerm,
    total_repayable: record.totalRepayable,
    amortization_schedule: toRowDtos(record.amortizationSchedule),
  };
}

export function toScheduleExportDto(exported: ScheduleExport): ScheduleExportDto {
  return { csv_data: exported.csvData, filename: exported.filename };
}
