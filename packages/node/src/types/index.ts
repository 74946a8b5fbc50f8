/**
 * Type barrel — re-exports all public types from @payadvance/node.
 */

// DTOs
export {
  AdvanceRequestSchema,
  CalculateAdvanceQuerySchema,
  toAdvanceRequest,
  toDecisionDto,
  toLoanRecordDto,
  toScheduleExportDto,
} from "./dto.js";
export type {
  AdvanceRequestDto,
  CalculateAdvanceQuery,
  AmortizationRowDto,
  AdvanceDecisionDto,
  LoanRecordDto,
  ScheduleExportDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
