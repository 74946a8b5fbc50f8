/**
 * Loan lookup routes.
 *
 * GET /loan/:loanId — A single stored loan record
 * GET /loans        — Every stored record, oldest first
 */

import { Hono } from "hono";
import type { LoanLedger } from "@payadvance/engine";
import type { AppEnv } from "../types/api-contract.js";
import { toLoanRecordDto } from "../types/dto.js";

export function createLoanRoutes(ledger: LoanLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // Unknown ids throw LOAN_NOT_FOUND, mapped to 404 by the error handler
  routes.get("/loan/:loanId", (c) => {
    const record = ledger.get(c.req.param("loanId"));
    return c.json(toLoanRecordDto(record));
  });

  routes.get("/loans", (c) => {
    const records = ledger.list();
    return c.json({
      data: records.map(toLoanRecordDto),
      total: records.length,
    });
  });

  return routes;
}
