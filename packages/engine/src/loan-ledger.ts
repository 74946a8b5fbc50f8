/**
 * @payadvance/engine — In-memory loan ledger.
 *
 * Owns every LoanRecord created for an approved advance. Records are
 * frozen on insert and never updated or removed; the ledger lives as
 * long as the process does.
 *
 * Inserts are synchronous, so a reader never sees a partial record.
 */

import { randomUUID } from "node:crypto";
import type { AmortizationRow, LoanRecord } from "@payadvance/types";
import { AdvanceError } from "./types.js";
import type { LoanDraft, LoanIdGenerator } from "./types.js";

function freezeSchedule(
  schedule: readonly AmortizationRow[] | null,
): readonly AmortizationRow[] | null {
  if (schedule === null) {
    return null;
  }
  return Object.freeze(schedule.map((row) => Object.freeze({ ...row })));
}

export class LoanLedger {
  private readonly _records = new Map<string, LoanRecord>();
  private readonly _generateId: LoanIdGenerator;

  constructor(generateId: LoanIdGenerator = randomUUID) {
    this._generateId = generateId;
  }

  /**
   * Assign an id to the draft and store it.
   *
   * @throws AdvanceError DUPLICATE_LOAN_ID if the generator repeats an id;
   *   nothing is written in that case
   */
  record(draft: LoanDraft): LoanRecord {
    const loanId = this._generateId();
    if (this._records.has(loanId)) {
      throw new AdvanceError(
        "DUPLICATE_LOAN_ID",
        `Loan ID already exists in ledger: "${loanId}"`,
      );
    }

    const record: LoanRecord = Object.freeze({
      ...draft,
      loanId,
      amortizationSchedule: freezeSchedule(draft.amortizationSchedule),
    });
    this._records.set(loanId, record);
    return record;
  }

  /**
   * @throws AdvanceError LOAN_NOT_FOUND
   */
  get(loanId: string): LoanRecord {
    const record = this._records.get(loanId);
    if (record === undefined) {
      throw new AdvanceError("LOAN_NOT_FOUND", "Loan not found");
    }
    return record;
  }

  has(loanId: string): boolean {
    return this._records.has(loanId);
  }

  /** All records, in insertion order. */
  list(): readonly LoanRecord[] {
    return [...this._records.values()];
  }

  get size(): number {
    return this._records.size;
  }
}
