/**
 * Loan record transitions shared by store implementations.
 */

import { LedgerError, LoanId } from "../core/types.js";
import type {
	Loan,
	LoanBase,
	LoanStatus,
} from "../modules/lending/types.js";
import { isFinalState } from "../modules/lending/lending-state-machine.js";

export function loanNotFound(id: LoanId): LedgerError {
	return new LedgerError(`Loan ${id} not found`, "NOT_FOUND", { loanId: id });
}

/**
 * Throws `ALREADY_FINALIZED` unless the loan is still `requested`.
 */
export function assertOpen(loan: Loan): void {
	if (isFinalState(loan.status)) {
		throw new LedgerError(
			`Loan ${loan.id} is already ${loan.status}`,
			"ALREADY_FINALIZED",
			{ loanId: loan.id, status: loan.status },
		);
	}
}

/**
 * Status-independent fields of a loan.
 */
export function loanBase(loan: Loan): LoanBase {
	return {
		id: loan.id,
		borrower: loan.borrower,
		amount: loan.amount,
		interestRate: loan.interestRate,
		durationMs: loan.durationMs,
		collateral: { ...loan.collateral },
		issuedAt: loan.issuedAt,
		approvedAt: loan.approvedAt,
	};
}

export function approvedLoan(loan: Loan, at: number): Loan {
	assertOpen(loan);
	if (loan.approvedAt !== undefined) {
		throw new LedgerError(
			`Loan ${loan.id} was already approved`,
			"PRECONDITION_FAILED",
			{ loanId: loan.id, approvedAt: loan.approvedAt },
		);
	}
	return { ...loanBase(loan), approvedAt: at, status: "requested" };
}

export function repaidLoan(loan: Loan, at: number): Loan {
	assertOpen(loan);
	return { ...loanBase(loan), status: "repaid", repaidAt: at };
}

export function defaultedLoan(loan: Loan, at: number): Loan {
	assertOpen(loan);
	return { ...loanBase(loan), status: "defaulted", defaultedAt: at };
}

/**
 * Time a loan reached its current status, if terminal.
 */
export function settledAt(loan: Loan): number | undefined {
	switch (loan.status) {
		case "repaid":
			return loan.repaidAt;
		case "defaulted":
			return loan.defaultedAt;
		default:
			return undefined;
	}
}

export function emptyStatusCounts(): Record<LoanStatus, number> {
	return { requested: 0, repaid: 0, defaulted: 0 };
}
