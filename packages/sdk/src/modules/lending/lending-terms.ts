/**
 * Lending Terms
 *
 * Repayment and due-date arithmetic. Interest is a flat percentage of the
 * principal: it does not compound and does not depend on elapsed time.
 */

import { LedgerError } from "../../core/types.js";
import { LoanTerms, LoanBase, RepaymentQuote } from "./types.js";

/**
 * Interest rate applied to new loans, in percent.
 */
export const DEFAULT_INTEREST_RATE = 5;

/**
 * Interest owed on a principal: `floor(principal * rate / 100)`.
 */
export function calculateInterest(
	principal: number,
	interestRate: number,
): number {
	if (!Number.isSafeInteger(principal) || principal < 0) {
		throw new RangeError(`Invalid principal: ${principal}`);
	}
	if (!Number.isSafeInteger(interestRate) || interestRate < 0) {
		throw new RangeError(`Invalid interest rate: ${interestRate}`);
	}
	// bigint keeps the product exact for large principals
	return Number((BigInt(principal) * BigInt(interestRate)) / 100n);
}

/**
 * Total owed on a principal: principal plus flat interest.
 */
export function calculateRepaymentAmount(
	principal: number,
	interestRate: number,
): number {
	const total = principal + calculateInterest(principal, interestRate);
	if (!Number.isSafeInteger(total)) {
		throw new RangeError(
			`Repayment amount exceeds the safe integer range for principal ${principal}`,
		);
	}
	return total;
}

/**
 * Validates that the terms of a loan can be repaid without overflow.
 */
export function validateTerms(terms: Pick<LoanTerms, "amount" | "interestRate" | "durationMs">): void {
	try {
		calculateRepaymentAmount(terms.amount, terms.interestRate);
	} catch (cause) {
		throw new LedgerError(
			cause instanceof Error ? cause.message : "Invalid loan terms",
			"PRECONDITION_FAILED",
			{ amount: terms.amount, interestRate: terms.interestRate },
		);
	}
	if (!Number.isSafeInteger(terms.durationMs) || terms.durationMs <= 0) {
		throw new LedgerError(
			`durationMs must be a positive integer, got ${terms.durationMs}`,
			"PRECONDITION_FAILED",
			{ field: "durationMs", value: terms.durationMs },
		);
	}
}

/**
 * Last instant at which the loan is still current.
 */
export function dueAt(loan: Pick<LoanBase, "issuedAt" | "durationMs">): number {
	return loan.issuedAt + loan.durationMs;
}

/**
 * A loan is past due strictly after `issuedAt + durationMs`.
 */
export function isPastDue(
	loan: Pick<LoanBase, "issuedAt" | "durationMs">,
	now: number,
): boolean {
	return now > dueAt(loan);
}

/**
 * Build the repayment quote for a loan at `now`.
 */
export function quoteRepayment(loan: LoanBase, now: number): RepaymentQuote {
	const interest = calculateInterest(loan.amount, loan.interestRate);
	return {
		loanId: loan.id,
		principal: loan.amount,
		interest,
		totalRepayment: loan.amount + interest,
		dueAt: dueAt(loan),
		overdue: isPastDue(loan, now),
	};
}
