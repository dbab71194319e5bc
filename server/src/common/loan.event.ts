import type { LoanId, Principal } from "@pledgebook/sdk";

export const LOAN_REQUESTED_ID = "loan.requested";
export type LoanRequested = {
	eventId: string;
	loanId: LoanId;
	borrower: Principal;
	amount: number;
	emittedAt: string; // ISO timestamp
};

export const LOAN_APPROVED_ID = "loan.approved";
export type LoanApproved = {
	eventId: string;
	loanId: LoanId;
	borrower: Principal;
	amount: number;
	emittedAt: string;
};

export const LOAN_REPAID_ID = "loan.repaid";
export type LoanRepaid = {
	eventId: string;
	loanId: LoanId;
	borrower: Principal;
	emittedAt: string;
};

export const LOAN_DEFAULTED_ID = "loan.defaulted";
export type LoanDefaulted = {
	eventId: string;
	loanId: LoanId;
	borrower: Principal;
	emittedAt: string;
};

export const COLLATERAL_LIQUIDATED_ID = "loan.collateral-liquidated";
export type CollateralLiquidated = {
	eventId: string;
	loanId: LoanId;
	borrower: Principal;
	emittedAt: string;
};

export type LoanDomainEvent =
	| LoanRequested
	| LoanApproved
	| LoanRepaid
	| LoanDefaulted
	| CollateralLiquidated;
