/**
 * Lending Module Types
 *
 * Types for a collateralized loan ledger.
 *
 * In this ledger:
 * - Borrower pledges a non-fungible asset, which the vault takes into custody
 * - Administrator approves the loan and the principal is disbursed from the reserve
 * - Borrower repays principal plus flat interest to get the collateral back
 * - If the loan runs past its duration, anyone can trigger the default and
 *   the collateral is seized to the liquidator
 */

import {
	CollateralRef,
	LedgerLogger,
	LoanId,
	Principal,
} from "../../core/types.js";
import type { FungibleToken } from "../../protocol/types.js";
import type { LedgerStore } from "../../storage/types.js";
import type { CollateralVault } from "./collateral-vault.js";
import type { CreditGate } from "./credit-gate.js";

/**
 * Loan statuses.
 *
 * Lifecycle:
 * - requested: Collateral locked, loan open (disbursed once approved)
 * - repaid: Principal plus interest repaid, collateral returned
 * - defaulted: Loan ran past its duration, collateral seized
 */
export type LoanStatus = "requested" | "repaid" | "defaulted";

export const LOAN_STATUSES: readonly LoanStatus[] = [
	"requested",
	"repaid",
	"defaulted",
];

/**
 * Loan lifecycle actions.
 */
export type LoanAction =
	| "approve" // Administrator disburses the principal
	| "repay" // Borrower repays and reclaims collateral
	| "default"; // Anyone flags an overdue loan

/**
 * Terms fixed when a loan is issued.
 */
export interface LoanTerms {
	/** The borrowing principal */
	borrower: Principal;
	/** Principal amount, in the fungible token's smallest unit */
	amount: number;
	/** Flat interest rate in percent (e.g., 5 = 5%) */
	interestRate: number;
	/** Time until the loan may be defaulted, in milliseconds */
	durationMs: number;
	/** The pledged asset */
	collateral: CollateralRef;
}

/**
 * Fields shared by loans in every status.
 */
export interface LoanBase extends LoanTerms {
	id: LoanId;
	/** When the loan was issued (Unix timestamp ms) */
	issuedAt: number;
	/** When the principal was disbursed (Unix timestamp ms) */
	approvedAt?: number;
}

/**
 * Status of a loan. Terminal statuses carry the time they were reached.
 */
export type LoanStanding =
	| { status: "requested" }
	| { status: "repaid"; repaidAt: number }
	| { status: "defaulted"; defaultedAt: number };

/**
 * A loan record.
 */
export type Loan = LoanBase & LoanStanding;

/**
 * A loan record before an id is assigned.
 */
export interface NewLoan extends LoanTerms {
	issuedAt: number;
}

/**
 * Borrower input to a loan request.
 */
export interface LoanRequest {
	amount: number;
	durationMs: number;
	collateral: CollateralRef;
}

/**
 * What a borrower owes on a loan.
 */
export interface RepaymentQuote {
	loanId: LoanId;
	principal: number;
	interest: number;
	totalRepayment: number;
	/** Instant after which the loan may be defaulted (Unix timestamp ms) */
	dueAt: number;
	overdue: boolean;
}

/**
 * Eligibility verdict from the credit gate.
 */
export interface EligibilityDecision {
	eligible: boolean;
	verified: boolean;
	/** Score read from the oracle; absent when the oracle was not consulted */
	score?: number;
	/** Why the borrower is not eligible */
	reason?: "unverified" | "score-too-low" | "score-unavailable";
}

/**
 * A user's standing with the ledger.
 */
export interface UserProfile {
	principal: Principal;
	verified: boolean;
	eligibility: EligibilityDecision;
}

/**
 * Notifications emitted after an operation commits, in the order the
 * operation produced them.
 */
export type LoanEvent =
	| {
			type: "LoanRequested";
			loanId: LoanId;
			borrower: Principal;
			amount: number;
	  }
	| {
			type: "LoanApproved";
			loanId: LoanId;
			borrower: Principal;
			amount: number;
	  }
	| { type: "LoanRepaid"; loanId: LoanId; borrower: Principal }
	| { type: "LoanDefaulted"; loanId: LoanId; borrower: Principal }
	| { type: "CollateralLiquidated"; loanId: LoanId; borrower: Principal };

export type LoanEventType = LoanEvent["type"];

export type LoanEventListener = (event: LoanEvent) => void;

/**
 * Everything the loan state machine needs, injected at construction.
 */
export interface LendingContext {
	/** Loan records and verification flags */
	store: LedgerStore;
	/** Custody of pledged assets */
	vault: CollateralVault;
	/** Eligibility checks */
	gate: CreditGate;
	/** Value transfers to and from the reserve */
	token: FungibleToken;
	/** The reserve account disbursements come from and repayments go to */
	reserve: Principal;
	/** The administrative identity */
	admin: Principal;
	/** Recipient of seized collateral (defaults to the admin) */
	liquidator?: Principal;
	/** Flat interest rate in percent (defaults to 5) */
	interestRate?: number;
	/** Current time (Unix timestamp ms, defaults to Date.now) */
	clock?: () => number;
	logger?: LedgerLogger;
}
