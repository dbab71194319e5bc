/**
 * Lending Module
 *
 * Collateralized loan ledger built on the SDK primitives.
 */

// Types
export type {
	LoanStatus,
	LoanAction,
	LoanTerms,
	LoanBase,
	LoanStanding,
	Loan,
	NewLoan,
	LoanRequest,
	RepaymentQuote,
	EligibilityDecision,
	UserProfile,
	LoanEvent,
	LoanEventType,
	LoanEventListener,
	LendingContext,
} from "./types.js";

export { LOAN_STATUSES } from "./types.js";

// Terms
export {
	DEFAULT_INTEREST_RATE,
	calculateInterest,
	calculateRepaymentAmount,
	validateTerms,
	dueAt,
	isPastDue,
	quoteRepayment,
} from "./lending-terms.js";

// State machine
export {
	type LoanTransitionContext,
	LOAN_LIFECYCLE,
	loanMachine,
	holdsCollateral,
	isFinalState,
} from "./lending-state-machine.js";

// Components
export {
	type CreditGateOptions,
	MIN_CREDIT_SCORE,
	CreditGate,
} from "./credit-gate.js";
export { type LockHandle, CollateralVault } from "./collateral-vault.js";
export { type CustodyReport, LoanStateMachine } from "./loan-state-machine.js";
