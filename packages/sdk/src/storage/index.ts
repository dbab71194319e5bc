/**
 * Storage module - Pluggable persistence for the ledger
 *
 * This module defines the store interface and provides a reference
 * implementation. Developers bring their own persistence layer by
 * implementing LedgerStore.
 */

// Types
export type {
	LoanQueryOptions,
	QueryResult,
	VerificationRegistry,
	LedgerSession,
	LedgerStore,
} from "./types.js";

export { StorageError } from "./types.js";

// Record transitions for store implementations
export {
	loanNotFound,
	assertOpen,
	loanBase,
	approvedLoan,
	repaidLoan,
	defaultedLoan,
	settledAt,
	emptyStatusCounts,
} from "./loan-records.js";

// Reference implementations
export { MemoryLedgerStore } from "./memory-store.js";
