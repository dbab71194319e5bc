/**
 * Ledger Store Types
 *
 * Defines the persistence contract for loan records and verification flags.
 * Developers bring their own persistence layer (SQLite, Postgres, etc.)
 * by implementing LedgerStore.
 */

import { LoanId, Principal } from "../core/types.js";
import type {
	Loan,
	LoanStatus,
	NewLoan,
} from "../modules/lending/types.js";

/**
 * Query options for listing loans.
 */
export interface LoanQueryOptions {
	/** Filter by borrower */
	borrower?: Principal;
	/** Filter by status(es) */
	status?: LoanStatus | LoanStatus[];
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
	/** Sort direction on loan id (default "desc") */
	sortOrder?: "asc" | "desc";
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * Source of user verification flags.
 */
export interface VerificationRegistry {
	isVerified(user: Principal): Promise<boolean>;
}

/**
 * Ledger operations. Inside `LedgerStore.withTransaction` they are issued
 * against the transaction's session.
 */
export interface LedgerSession extends VerificationRegistry {
	/**
	 * Assign the next loan id and store the record as `requested`.
	 */
	create(loan: NewLoan): Promise<Loan>;

	/**
	 * Load a loan.
	 *
	 * @throws LedgerError `NOT_FOUND` if the id was never assigned
	 */
	get(id: LoanId): Promise<Loan>;

	/**
	 * Load a loan, or null if the id was never assigned.
	 */
	find(id: LoanId): Promise<Loan | null>;

	/**
	 * Record the disbursement time.
	 *
	 * @throws LedgerError `ALREADY_FINALIZED` if the loan is terminal,
	 * `PRECONDITION_FAILED` if it was approved before
	 */
	markApproved(id: LoanId, at: number): Promise<Loan>;

	/**
	 * @throws LedgerError `ALREADY_FINALIZED` if the loan is terminal
	 */
	markRepaid(id: LoanId, at: number): Promise<Loan>;

	/**
	 * @throws LedgerError `ALREADY_FINALIZED` if the loan is terminal
	 */
	markDefaulted(id: LoanId, at: number): Promise<Loan>;

	setVerified(user: Principal, verified: boolean): Promise<void>;

	list(options?: LoanQueryOptions): Promise<QueryResult<Loan>>;

	countByStatus(): Promise<Record<LoanStatus, number>>;
}

/**
 * Ledger store with serialized transactions.
 *
 * @example
 * ```typescript
 * const loan = await store.withTransaction(async (tx) => {
 *   const created = await tx.create(draft);
 *   await somethingThatMightThrow();
 *   return created;
 * });
 * ```
 */
export interface LedgerStore extends LedgerSession {
	/**
	 * Run `fn` against a transactional session.
	 *
	 * Transactions run one at a time. If `fn` throws, every mutation made
	 * through the session is discarded and the error is rethrown. `fn` must
	 * only use the session it is given; calling back into the store from
	 * inside `fn` waits for the transaction and never resolves.
	 */
	withTransaction<T>(fn: (tx: LedgerSession) => Promise<T>): Promise<T>;
}

/**
 * Error thrown by storage backends.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
