/**
 * In-Memory Ledger Store
 *
 * A simple in-memory ledger store for testing and development.
 * Data is lost when the process exits.
 */

import { LoanId, Principal } from "../core/types.js";
import type {
	Loan,
	LoanStatus,
	NewLoan,
} from "../modules/lending/types.js";
import { Mutex } from "../utils/locks.js";
import {
	LedgerSession,
	LedgerStore,
	LoanQueryOptions,
	QueryResult,
} from "./types.js";
import {
	approvedLoan,
	defaultedLoan,
	emptyStatusCounts,
	loanNotFound,
	repaidLoan,
} from "./loan-records.js";

interface LedgerState {
	loans: Map<LoanId, Loan>;
	verified: Map<Principal, boolean>;
	lastId: LoanId;
}

function copyState(state: LedgerState): LedgerState {
	// Records are replaced on update, never mutated, so shallow copies suffice
	return {
		loans: new Map(state.loans),
		verified: new Map(state.verified),
		lastId: state.lastId,
	};
}

/**
 * Ledger operations over a state snapshot.
 */
class MemoryLedgerSession implements LedgerSession {
	constructor(private readonly state: LedgerState) {}

	async create(draft: NewLoan): Promise<Loan> {
		const id = this.state.lastId + 1;
		const loan: Loan = {
			id,
			borrower: draft.borrower,
			amount: draft.amount,
			interestRate: draft.interestRate,
			durationMs: draft.durationMs,
			collateral: { ...draft.collateral },
			issuedAt: draft.issuedAt,
			status: "requested",
		};
		this.state.loans.set(id, loan);
		this.state.lastId = id;
		return structuredClone(loan);
	}

	async get(id: LoanId): Promise<Loan> {
		const loan = await this.find(id);
		if (!loan) throw loanNotFound(id);
		return loan;
	}

	async find(id: LoanId): Promise<Loan | null> {
		const loan = this.state.loans.get(id);
		return loan ? structuredClone(loan) : null;
	}

	async markApproved(id: LoanId, at: number): Promise<Loan> {
		return this.replace(id, (loan) => approvedLoan(loan, at));
	}

	async markRepaid(id: LoanId, at: number): Promise<Loan> {
		return this.replace(id, (loan) => repaidLoan(loan, at));
	}

	async markDefaulted(id: LoanId, at: number): Promise<Loan> {
		return this.replace(id, (loan) => defaultedLoan(loan, at));
	}

	async setVerified(user: Principal, verified: boolean): Promise<void> {
		this.state.verified.set(user, verified);
	}

	async isVerified(user: Principal): Promise<boolean> {
		return this.state.verified.get(user) ?? false;
	}

	async list(options?: LoanQueryOptions): Promise<QueryResult<Loan>> {
		let loans = Array.from(this.state.loans.values());

		if (options?.borrower !== undefined) {
			loans = loans.filter((l) => l.borrower === options.borrower);
		}

		if (options?.status) {
			const statuses = Array.isArray(options.status)
				? options.status
				: [options.status];
			loans = loans.filter((l) => statuses.includes(l.status));
		}

		const total = loans.length;

		const sortOrder = options?.sortOrder ?? "desc";
		loans.sort((a, b) => (sortOrder === "asc" ? a.id - b.id : b.id - a.id));

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? loans.length;
		const items = loans
			.slice(offset, offset + limit)
			.map((l) => structuredClone(l));

		return {
			items,
			total,
			hasMore: offset + items.length < total,
		};
	}

	async countByStatus(): Promise<Record<LoanStatus, number>> {
		const counts = emptyStatusCounts();
		for (const loan of this.state.loans.values()) {
			counts[loan.status]++;
		}
		return counts;
	}

	private replace(id: LoanId, update: (loan: Loan) => Loan): Loan {
		const current = this.state.loans.get(id);
		if (!current) throw loanNotFound(id);
		const next = update(current);
		this.state.loans.set(id, next);
		return structuredClone(next);
	}
}

/**
 * In-memory ledger store.
 *
 * Transactions work on a copy of the state that replaces the live state
 * only when the transaction function resolves.
 *
 * @example
 * ```typescript
 * const store = new MemoryLedgerStore();
 * await store.setVerified("alice", true);
 *
 * const loan = await store.create({
 *   borrower: "alice",
 *   amount: 1000,
 *   interestRate: 5,
 *   durationMs: 86_400_000,
 *   collateral: { asset: "punks", tokenId: "7" },
 *   issuedAt: Date.now(),
 * });
 * loan.id; // 1
 * ```
 */
export class MemoryLedgerStore implements LedgerStore {
	private state: LedgerState = {
		loans: new Map(),
		verified: new Map(),
		lastId: 0,
	};
	private readonly mutex = new Mutex();

	async withTransaction<T>(fn: (tx: LedgerSession) => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(async () => {
			const draft = copyState(this.state);
			const result = await fn(new MemoryLedgerSession(draft));
			this.state = draft;
			return result;
		});
	}

	create(loan: NewLoan): Promise<Loan> {
		return this.withTransaction((tx) => tx.create(loan));
	}

	get(id: LoanId): Promise<Loan> {
		return this.read((s) => s.get(id));
	}

	find(id: LoanId): Promise<Loan | null> {
		return this.read((s) => s.find(id));
	}

	markApproved(id: LoanId, at: number): Promise<Loan> {
		return this.withTransaction((tx) => tx.markApproved(id, at));
	}

	markRepaid(id: LoanId, at: number): Promise<Loan> {
		return this.withTransaction((tx) => tx.markRepaid(id, at));
	}

	markDefaulted(id: LoanId, at: number): Promise<Loan> {
		return this.withTransaction((tx) => tx.markDefaulted(id, at));
	}

	setVerified(user: Principal, verified: boolean): Promise<void> {
		return this.withTransaction((tx) => tx.setVerified(user, verified));
	}

	isVerified(user: Principal): Promise<boolean> {
		return this.read((s) => s.isVerified(user));
	}

	list(options?: LoanQueryOptions): Promise<QueryResult<Loan>> {
		return this.read((s) => s.list(options));
	}

	countByStatus(): Promise<Record<LoanStatus, number>> {
		return this.read((s) => s.countByStatus());
	}

	/**
	 * Number of loans ever issued.
	 */
	size(): number {
		return this.state.loans.size;
	}

	private read<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T> {
		// Reads wait for running transactions so they never see uncommitted state
		return this.mutex.runExclusive(() =>
			fn(new MemoryLedgerSession(this.state)),
		);
	}
}
