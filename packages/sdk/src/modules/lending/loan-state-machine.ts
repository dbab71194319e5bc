/**
 * Loan State Machine
 *
 * The lending ledger's operations. Every operation runs in a single store
 * transaction: its preconditions are read inside it, its external transfers
 * are awaited inside it, and any failure discards the transaction. External
 * effects already taken are undone when the operation fails, including when
 * the commit itself fails.
 */

import {
	LedgerError,
	LedgerLogger,
	LoanId,
	Principal,
	validateAmount,
	validateCollateral,
} from "../../core/types.js";
import type { FungibleToken } from "../../protocol/types.js";
import type {
	LedgerSession,
	LedgerStore,
	LoanQueryOptions,
	QueryResult,
} from "../../storage/types.js";
import { loanBase } from "../../storage/loan-records.js";
import type { CollateralVault } from "./collateral-vault.js";
import type { CreditGate } from "./credit-gate.js";
import {
	DEFAULT_INTEREST_RATE,
	calculateRepaymentAmount,
	quoteRepayment,
	validateTerms,
} from "./lending-terms.js";
import { holdsCollateral, loanMachine } from "./lending-state-machine.js";
import {
	LendingContext,
	Loan,
	LoanEvent,
	LoanEventListener,
	LoanRequest,
	LoanStatus,
	RepaymentQuote,
	UserProfile,
} from "./types.js";

/**
 * Outcome of re-registering vault locks at startup.
 */
export interface CustodyReport {
	/** Loans whose lock was registered */
	restored: LoanId[];
	/** Loans whose collateral the custodian does not hold */
	missing: LoanId[];
}

/**
 * Undo step for an external effect taken inside a transaction.
 */
interface Compensation {
	description: string;
	undo: () => Promise<void>;
}

type Compensate = (compensation: Compensation) => void;

function describeFailure(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Collateralized loan ledger.
 *
 * @example
 * ```typescript
 * const ledger = new LoanStateMachine({
 *   store: new MemoryLedgerStore(),
 *   vault: new CollateralVault(assets, "vault"),
 *   gate: new CreditGate(oracle),
 *   token,
 *   reserve: "reserve",
 *   admin: "admin",
 * });
 *
 * await ledger.verifyUser("admin", "alice", true);
 * const loan = await ledger.request("alice", {
 *   amount: 1000,
 *   durationMs: 86_400_000,
 *   collateral: { asset: "punks", tokenId: "7" },
 * });
 * await ledger.approve("admin", loan.id);
 * await ledger.repay("alice", loan.id); // pulls 1050, returns the punk
 * ```
 */
export class LoanStateMachine {
	readonly admin: Principal;
	readonly reserve: Principal;
	readonly liquidator: Principal;
	readonly interestRate: number;

	private readonly store: LedgerStore;
	private readonly vault: CollateralVault;
	private readonly gate: CreditGate;
	private readonly token: FungibleToken;
	private readonly clock: () => number;
	private readonly logger?: LedgerLogger;
	private listeners: Set<LoanEventListener> = new Set();

	constructor(context: LendingContext) {
		this.store = context.store;
		this.vault = context.vault;
		this.gate = context.gate;
		this.token = context.token;
		this.reserve = context.reserve;
		this.admin = context.admin;
		this.liquidator = context.liquidator ?? context.admin;
		this.interestRate = context.interestRate ?? DEFAULT_INTEREST_RATE;
		this.clock = context.clock ?? Date.now;
		this.logger = context.logger;

		if (!Number.isSafeInteger(this.interestRate) || this.interestRate < 0) {
			throw new RangeError(`Invalid interest rate: ${this.interestRate}`);
		}
	}

	// =========================================================================
	// Lifecycle operations
	// =========================================================================

	/**
	 * Open a loan, taking the collateral into custody.
	 *
	 * @throws LedgerError `PRECONDITION_FAILED` if the borrower is not
	 * eligible, the input is invalid or the collateral cannot be locked
	 */
	async request(borrower: Principal, input: LoanRequest): Promise<Loan> {
		validateAmount(input.amount);
		validateCollateral(input.collateral);
		validateTerms({
			amount: input.amount,
			interestRate: this.interestRate,
			durationMs: input.durationMs,
		});

		const loan = await this.atomically(async (tx, compensate) => {
			await this.gate.assertEligible(borrower, tx);

			const handle = await this.vault.lock(input.collateral, borrower);
			compensate({
				description: `return collateral to ${borrower}`,
				undo: () => this.vault.release(handle, borrower),
			});

			return tx.create({
				borrower,
				amount: input.amount,
				interestRate: this.interestRate,
				durationMs: input.durationMs,
				collateral: { ...input.collateral },
				issuedAt: this.clock(),
			});
		});

		this.logger?.log(
			`Loan ${loan.id} requested by ${borrower} for ${loan.amount}`,
		);
		this.publish([
			{
				type: "LoanRequested",
				loanId: loan.id,
				borrower,
				amount: loan.amount,
			},
		]);
		return loan;
	}

	/**
	 * Disburse a loan's principal from the reserve to the borrower.
	 *
	 * @throws LedgerError `UNAUTHORIZED` unless the caller is the admin,
	 * `NOT_FOUND`, `ALREADY_FINALIZED`, or `PRECONDITION_FAILED` if the
	 * loan was approved before or the reserve refuses the transfer
	 */
	async approve(caller: Principal, id: LoanId): Promise<Loan> {
		this.assertAdmin(caller, "approve loans");

		const loan = await this.atomically(async (tx, compensate) => {
			const current = await tx.get(id);
			const now = this.clock();
			loanMachine(current.status).perform("approve", {
				loan: loanBase(current),
				now,
			});

			const approved = await tx.markApproved(id, now);
			await this.requireTransfer(
				() => this.token.transfer(approved.borrower, approved.amount),
				`Reserve refused to disburse ${approved.amount} for loan ${id}`,
				{ loanId: id, to: approved.borrower, amount: approved.amount },
			);
			compensate({
				description: `reclaim ${approved.amount} from ${approved.borrower}`,
				undo: () =>
					this.requireUndo(
						() =>
							this.token.transferFrom(
								approved.borrower,
								this.reserve,
								approved.amount,
							),
						"Borrower refused to return the disbursement",
					),
			});
			return approved;
		});

		this.logger?.log(`Loan ${id} approved, ${loan.amount} disbursed`);
		this.publish([
			{
				type: "LoanApproved",
				loanId: id,
				borrower: loan.borrower,
				amount: loan.amount,
			},
		]);
		return loan;
	}

	/**
	 * Repay principal plus interest and take the collateral back.
	 *
	 * @throws LedgerError `NOT_FOUND`, `UNAUTHORIZED` unless the caller is
	 * the borrower, `ALREADY_FINALIZED`, or `PRECONDITION_FAILED` if the
	 * repayment cannot be collected
	 */
	async repay(caller: Principal, id: LoanId): Promise<Loan> {
		const loan = await this.atomically(async (tx, compensate) => {
			const current = await tx.get(id);
			if (caller !== current.borrower) {
				throw new LedgerError(
					`Only the borrower can repay loan ${id}`,
					"UNAUTHORIZED",
					{ loanId: id, caller },
				);
			}
			const now = this.clock();
			loanMachine(current.status).perform("repay", {
				loan: loanBase(current),
				now,
			});

			const total = calculateRepaymentAmount(
				current.amount,
				current.interestRate,
			);
			const repaid = await tx.markRepaid(id, now);
			await this.requireTransfer(
				() => this.token.transferFrom(current.borrower, this.reserve, total),
				`Could not collect repayment of ${total} for loan ${id}`,
				{ loanId: id, from: current.borrower, amount: total },
			);
			compensate({
				description: `refund ${total} to ${current.borrower}`,
				undo: () =>
					this.requireUndo(
						() => this.token.transfer(current.borrower, total),
						"Reserve refused the refund",
					),
			});

			const handle = this.vault.handleFor(current.collateral);
			await this.vault.release(handle, current.borrower);
			compensate({
				description: `take collateral back from ${current.borrower}`,
				undo: async () => {
					await this.vault.lock(current.collateral, current.borrower);
				},
			});
			return repaid;
		});

		this.logger?.log(`Loan ${id} repaid by ${loan.borrower}`);
		this.publish([{ type: "LoanRepaid", loanId: id, borrower: loan.borrower }]);
		return loan;
	}

	/**
	 * Default an overdue loan, seizing its collateral to the liquidator.
	 * Anyone may call.
	 *
	 * @throws LedgerError `NOT_FOUND`, `ALREADY_FINALIZED`, or
	 * `PRECONDITION_FAILED` if the loan is not yet due
	 */
	async checkDefault(caller: Principal, id: LoanId): Promise<Loan> {
		const loan = await this.atomically(async (tx, compensate) => {
			const current = await tx.get(id);
			const now = this.clock();
			loanMachine(current.status).perform("default", {
				loan: loanBase(current),
				now,
			});

			const defaulted = await tx.markDefaulted(id, now);
			const handle = this.vault.handleFor(current.collateral);
			await this.vault.seize(handle, this.liquidator);
			compensate({
				description: `take collateral back from ${this.liquidator}`,
				undo: async () => {
					await this.vault.lock(current.collateral, this.liquidator, {
						depositor: current.borrower,
					});
				},
			});
			return defaulted;
		});

		this.logger?.log(
			`Loan ${id} defaulted (flagged by ${caller}), collateral seized to ${this.liquidator}`,
		);
		this.publish([
			{ type: "LoanDefaulted", loanId: id, borrower: loan.borrower },
			{ type: "CollateralLiquidated", loanId: id, borrower: loan.borrower },
		]);
		return loan;
	}

	// =========================================================================
	// Administration
	// =========================================================================

	/**
	 * Set a user's verification flag.
	 *
	 * @throws LedgerError `UNAUTHORIZED` unless the caller is the admin
	 */
	async verifyUser(
		caller: Principal,
		user: Principal,
		verified: boolean,
	): Promise<void> {
		this.assertAdmin(caller, "verify users");
		if (user.trim().length === 0) {
			throw new LedgerError("User cannot be empty", "PRECONDITION_FAILED", {
				field: "user",
			});
		}
		await this.store.withTransaction((tx) => tx.setVerified(user, verified));
		this.logger?.log(`User ${user} ${verified ? "verified" : "unverified"}`);
	}

	/**
	 * Re-register vault locks for every open loan. Loans whose collateral
	 * the custodian no longer holds are reported, not locked.
	 */
	async restoreCustody(): Promise<CustodyReport> {
		const open = await this.store.list({ status: "requested", sortOrder: "asc" });
		const report: CustodyReport = { restored: [], missing: [] };

		for (const loan of open.items) {
			if (!holdsCollateral(loan.status)) continue;
			if (this.vault.isLocked(loan.collateral)) continue;
			try {
				await this.vault.restore(loan.collateral, loan.borrower);
				report.restored.push(loan.id);
			} catch (err) {
				if (!(err instanceof LedgerError) || err.code !== "INVALID_LOCK") {
					throw err;
				}
				report.missing.push(loan.id);
				this.logger?.warn(`Loan ${loan.id}: ${err.message}`);
			}
		}
		return report;
	}

	isAdmin(principal: Principal): boolean {
		return principal === this.admin;
	}

	// =========================================================================
	// Queries
	// =========================================================================

	/**
	 * @throws LedgerError `NOT_FOUND`
	 */
	getLoan(id: LoanId): Promise<Loan> {
		return this.store.get(id);
	}

	listLoans(options?: LoanQueryOptions): Promise<QueryResult<Loan>> {
		return this.store.list(options);
	}

	countByStatus(): Promise<Record<LoanStatus, number>> {
		return this.store.countByStatus();
	}

	/**
	 * What the borrower owes on a loan right now.
	 *
	 * @throws LedgerError `NOT_FOUND`
	 */
	async quote(id: LoanId): Promise<RepaymentQuote> {
		const loan = await this.store.get(id);
		return quoteRepayment(loanBase(loan), this.clock());
	}

	async profile(user: Principal): Promise<UserProfile> {
		const eligibility = await this.gate.evaluate(user, this.store);
		return { principal: user, verified: eligibility.verified, eligibility };
	}

	// =========================================================================
	// Events
	// =========================================================================

	/**
	 * Subscribe to committed loan events.
	 *
	 * @returns Unsubscribe function
	 */
	onEvent(listener: LoanEventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	// =========================================================================
	// Private helpers
	// =========================================================================

	private assertAdmin(caller: Principal, action: string): void {
		if (!this.isAdmin(caller)) {
			throw new LedgerError(
				`Only the administrator can ${action}`,
				"UNAUTHORIZED",
				{ caller },
			);
		}
	}

	/**
	 * Run `fn` in a store transaction. If `fn` or the commit fails, the
	 * compensations `fn` registered run in reverse order before the error
	 * propagates.
	 */
	private async atomically<T>(
		fn: (tx: LedgerSession, compensate: Compensate) => Promise<T>,
	): Promise<T> {
		const compensations: Compensation[] = [];
		try {
			return await this.store.withTransaction((tx) =>
				fn(tx, (compensation) => {
					compensations.push(compensation);
				}),
			);
		} catch (err) {
			for (const { description, undo } of compensations.reverse()) {
				await this.rollback(description, undo, err);
			}
			throw err;
		}
	}

	private async requireUndo(
		transfer: () => Promise<boolean>,
		message: string,
	): Promise<void> {
		if (!(await transfer())) throw new Error(message);
	}

	private async requireTransfer(
		transfer: () => Promise<boolean>,
		message: string,
		details: Record<string, unknown>,
	): Promise<void> {
		let accepted: boolean;
		try {
			accepted = await transfer();
		} catch (err) {
			throw new LedgerError(
				`${message}: ${describeFailure(err)}`,
				"PRECONDITION_FAILED",
				{ ...details, cause: err },
			);
		}
		if (!accepted) {
			throw new LedgerError(message, "PRECONDITION_FAILED", details);
		}
	}

	/**
	 * Undo an external effect after `cause` aborted the operation.
	 *
	 * @throws LedgerError `ROLLBACK_FAILED` if the undo itself fails
	 */
	private async rollback(
		description: string,
		undo: () => Promise<void>,
		cause: unknown,
	): Promise<void> {
		this.logger?.warn(
			`Rolling back (${description}) after: ${describeFailure(cause)}`,
		);
		try {
			await undo();
		} catch (err) {
			this.logger?.error(
				`Rollback failed (${description}): ${describeFailure(err)}`,
				err instanceof Error ? err.stack : undefined,
			);
			throw new LedgerError(
				`Rollback failed (${description}): ${describeFailure(err)}`,
				"ROLLBACK_FAILED",
				{ cause, rollbackError: err },
			);
		}
	}

	private publish(events: LoanEvent[]): void {
		for (const event of events) {
			for (const listener of this.listeners) {
				try {
					listener(event);
				} catch (err) {
					// The operation has committed; a listener cannot undo it
					this.logger?.error(
						`Listener failed on ${event.type} for loan ${event.loanId}: ${describeFailure(err)}`,
						err instanceof Error ? err.stack : undefined,
					);
				}
			}
		}
	}
}
