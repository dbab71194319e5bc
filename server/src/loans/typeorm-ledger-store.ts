/**
 * TypeORM Ledger Store
 *
 * Implements the SDK's LedgerStore interface on the `loans` and
 * `user_profiles` tables. Transactions are serialized with a mutex and
 * run inside a database transaction, so a failed operation leaves no rows
 * behind.
 */

import { Injectable } from "@nestjs/common";
import {
	DataSource,
	EntityManager,
	FindOptionsWhere,
	In,
	Repository,
} from "typeorm";
import {
	LOAN_STATUSES,
	LedgerSession,
	LedgerStore,
	Loan,
	LoanBase,
	LoanId,
	LoanQueryOptions,
	LoanStatus,
	Mutex,
	NewLoan,
	Principal,
	QueryResult,
	StorageError,
	approvedLoan,
	defaultedLoan,
	emptyStatusCounts,
	loanNotFound,
	repaidLoan,
	settledAt,
} from "@pledgebook/sdk";
import { LoanEntity } from "./loan.entity";
import { UserProfileEntity } from "./user-profile.entity";

function requireSettledAt(entity: LoanEntity): number {
	if (entity.settledAt === null) {
		throw new StorageError(
			`Loan ${entity.id} is ${entity.status} without a settlement time`,
			"CORRUPT_RECORD",
			{ loanId: entity.id },
		);
	}
	return entity.settledAt;
}

/**
 * Convert a row to the SDK's Loan record.
 */
export function toLoan(entity: LoanEntity): Loan {
	const base: LoanBase = {
		id: entity.id,
		borrower: entity.borrower,
		amount: entity.amount,
		interestRate: entity.interestRate,
		durationMs: entity.durationMs,
		collateral: {
			asset: entity.collateralAsset,
			tokenId: entity.collateralTokenId,
		},
		issuedAt: entity.issuedAt,
		...(entity.approvedAt !== null ? { approvedAt: entity.approvedAt } : {}),
	};

	switch (entity.status) {
		case "requested":
			return { ...base, status: "requested" };
		case "repaid":
			return { ...base, status: "repaid", repaidAt: requireSettledAt(entity) };
		case "defaulted":
			return {
				...base,
				status: "defaulted",
				defaultedAt: requireSettledAt(entity),
			};
	}
}

class TypeOrmLedgerSession implements LedgerSession {
	private readonly loans: Repository<LoanEntity>;
	private readonly profiles: Repository<UserProfileEntity>;

	constructor(manager: EntityManager) {
		this.loans = manager.getRepository(LoanEntity);
		this.profiles = manager.getRepository(UserProfileEntity);
	}

	async create(draft: NewLoan): Promise<Loan> {
		const entity = await this.query(`create loan for ${draft.borrower}`, () =>
			this.loans.save(
				this.loans.create({
					borrower: draft.borrower,
					amount: draft.amount,
					interestRate: draft.interestRate,
					durationMs: draft.durationMs,
					collateralAsset: draft.collateral.asset,
					collateralTokenId: draft.collateral.tokenId,
					issuedAt: draft.issuedAt,
					approvedAt: null,
					status: "requested",
					settledAt: null,
				}),
			),
		);
		return toLoan(entity);
	}

	async get(id: LoanId): Promise<Loan> {
		const loan = await this.find(id);
		if (!loan) throw loanNotFound(id);
		return loan;
	}

	async find(id: LoanId): Promise<Loan | null> {
		const entity = await this.query(`load loan ${id}`, () =>
			this.loans.findOne({ where: { id } }),
		);
		return entity ? toLoan(entity) : null;
	}

	markApproved(id: LoanId, at: number): Promise<Loan> {
		return this.transition(id, (loan) => approvedLoan(loan, at));
	}

	markRepaid(id: LoanId, at: number): Promise<Loan> {
		return this.transition(id, (loan) => repaidLoan(loan, at));
	}

	markDefaulted(id: LoanId, at: number): Promise<Loan> {
		return this.transition(id, (loan) => defaultedLoan(loan, at));
	}

	async setVerified(user: Principal, verified: boolean): Promise<void> {
		await this.query(`save verification of ${user}`, () =>
			this.profiles.save(this.profiles.create({ principal: user, verified })),
		);
	}

	async isVerified(user: Principal): Promise<boolean> {
		const profile = await this.query(`load profile of ${user}`, () =>
			this.profiles.findOne({ where: { principal: user } }),
		);
		return profile?.verified ?? false;
	}

	async list(options?: LoanQueryOptions): Promise<QueryResult<Loan>> {
		const where: FindOptionsWhere<LoanEntity> = {};
		if (options?.borrower !== undefined) {
			where.borrower = options.borrower;
		}
		if (options?.status) {
			where.status = In(
				Array.isArray(options.status) ? options.status : [options.status],
			);
		}

		const offset = options?.offset ?? 0;
		const [entities, total] = await this.query("query loans", () =>
			this.loans.findAndCount({
				where,
				order: { id: options?.sortOrder === "asc" ? "ASC" : "DESC" },
				skip: offset,
				take: options?.limit,
			}),
		);

		const items = entities.map(toLoan);
		return { items, total, hasMore: offset + items.length < total };
	}

	async countByStatus(): Promise<Record<LoanStatus, number>> {
		const counts = emptyStatusCounts();
		for (const status of LOAN_STATUSES) {
			counts[status] = await this.query(`count ${status} loans`, () =>
				this.loans.count({ where: { status } }),
			);
		}
		return counts;
	}

	private async transition(
		id: LoanId,
		update: (loan: Loan) => Loan,
	): Promise<Loan> {
		const entity = await this.query(`load loan ${id}`, () =>
			this.loans.findOne({ where: { id } }),
		);
		if (!entity) throw loanNotFound(id);

		const next = update(toLoan(entity));
		entity.status = next.status;
		entity.approvedAt = next.approvedAt ?? null;
		entity.settledAt = settledAt(next) ?? null;

		await this.query(`update loan ${id}`, () => this.loans.save(entity));
		return next;
	}

	private async query<T>(description: string, run: () => Promise<T>): Promise<T> {
		try {
			return await run();
		} catch (error) {
			throw new StorageError(`Failed to ${description}`, "QUERY_ERROR", {
				error,
			});
		}
	}
}

/**
 * TypeORM-based ledger store.
 *
 * @example
 * ```typescript
 * const store = new TypeOrmLedgerStore(dataSource);
 * const loan = await store.withTransaction((tx) => tx.create(draft));
 * ```
 */
@Injectable()
export class TypeOrmLedgerStore implements LedgerStore {
	private readonly mutex = new Mutex();

	constructor(private readonly dataSource: DataSource) {}

	withTransaction<T>(fn: (tx: LedgerSession) => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(() =>
			this.dataSource.transaction((manager) =>
				fn(new TypeOrmLedgerSession(manager)),
			),
		);
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

	private read<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(() =>
			fn(new TypeOrmLedgerSession(this.dataSource.manager)),
		);
	}
}
