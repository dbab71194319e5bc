import {
	ForbiddenException,
	Inject,
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import {
	calculateRepaymentAmount,
	type CustodyReport,
	dueAt,
	type Loan,
	type LoanEvent,
	type LoanId,
	LoanStateMachine,
	type LoanStatus,
	type Principal,
	type UserProfile,
} from "@pledgebook/sdk";
import { LOAN_LEDGER } from "./loans.constants";
import { GetLoanDto } from "./dto/get-loan.dto";
import { RequestLoanInDto } from "./dto/request-loan.dto";
import { RepaymentQuoteDto } from "./dto/repayment-quote.dto";
import { Cursor, nextCursor } from "../common/dto/envelopes";
import {
	COLLATERAL_LIQUIDATED_ID,
	CollateralLiquidated,
	LOAN_APPROVED_ID,
	LOAN_DEFAULTED_ID,
	LOAN_REPAID_ID,
	LOAN_REQUESTED_ID,
	LoanApproved,
	LoanDefaulted,
	LoanRepaid,
	LoanRequested,
} from "../common/loan.event";
import { toError } from "../common/errors";

export type LoanPage = {
	items: GetLoanDto[];
	total: number;
	nextCursor?: string;
};

export type LoanStats = Record<LoanStatus, number> & { total: number };

export function toLoanDto(loan: Loan): GetLoanDto {
	const dto: GetLoanDto = {
		id: loan.id,
		borrower: loan.borrower,
		amount: loan.amount,
		interestRate: loan.interestRate,
		durationMs: loan.durationMs,
		collateral: { ...loan.collateral },
		status: loan.status,
		totalRepayment: calculateRepaymentAmount(loan.amount, loan.interestRate),
		issuedAt: loan.issuedAt,
		dueAt: dueAt(loan),
	};
	if (loan.approvedAt !== undefined) dto.approvedAt = loan.approvedAt;
	switch (loan.status) {
		case "repaid":
			dto.repaidAt = loan.repaidAt;
			break;
		case "defaulted":
			dto.defaultedAt = loan.defaultedAt;
			break;
		case "requested":
			break;
	}
	return dto;
}

@Injectable()
export class LoansService implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(LoansService.name);
	private unsubscribe?: () => void;

	constructor(
		@Inject(LOAN_LEDGER) private readonly ledger: LoanStateMachine,
		private readonly events: EventEmitter2,
	) {}

	async onModuleInit() {
		this.unsubscribe = this.ledger.onEvent((event) => this.reemit(event));
		let report: CustodyReport;
		try {
			report = await this.ledger.restoreCustody();
		} catch (e) {
			throw new Error("Failed to restore collateral custody", {
				cause: toError(e),
			});
		}
		if (report.restored.length > 0) {
			this.logger.log(
				`Restored custody of ${report.restored.length} open loan(s)`,
			);
		}
		// Open loans without collateral in the vault can neither be repaid nor defaulted
		if (report.missing.length > 0) {
			throw new Error(
				`Collateral not held for open loan(s): ${report.missing.join(", ")}`,
			);
		}
	}

	onModuleDestroy() {
		this.unsubscribe?.();
	}

	async request(borrower: Principal, dto: RequestLoanInDto): Promise<GetLoanDto> {
		const loan = await this.ledger.request(borrower, {
			amount: dto.amount,
			durationMs: dto.durationSeconds * 1000,
			collateral: {
				asset: dto.collateral.asset,
				tokenId: dto.collateral.tokenId,
			},
		});
		return toLoanDto(loan);
	}

	async approve(caller: Principal, id: LoanId): Promise<GetLoanDto> {
		return toLoanDto(await this.ledger.approve(caller, id));
	}

	async repay(caller: Principal, id: LoanId): Promise<GetLoanDto> {
		return toLoanDto(await this.ledger.repay(caller, id));
	}

	async checkDefault(caller: Principal, id: LoanId): Promise<GetLoanDto> {
		return toLoanDto(await this.ledger.checkDefault(caller, id));
	}

	verifyUser(caller: Principal, user: Principal, verified: boolean) {
		return this.ledger.verifyUser(caller, user, verified);
	}

	profile(user: Principal): Promise<UserProfile> {
		return this.ledger.profile(user);
	}

	/**
	 * A loan, visible to its borrower and the administrator.
	 */
	async getForCaller(id: LoanId, caller: Principal): Promise<GetLoanDto> {
		const loan = await this.ledger.getLoan(id);
		this.assertCanView(loan, caller);
		return toLoanDto(loan);
	}

	async quoteForCaller(
		id: LoanId,
		caller: Principal,
	): Promise<RepaymentQuoteDto> {
		const loan = await this.ledger.getLoan(id);
		this.assertCanView(loan, caller);
		return this.ledger.quote(id);
	}

	getByBorrower(
		borrower: Principal,
		limit: number,
		cursor: Cursor,
		status?: LoanStatus,
	): Promise<LoanPage> {
		return this.page({ borrower, status }, limit, cursor);
	}

	getAll(limit: number, cursor: Cursor, status?: LoanStatus): Promise<LoanPage> {
		return this.page({ status }, limit, cursor);
	}

	async stats(): Promise<LoanStats> {
		const counts = await this.ledger.countByStatus();
		const total = counts.requested + counts.repaid + counts.defaulted;
		return { ...counts, total };
	}

	private async page(
		filter: { borrower?: Principal; status?: LoanStatus },
		limit: number,
		cursor: Cursor,
	): Promise<LoanPage> {
		const { items, total, hasMore } = await this.ledger.listLoans({
			...filter,
			limit,
			offset: cursor.offset,
			sortOrder: "desc",
		});
		return {
			items: items.map(toLoanDto),
			total,
			nextCursor: nextCursor(cursor, items.length, hasMore),
		};
	}

	private assertCanView(loan: Loan, caller: Principal) {
		if (loan.borrower !== caller && !this.ledger.isAdmin(caller)) {
			throw new ForbiddenException("Not allowed to view this loan");
		}
	}

	private reemit(event: LoanEvent) {
		const eventId = nanoid(8);
		const emittedAt = new Date().toISOString();
		switch (event.type) {
			case "LoanRequested":
				this.events.emit(LOAN_REQUESTED_ID, {
					eventId,
					loanId: event.loanId,
					borrower: event.borrower,
					amount: event.amount,
					emittedAt,
				} satisfies LoanRequested);
				break;
			case "LoanApproved":
				this.events.emit(LOAN_APPROVED_ID, {
					eventId,
					loanId: event.loanId,
					borrower: event.borrower,
					amount: event.amount,
					emittedAt,
				} satisfies LoanApproved);
				break;
			case "LoanRepaid":
				this.events.emit(LOAN_REPAID_ID, {
					eventId,
					loanId: event.loanId,
					borrower: event.borrower,
					emittedAt,
				} satisfies LoanRepaid);
				break;
			case "LoanDefaulted":
				this.events.emit(LOAN_DEFAULTED_ID, {
					eventId,
					loanId: event.loanId,
					borrower: event.borrower,
					emittedAt,
				} satisfies LoanDefaulted);
				break;
			case "CollateralLiquidated":
				this.events.emit(COLLATERAL_LIQUIDATED_ID, {
					eventId,
					loanId: event.loanId,
					borrower: event.borrower,
					emittedAt,
				} satisfies CollateralLiquidated);
				break;
		}
	}
}
