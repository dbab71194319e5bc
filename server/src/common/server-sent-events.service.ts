import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import type { LoanId, Principal } from "@pledgebook/sdk";
import {
	COLLATERAL_LIQUIDATED_ID,
	type CollateralLiquidated,
	LOAN_APPROVED_ID,
	LOAN_DEFAULTED_ID,
	LOAN_REPAID_ID,
	LOAN_REQUESTED_ID,
	type LoanApproved,
	type LoanDefaulted,
	type LoanRepaid,
	type LoanRequested,
} from "./loan.event";

export type LoanSse =
	| { type: "new_loan"; loanId: LoanId; borrower: Principal }
	| { type: "loan_updated"; loanId: LoanId; borrower: Principal; status: string };

export type SseEvent<T = LoanSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<LoanSse>();

	get adminEvents() {
		return this.events$.asObservable();
	}

	loanEvents(borrower?: Principal) {
		if (borrower) {
			return this.events$.pipe(filter((e) => e.borrower === borrower));
		}
		return this.events$.asObservable();
	}

	@OnEvent(LOAN_REQUESTED_ID)
	onLoanRequested(evt: LoanRequested) {
		this.events$.next({
			type: "new_loan",
			loanId: evt.loanId,
			borrower: evt.borrower,
		});
	}

	@OnEvent(LOAN_APPROVED_ID)
	onLoanApproved(evt: LoanApproved) {
		this.events$.next({
			type: "loan_updated",
			loanId: evt.loanId,
			borrower: evt.borrower,
			status: "approved",
		});
	}

	@OnEvent(LOAN_REPAID_ID)
	onLoanRepaid(evt: LoanRepaid) {
		this.events$.next({
			type: "loan_updated",
			loanId: evt.loanId,
			borrower: evt.borrower,
			status: "repaid",
		});
	}

	@OnEvent(LOAN_DEFAULTED_ID)
	onLoanDefaulted(evt: LoanDefaulted) {
		this.events$.next({
			type: "loan_updated",
			loanId: evt.loanId,
			borrower: evt.borrower,
			status: "defaulted",
		});
	}

	@OnEvent(COLLATERAL_LIQUIDATED_ID)
	onCollateralLiquidated(evt: CollateralLiquidated) {
		this.events$.next({
			type: "loan_updated",
			loanId: evt.loanId,
			borrower: evt.borrower,
			status: "liquidated",
		});
	}
}
