import { Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
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

@Injectable()
export class LoanEventsListener {
	private readonly logger = new Logger(LoanEventsListener.name);

	@OnEvent(LOAN_REQUESTED_ID)
	onRequested(evt: LoanRequested) {
		this.logger.log(
			`[${evt.eventId}] Loan ${evt.loanId} requested by ${evt.borrower} for ${evt.amount}`,
		);
	}

	@OnEvent(LOAN_APPROVED_ID)
	onApproved(evt: LoanApproved) {
		this.logger.log(
			`[${evt.eventId}] Loan ${evt.loanId} approved, ${evt.amount} sent to ${evt.borrower}`,
		);
	}

	@OnEvent(LOAN_REPAID_ID)
	onRepaid(evt: LoanRepaid) {
		this.logger.log(`[${evt.eventId}] Loan ${evt.loanId} repaid by ${evt.borrower}`);
	}

	@OnEvent(LOAN_DEFAULTED_ID)
	onDefaulted(evt: LoanDefaulted) {
		this.logger.warn(`[${evt.eventId}] Loan ${evt.loanId} of ${evt.borrower} defaulted`);
	}

	@OnEvent(COLLATERAL_LIQUIDATED_ID)
	onLiquidated(evt: CollateralLiquidated) {
		this.logger.warn(
			`[${evt.eventId}] Collateral of loan ${evt.loanId} liquidated`,
		);
	}
}
