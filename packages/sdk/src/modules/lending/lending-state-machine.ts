/**
 * Lending State Machine Configuration
 *
 * Defines the state machine for the loan lifecycle.
 */

import {
	LifecycleStateMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../../lifecycle/index.js";
import { LoanAction, LoanBase, LoanStatus } from "./types.js";
import { isPastDue } from "./lending-terms.js";

/**
 * Context evaluated by the lifecycle guards.
 */
export interface LoanTransitionContext {
	loan: LoanBase;
	now: number;
}

/**
 * Loan lifecycle configuration.
 */
export const LOAN_LIFECYCLE: StateMachineConfig<
	LoanStatus,
	LoanAction,
	LoanTransitionContext
> = {
	initialState: "requested",
	states: [
		createState<LoanStatus, LoanAction>(
			"requested",
			["approve", "repay", "default"],
			{
				description: "Collateral locked, loan open until repaid or defaulted",
			},
		),
		createState<LoanStatus, LoanAction>("repaid", [], {
			isFinal: true,
			description: "Loan repaid, collateral returned to the borrower",
		}),
		createState<LoanStatus, LoanAction>("defaulted", [], {
			isFinal: true,
			description: "Loan overdue, collateral seized by the liquidator",
		}),
	],
	transitions: [
		createTransition<LoanStatus, LoanAction, LoanTransitionContext>(
			"requested",
			"approve",
			"requested",
			{
				guard: ({ loan }) => loan.approvedAt === undefined,
				guardMessage: "Loan principal was already disbursed",
			},
		),
		createTransition<LoanStatus, LoanAction, LoanTransitionContext>(
			"requested",
			"repay",
			"repaid",
		),
		createTransition<LoanStatus, LoanAction, LoanTransitionContext>(
			"requested",
			"default",
			"defaulted",
			{
				guard: ({ loan, now }) => isPastDue(loan, now),
				guardMessage: "Loan is not yet due",
			},
		),
	],
};

/**
 * Machine positioned at a loan's current status.
 */
export function loanMachine(
	status: LoanStatus,
): LifecycleStateMachine<LoanStatus, LoanAction, LoanTransitionContext> {
	return new LifecycleStateMachine(LOAN_LIFECYCLE, status);
}

/**
 * Check if the vault should hold the loan's collateral.
 */
export function holdsCollateral(status: LoanStatus): boolean {
	return status === "requested";
}

/**
 * Check if state is terminal.
 */
export function isFinalState(status: LoanStatus): boolean {
	return status === "repaid" || status === "defaulted";
}
