/**
 * Core types for the Pledgebook SDK
 *
 * Identities, collateral references and the error taxonomy shared by
 * every module of the ledger.
 */

/**
 * An account identity: a borrower, the administrator, the reserve or the
 * vault custodian. Authorization checks compare principals by equality.
 */
export type Principal = string;

/**
 * Identity of a non-fungible asset collection (e.g. a contract address).
 */
export type AssetId = string;

/**
 * Loan identifier. Assigned from 1 upwards; 0 denotes "no loan".
 */
export type LoanId = number;

/**
 * Reference to a single non-fungible asset pledged as collateral.
 */
export interface CollateralRef {
	/** The asset collection */
	asset: AssetId;
	/** Token id within the collection */
	tokenId: string;
}

/**
 * Minimal logger contract. NestJS's `Logger` satisfies it, as does `console`.
 */
export interface LedgerLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string, trace?: string): void;
}

/**
 * Error codes surfaced by ledger operations.
 */
export type LedgerErrorCode =
	| "UNAUTHORIZED" // Caller lacks the required role or identity
	| "NOT_FOUND" // Referenced loan id was never assigned
	| "ALREADY_FINALIZED" // Loan already reached a terminal status
	| "PRECONDITION_FAILED" // Ineligible borrower, not yet due, transfer refused
	| "INVALID_LOCK" // Vault handle does not match an active lock
	| "ROLLBACK_FAILED"; // A compensating transfer failed

/**
 * Error thrown by ledger operations. Every operation that throws leaves the
 * ledger unchanged.
 */
export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code: LedgerErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "LedgerError";
	}
}

/**
 * Type guard for a ledger error, optionally of a given code.
 */
export function isLedgerError(
	err: unknown,
	code?: LedgerErrorCode,
): err is LedgerError {
	return err instanceof LedgerError && (code === undefined || err.code === code);
}

/**
 * Stable key for a collateral reference, used to index vault locks.
 */
export function collateralKey(collateral: CollateralRef): string {
	return JSON.stringify([collateral.asset, collateral.tokenId]);
}

/**
 * Human-readable form of a collateral reference, for messages.
 */
export function collateralLabel(collateral: CollateralRef): string {
	return `${collateral.asset}#${collateral.tokenId}`;
}

/**
 * Validates a collateral reference.
 */
export function validateCollateral(collateral: CollateralRef): void {
	if (!collateral.asset || collateral.asset.trim().length === 0) {
		throw new LedgerError(
			"Collateral asset cannot be empty",
			"PRECONDITION_FAILED",
			{ field: "asset" },
		);
	}
	if (!collateral.tokenId || collateral.tokenId.trim().length === 0) {
		throw new LedgerError(
			"Collateral token id cannot be empty",
			"PRECONDITION_FAILED",
			{ field: "tokenId" },
		);
	}
}

/**
 * Validates an amount of fungible value: a safe, strictly positive integer.
 */
export function validateAmount(amount: number, field = "amount"): void {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw new LedgerError(
			`${field} must be a positive integer, got ${amount}`,
			"PRECONDITION_FAILED",
			{ field, value: amount },
		);
	}
}
