/**
 * Core module - Identities, collateral references and errors
 */

// Types
export type {
	Principal,
	AssetId,
	LoanId,
	CollateralRef,
	LedgerLogger,
	LedgerErrorCode,
} from "./types.js";

// Errors and validation utilities
export {
	LedgerError,
	isLedgerError,
	collateralKey,
	collateralLabel,
	validateCollateral,
	validateAmount,
} from "./types.js";
