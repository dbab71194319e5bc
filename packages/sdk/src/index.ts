/**
 * Pledgebook SDK
 *
 * A collateralized lending ledger: borrowers pledge a non-fungible asset,
 * the administrator disburses the principal, and the loan ends either
 * repaid (collateral returned) or defaulted (collateral seized).
 *
 * @example
 * ```typescript
 * import {
 *   CollateralVault,
 *   CreditGate,
 *   LoanStateMachine,
 *   MemoryLedgerStore,
 * } from "@pledgebook/sdk";
 *
 * const ledger = new LoanStateMachine({
 *   store: new MemoryLedgerStore(),
 *   vault: new CollateralVault(assets, "vault"),
 *   gate: new CreditGate(oracle),
 *   token,
 *   reserve: "reserve",
 *   admin: "admin",
 * });
 *
 * ledger.onEvent((event) => console.log(event.type, event.loanId));
 * ```
 */

// Core - Identities, collateral references and errors
export {
	// Types
	type Principal,
	type AssetId,
	type LoanId,
	type CollateralRef,
	type LedgerLogger,
	type LedgerErrorCode,
	// Classes
	LedgerError,
	// Utilities
	isLedgerError,
	collateralKey,
	collateralLabel,
	validateCollateral,
	validateAmount,
} from "./core/index.js";

// Lifecycle - Declarative state machines
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	LifecycleStateMachine,
	createState,
	createTransition,
} from "./lifecycle/index.js";

// Protocol - Transfer primitives and score feed
export {
	type FungibleToken,
	type NonFungibleAssets,
	type OracleReading,
	type ScoreOracle,
	ProtocolError,
	MemoryFungibleToken,
	MemoryAssetRegistry,
	MemoryScoreOracle,
} from "./protocol/index.js";

// Storage - Pluggable persistence
export {
	type LoanQueryOptions,
	type QueryResult,
	type VerificationRegistry,
	type LedgerSession,
	type LedgerStore,
	StorageError,
	loanNotFound,
	assertOpen,
	loanBase,
	approvedLoan,
	repaidLoan,
	defaultedLoan,
	settledAt,
	emptyStatusCounts,
	MemoryLedgerStore,
} from "./storage/index.js";

// Utils
export { Mutex } from "./utils/index.js";

// Lending
export * from "./modules/lending/index.js";
