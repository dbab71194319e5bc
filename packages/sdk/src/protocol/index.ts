/**
 * Protocol module - External transfer and feed adapters
 *
 * This module defines the interfaces the ledger drives and provides
 * in-process reference implementations.
 */

// Types
export type {
	FungibleToken,
	NonFungibleAssets,
	OracleReading,
	ScoreOracle,
} from "./types.js";

export { ProtocolError } from "./types.js";

// Reference implementations
export { MemoryFungibleToken } from "./memory-token.js";
export { MemoryAssetRegistry } from "./memory-assets.js";
export { MemoryScoreOracle } from "./memory-oracle.js";
