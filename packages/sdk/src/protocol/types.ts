/**
 * Protocol Adapter Types
 *
 * Interfaces for the external primitives the ledger drives: fungible value
 * transfers, non-fungible asset custody and the credit score feed.
 * Implementations live outside the SDK (chain clients, payment rails);
 * in-process reference adapters are provided for tests and development.
 */

import { AssetId, Principal } from "../core/types.js";

/**
 * Fungible value transfer primitive, bound to the ledger's reserve account.
 *
 * Both methods report refusal by resolving `false`. Rejections are treated
 * the same way by the ledger.
 */
export interface FungibleToken {
	/**
	 * Move `amount` from the reserve account to `to`.
	 */
	transfer(to: Principal, amount: number): Promise<boolean>;

	/**
	 * Move `amount` from `from` to `to` on behalf of the reserve.
	 */
	transferFrom(from: Principal, to: Principal, amount: number): Promise<boolean>;
}

/**
 * Non-fungible asset transfer primitive spanning every asset collection.
 */
export interface NonFungibleAssets {
	/**
	 * Move `tokenId` of `asset` from `from` to `to`.
	 *
	 * @throws ProtocolError when `from` does not own the token or the transfer fails
	 */
	transferFrom(
		asset: AssetId,
		from: Principal,
		to: Principal,
		tokenId: string,
	): Promise<void>;

	/**
	 * Current owner of a token, or null if it does not exist.
	 */
	ownerOf(asset: AssetId, tokenId: string): Promise<Principal | null>;
}

/**
 * A single round of a price/score feed.
 */
export interface OracleReading {
	/** Round identifier */
	roundId: number;
	/** The reported value (signed) */
	answer: number;
	/** When the round started (Unix timestamp ms) */
	startedAt: number;
	/** When the answer was last updated (Unix timestamp ms) */
	updatedAt: number;
	/** Round in which the answer was computed */
	answeredInRound: number;
}

/**
 * Credit score feed.
 */
export interface ScoreOracle {
	/**
	 * Latest score reading for `subject`.
	 */
	latestReading(subject: Principal): Promise<OracleReading>;
}

/**
 * Error thrown by protocol operations.
 */
export class ProtocolError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ProtocolError";
	}
}
