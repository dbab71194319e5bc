/**
 * Collateral Vault
 *
 * Custody of pledged non-fungible assets. The vault tracks which assets it
 * holds on behalf of which depositor; the assets themselves sit in the
 * custodian account of the underlying `NonFungibleAssets` primitive.
 */

import {
	CollateralRef,
	LedgerError,
	LedgerLogger,
	Principal,
	collateralKey,
	collateralLabel,
	validateCollateral,
} from "../../core/types.js";
import type { NonFungibleAssets } from "../../protocol/types.js";

/**
 * Proof of an active lock, returned by `lock` and required to move the
 * asset out again.
 */
export interface LockHandle {
	/** Unique per lock, never reused */
	lockId: number;
	collateral: CollateralRef;
	/** Account the asset was taken from */
	depositor: Principal;
	/** When the lock was taken (Unix timestamp ms) */
	lockedAt: number;
}

function describeFailure(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Collateral vault over an injected asset primitive.
 *
 * @example
 * ```typescript
 * const vault = new CollateralVault(assets, "vault");
 * const handle = await vault.lock({ asset: "punks", tokenId: "7" }, "alice");
 * await vault.release(handle, "alice");
 * ```
 */
export class CollateralVault {
	private locks: Map<string, LockHandle> = new Map();
	private pending: Set<string> = new Set();
	private lastLockId = 0;

	constructor(
		private readonly assets: NonFungibleAssets,
		readonly custodian: Principal,
		private readonly options: {
			clock?: () => number;
			logger?: LedgerLogger;
		} = {},
	) {}

	/**
	 * Take an asset into custody.
	 *
	 * `options.depositor` records someone other than `from` as the asset's
	 * depositor, for assets taken back from a liquidator.
	 *
	 * @throws LedgerError `PRECONDITION_FAILED` if the asset is already
	 * locked or the transfer into custody fails
	 */
	async lock(
		collateral: CollateralRef,
		from: Principal,
		options: { depositor?: Principal } = {},
	): Promise<LockHandle> {
		validateCollateral(collateral);
		const key = collateralKey(collateral);
		const label = collateralLabel(collateral);
		if (this.locks.has(key) || this.pending.has(key)) {
			throw new LedgerError(
				`Collateral ${label} is already locked`,
				"PRECONDITION_FAILED",
				{ collateral },
			);
		}

		this.pending.add(key);
		try {
			await this.assets.transferFrom(
				collateral.asset,
				from,
				this.custodian,
				collateral.tokenId,
			);
		} catch (err) {
			throw new LedgerError(
				`Failed to lock collateral ${label}: ${describeFailure(err)}`,
				"PRECONDITION_FAILED",
				{ collateral, from, cause: err },
			);
		} finally {
			this.pending.delete(key);
		}

		const handle = this.register(collateral, options.depositor ?? from);
		this.options.logger?.log(
			`Locked ${label} from ${from} (lock ${handle.lockId})`,
		);
		return handle;
	}

	/**
	 * Return an asset to `to`, normally its depositor.
	 *
	 * @throws LedgerError `INVALID_LOCK` if the handle is not the active lock
	 */
	async release(handle: LockHandle, to: Principal): Promise<void> {
		await this.unlock(handle, to, "release");
	}

	/**
	 * Move an asset to `to`, normally the liquidator.
	 *
	 * @throws LedgerError `INVALID_LOCK` if the handle is not the active lock
	 */
	async seize(handle: LockHandle, to: Principal): Promise<void> {
		await this.unlock(handle, to, "seize");
	}

	/**
	 * Active lock on an asset.
	 *
	 * @throws LedgerError `INVALID_LOCK` if the asset is not locked
	 */
	handleFor(collateral: CollateralRef): LockHandle {
		const handle = this.locks.get(collateralKey(collateral));
		if (!handle) {
			throw new LedgerError(
				`No active lock for collateral ${collateralLabel(collateral)}`,
				"INVALID_LOCK",
				{ collateral },
			);
		}
		return { ...handle, collateral: { ...handle.collateral } };
	}

	isLocked(collateral: CollateralRef): boolean {
		return this.locks.has(collateralKey(collateral));
	}

	/**
	 * Current owner of an asset according to the asset primitive.
	 */
	custodyOf(collateral: CollateralRef): Promise<Principal | null> {
		return this.assets.ownerOf(collateral.asset, collateral.tokenId);
	}

	activeLocks(): LockHandle[] {
		return Array.from(this.locks.values()).map((h) => ({
			...h,
			collateral: { ...h.collateral },
		}));
	}

	/**
	 * Re-register a lock for an asset the custodian already holds, e.g.
	 * after a restart. Returns the existing handle if the asset is locked.
	 *
	 * @throws LedgerError `INVALID_LOCK` if the custodian does not hold the asset
	 */
	async restore(
		collateral: CollateralRef,
		depositor: Principal,
	): Promise<LockHandle> {
		const existing = this.locks.get(collateralKey(collateral));
		if (existing) return { ...existing };

		const owner = await this.custodyOf(collateral);
		if (owner !== this.custodian) {
			throw new LedgerError(
				`Custodian does not hold collateral ${collateralLabel(collateral)}`,
				"INVALID_LOCK",
				{ collateral, owner },
			);
		}
		return this.register(collateral, depositor);
	}

	private register(collateral: CollateralRef, depositor: Principal): LockHandle {
		this.lastLockId++;
		const handle: LockHandle = {
			lockId: this.lastLockId,
			collateral: { ...collateral },
			depositor,
			lockedAt: (this.options.clock ?? Date.now)(),
		};
		this.locks.set(collateralKey(collateral), handle);
		return { ...handle, collateral: { ...collateral } };
	}

	private async unlock(
		handle: LockHandle,
		to: Principal,
		action: "release" | "seize",
	): Promise<void> {
		const key = collateralKey(handle.collateral);
		const label = collateralLabel(handle.collateral);
		const active = this.locks.get(key);
		if (!active || active.lockId !== handle.lockId) {
			throw new LedgerError(
				`Lock ${handle.lockId} on ${label} is not active`,
				"INVALID_LOCK",
				{ lockId: handle.lockId, collateral: handle.collateral },
			);
		}

		// Taken out before the transfer so a concurrent unlock sees no lock
		this.locks.delete(key);
		try {
			await this.assets.transferFrom(
				handle.collateral.asset,
				this.custodian,
				to,
				handle.collateral.tokenId,
			);
		} catch (err) {
			this.locks.set(key, active);
			throw new LedgerError(
				`Failed to ${action} collateral ${label}: ${describeFailure(err)}`,
				"PRECONDITION_FAILED",
				{ lockId: handle.lockId, collateral: handle.collateral, to, cause: err },
			);
		}

		this.options.logger?.log(
			`${action === "release" ? "Released" : "Seized"} ${label} to ${to} (lock ${handle.lockId})`,
		);
	}
}
