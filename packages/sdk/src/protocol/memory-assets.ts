/**
 * In-Memory Asset Registry
 *
 * An ownership table implementing NonFungibleAssets for any number of
 * asset collections.
 */

import {
	AssetId,
	Principal,
	collateralKey,
	collateralLabel,
} from "../core/types.js";
import { NonFungibleAssets, ProtocolError } from "./types.js";

export class MemoryAssetRegistry implements NonFungibleAssets {
	private owners: Map<string, Principal> = new Map();

	async transferFrom(
		asset: AssetId,
		from: Principal,
		to: Principal,
		tokenId: string,
	): Promise<void> {
		const key = collateralKey({ asset, tokenId });
		const label = collateralLabel({ asset, tokenId });
		const owner = this.owners.get(key);
		if (owner === undefined) {
			throw new ProtocolError(`Token ${label} does not exist`, "UNKNOWN_TOKEN", {
				asset,
				tokenId,
			});
		}
		if (owner !== from) {
			throw new ProtocolError(`${from} does not own token ${label}`, "NOT_OWNER", {
				asset,
				tokenId,
				owner,
				from,
			});
		}
		this.owners.set(key, to);
	}

	async ownerOf(asset: AssetId, tokenId: string): Promise<Principal | null> {
		return this.owners.get(collateralKey({ asset, tokenId })) ?? null;
	}

	/**
	 * Create a token owned by `owner`.
	 */
	mint(asset: AssetId, tokenId: string, owner: Principal): void {
		const key = collateralKey({ asset, tokenId });
		if (this.owners.has(key)) {
			throw new ProtocolError(
				`Token ${collateralLabel({ asset, tokenId })} already exists`,
				"DUPLICATE_TOKEN",
			);
		}
		this.owners.set(key, owner);
	}
}
