/**
 * In-Memory Fungible Token
 *
 * A balance table implementing FungibleToken. Data is lost when the process
 * exits.
 */

import { Principal } from "../core/types.js";
import { FungibleToken } from "./types.js";

/**
 * In-memory fungible token bound to a reserve account.
 *
 * Transfers of a non-positive or non-integer amount, or exceeding the
 * sender's balance, resolve `false` and change nothing.
 *
 * @example
 * ```typescript
 * const token = new MemoryFungibleToken("reserve");
 * token.mint("reserve", 1_000_000);
 *
 * await token.transfer("alice", 1000); // true
 * token.balanceOf("alice"); // 1000
 * ```
 */
export class MemoryFungibleToken implements FungibleToken {
	private balances: Map<Principal, number> = new Map();

	constructor(readonly reserve: Principal) {}

	async transfer(to: Principal, amount: number): Promise<boolean> {
		return this.move(this.reserve, to, amount);
	}

	async transferFrom(
		from: Principal,
		to: Principal,
		amount: number,
	): Promise<boolean> {
		return this.move(from, to, amount);
	}

	/**
	 * Credit `amount` to `to` out of thin air.
	 */
	mint(to: Principal, amount: number): void {
		if (!Number.isSafeInteger(amount) || amount <= 0) {
			throw new RangeError(`Cannot mint ${amount}`);
		}
		this.balances.set(to, this.balanceOf(to) + amount);
	}

	balanceOf(account: Principal): number {
		return this.balances.get(account) ?? 0;
	}

	/**
	 * Sum of all balances.
	 */
	totalSupply(): number {
		let total = 0;
		for (const balance of this.balances.values()) total += balance;
		return total;
	}

	private move(from: Principal, to: Principal, amount: number): boolean {
		if (!Number.isSafeInteger(amount) || amount <= 0) return false;
		const available = this.balanceOf(from);
		if (available < amount) return false;
		this.balances.set(from, available - amount);
		this.balances.set(to, this.balanceOf(to) + amount);
		return true;
	}
}
