/**
 * Credit Gate
 *
 * Decides whether a user may borrow: the user must be verified and their
 * oracle score must be strictly above the minimum.
 */

import { LedgerError, LedgerLogger, Principal } from "../../core/types.js";
import type { ScoreOracle } from "../../protocol/types.js";
import type { VerificationRegistry } from "../../storage/types.js";
import { EligibilityDecision } from "./types.js";

/**
 * Scores at or below this value are rejected.
 */
export const MIN_CREDIT_SCORE = 600;

export interface CreditGateOptions {
	/** Minimum score, exclusive (defaults to 600) */
	minScore?: number;
	logger?: LedgerLogger;
}

/**
 * Credit gate over an injected score oracle.
 *
 * The verification flags are passed per call so the gate reads them from
 * whatever session the caller is working in.
 *
 * @example
 * ```typescript
 * const gate = new CreditGate(oracle);
 * const decision = await gate.evaluate("alice", store);
 * if (!decision.eligible) console.log(decision.reason);
 * ```
 */
export class CreditGate {
	readonly minScore: number;
	private readonly logger?: LedgerLogger;

	constructor(
		private readonly oracle: ScoreOracle,
		options: CreditGateOptions = {},
	) {
		this.minScore = options.minScore ?? MIN_CREDIT_SCORE;
		this.logger = options.logger;
	}

	/**
	 * Evaluate a user's eligibility.
	 *
	 * The oracle is only consulted for verified users. A reading that is
	 * not a finite number, or a feed that fails, makes the user ineligible.
	 */
	async evaluate(
		user: Principal,
		registry: VerificationRegistry,
	): Promise<EligibilityDecision> {
		const verified = await registry.isVerified(user);
		if (!verified) {
			return { eligible: false, verified, reason: "unverified" };
		}

		let score: number;
		try {
			const reading = await this.oracle.latestReading(user);
			score = reading.answer;
		} catch (err) {
			this.logger?.warn(
				`Score oracle failed for ${user}: ${err instanceof Error ? err.message : String(err)}`,
			);
			return { eligible: false, verified, reason: "score-unavailable" };
		}

		if (!Number.isFinite(score)) {
			return { eligible: false, verified, reason: "score-unavailable" };
		}

		if (score <= this.minScore) {
			return { eligible: false, verified, score, reason: "score-too-low" };
		}

		return { eligible: true, verified, score };
	}

	/**
	 * Whether the user is verified and scores above the minimum.
	 */
	async checkEligible(
		user: Principal,
		registry: VerificationRegistry,
	): Promise<boolean> {
		const decision = await this.evaluate(user, registry);
		return decision.eligible;
	}

	/**
	 * @throws LedgerError `PRECONDITION_FAILED` if the user is not eligible
	 */
	async assertEligible(
		user: Principal,
		registry: VerificationRegistry,
	): Promise<EligibilityDecision> {
		const decision = await this.evaluate(user, registry);
		if (!decision.eligible) {
			throw new LedgerError(
				`User ${user} is not eligible to borrow (${decision.reason})`,
				"PRECONDITION_FAILED",
				{ user, ...decision },
			);
		}
		return decision;
	}
}
