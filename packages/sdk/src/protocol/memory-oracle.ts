/**
 * In-Memory Score Oracle
 */

import { Principal } from "../core/types.js";
import { OracleReading, ScoreOracle, ProtocolError } from "./types.js";

/**
 * Score feed backed by a map of published scores. Each `publish` opens a
 * new round.
 */
export class MemoryScoreOracle implements ScoreOracle {
	private readings: Map<Principal, OracleReading> = new Map();
	private round = 0;

	constructor(
		private readonly clock: () => number = Date.now,
		private readonly fallbackScore?: number,
	) {}

	/**
	 * Publish a new score for `subject`.
	 */
	publish(subject: Principal, score: number): OracleReading {
		this.round++;
		const now = this.clock();
		const reading: OracleReading = {
			roundId: this.round,
			answer: score,
			startedAt: now,
			updatedAt: now,
			answeredInRound: this.round,
		};
		this.readings.set(subject, reading);
		return reading;
	}

	async latestReading(subject: Principal): Promise<OracleReading> {
		const reading = this.readings.get(subject);
		if (reading) return { ...reading };

		if (this.fallbackScore !== undefined) {
			const now = this.clock();
			return {
				roundId: this.round,
				answer: this.fallbackScore,
				startedAt: now,
				updatedAt: now,
				answeredInRound: this.round,
			};
		}

		throw new ProtocolError(`No score published for ${subject}`, "NO_READING", {
			subject,
		});
	}
}
