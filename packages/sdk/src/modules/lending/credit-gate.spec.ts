import { MemoryScoreOracle } from "../../protocol/memory-oracle.js";
import { ScoreOracle } from "../../protocol/types.js";
import { VerificationRegistry } from "../../storage/types.js";
import { CreditGate, MIN_CREDIT_SCORE } from "./credit-gate.js";

function registryOf(...verified: string[]): VerificationRegistry {
	return { isVerified: async (user) => verified.includes(user) };
}

describe("CreditGate", () => {
	let oracle: MemoryScoreOracle;
	let gate: CreditGate;

	beforeEach(() => {
		oracle = new MemoryScoreOracle(() => 0);
		gate = new CreditGate(oracle);
	});

	it("uses 600 as the minimum score", () => {
		expect(MIN_CREDIT_SCORE).toBe(600);
		expect(gate.minScore).toBe(600);
	});

	it("admits a verified user scoring above the minimum", async () => {
		oracle.publish("alice", 700);

		await expect(gate.evaluate("alice", registryOf("alice"))).resolves.toEqual({
			eligible: true,
			verified: true,
			score: 700,
		});
		await expect(gate.checkEligible("alice", registryOf("alice"))).resolves.toBe(
			true,
		);
	});

	it("rejects a score equal to the minimum", async () => {
		oracle.publish("alice", 600);

		await expect(gate.evaluate("alice", registryOf("alice"))).resolves.toEqual({
			eligible: false,
			verified: true,
			score: 600,
			reason: "score-too-low",
		});
	});

	it("admits a score one above the minimum", async () => {
		oracle.publish("alice", 601);
		await expect(gate.checkEligible("alice", registryOf("alice"))).resolves.toBe(
			true,
		);
	});

	it("does not consult the oracle for an unverified user", async () => {
		const latestReading = jest.fn();
		const spyGate = new CreditGate({ latestReading });

		await expect(spyGate.evaluate("bob", registryOf())).resolves.toEqual({
			eligible: false,
			verified: false,
			reason: "unverified",
		});
		expect(latestReading).not.toHaveBeenCalled();
	});

	it("treats a failing feed as an unavailable score", async () => {
		const warn = jest.fn();
		const failing = new CreditGate(oracle, {
			logger: { log: jest.fn(), warn, error: jest.fn() },
		});

		await expect(failing.evaluate("carol", registryOf("carol"))).resolves.toEqual(
			{ eligible: false, verified: true, reason: "score-unavailable" },
		);
		expect(warn).toHaveBeenCalledWith(
			"Score oracle failed for carol: No score published for carol",
		);
	});

	it("treats a non-finite answer as an unavailable score", async () => {
		const broken: ScoreOracle = {
			latestReading: async () => ({
				roundId: 1,
				answer: Number.NaN,
				startedAt: 0,
				updatedAt: 0,
				answeredInRound: 1,
			}),
		};
		const brokenGate = new CreditGate(broken);

		const decision = await brokenGate.evaluate("alice", registryOf("alice"));
		expect(decision.eligible).toBe(false);
		expect(decision.reason).toBe("score-unavailable");
	});

	it("honors a custom minimum", async () => {
		const strict = new CreditGate(oracle, { minScore: 750 });
		oracle.publish("alice", 700);
		await expect(strict.checkEligible("alice", registryOf("alice"))).resolves.toBe(
			false,
		);
	});

	describe("assertEligible", () => {
		it("throws PRECONDITION_FAILED with the decision", async () => {
			oracle.publish("alice", 550);

			await expect(
				gate.assertEligible("alice", registryOf("alice")),
			).rejects.toMatchObject({
				code: "PRECONDITION_FAILED",
				message: "User alice is not eligible to borrow (score-too-low)",
				details: {
					user: "alice",
					eligible: false,
					verified: true,
					score: 550,
					reason: "score-too-low",
				},
			});
		});

		it("returns the decision for an eligible user", async () => {
			oracle.publish("alice", 800);
			const decision = await gate.assertEligible("alice", registryOf("alice"));
			expect(decision.score).toBe(800);
		});
	});
});
