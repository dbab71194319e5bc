import { MemoryAssetRegistry } from "./memory-assets.js";
import { MemoryScoreOracle } from "./memory-oracle.js";
import { MemoryFungibleToken } from "./memory-token.js";
import { ProtocolError } from "./types.js";

describe("MemoryFungibleToken", () => {
	let token: MemoryFungibleToken;

	beforeEach(() => {
		token = new MemoryFungibleToken("reserve");
		token.mint("reserve", 10_000);
	});

	it("transfers out of the reserve", async () => {
		await expect(token.transfer("alice", 1_000)).resolves.toBe(true);
		expect(token.balanceOf("alice")).toBe(1_000);
		expect(token.balanceOf("reserve")).toBe(9_000);
	});

	it("moves value between accounts", async () => {
		token.mint("alice", 500);
		await expect(token.transferFrom("alice", "reserve", 300)).resolves.toBe(true);
		expect(token.balanceOf("alice")).toBe(200);
		expect(token.balanceOf("reserve")).toBe(10_300);
	});

	it("refuses transfers beyond the balance without changing anything", async () => {
		await expect(token.transferFrom("alice", "reserve", 1)).resolves.toBe(false);
		await expect(token.transfer("alice", 10_001)).resolves.toBe(false);
		expect(token.balanceOf("reserve")).toBe(10_000);
		expect(token.totalSupply()).toBe(10_000);
	});

	it("refuses non-positive and fractional amounts", async () => {
		await expect(token.transfer("alice", 0)).resolves.toBe(false);
		await expect(token.transfer("alice", -5)).resolves.toBe(false);
		await expect(token.transfer("alice", 1.5)).resolves.toBe(false);
		expect(() => token.mint("alice", 0)).toThrow(RangeError);
	});
});

describe("MemoryAssetRegistry", () => {
	let assets: MemoryAssetRegistry;

	beforeEach(() => {
		assets = new MemoryAssetRegistry();
		assets.mint("punks", "7", "alice");
	});

	it("transfers a token its owner holds", async () => {
		await assets.transferFrom("punks", "alice", "vault", "7");
		expect(await assets.ownerOf("punks", "7")).toBe("vault");
	});

	it("rejects a transfer by someone other than the owner", async () => {
		await expect(
			assets.transferFrom("punks", "bob", "vault", "7"),
		).rejects.toMatchObject({ name: "ProtocolError", code: "NOT_OWNER" });
		expect(await assets.ownerOf("punks", "7")).toBe("alice");
	});

	it("rejects an unknown token", async () => {
		await expect(
			assets.transferFrom("punks", "alice", "vault", "8"),
		).rejects.toBeInstanceOf(ProtocolError);
		expect(await assets.ownerOf("punks", "8")).toBeNull();
	});

	it("refuses to mint a token twice", () => {
		expect(() => assets.mint("punks", "7", "bob")).toThrow(
			"Token punks#7 already exists",
		);
	});
});

describe("MemoryScoreOracle", () => {
	const clock = () => 42_000;

	it("returns the latest published reading", async () => {
		const oracle = new MemoryScoreOracle(clock);
		oracle.publish("alice", 650);
		oracle.publish("bob", 580);
		oracle.publish("alice", 700);

		expect(await oracle.latestReading("alice")).toEqual({
			roundId: 3,
			answer: 700,
			startedAt: 42_000,
			updatedAt: 42_000,
			answeredInRound: 3,
		});
		expect((await oracle.latestReading("bob")).answer).toBe(580);
	});

	it("fails for a subject without a reading", async () => {
		const oracle = new MemoryScoreOracle(clock);
		await expect(oracle.latestReading("carol")).rejects.toMatchObject({
			code: "NO_READING",
		});
	});

	it("answers with the fallback score when configured", async () => {
		const oracle = new MemoryScoreOracle(clock, 610);
		expect((await oracle.latestReading("carol")).answer).toBe(610);
	});
});
