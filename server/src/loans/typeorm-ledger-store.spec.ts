import { DataSource } from "typeorm";
import type { NewLoan } from "@pledgebook/sdk";
import { LoanEntity } from "./loan.entity";
import { UserProfileEntity } from "./user-profile.entity";
import { TypeOrmLedgerStore, toLoan } from "./typeorm-ledger-store";

function draft(overrides: Partial<NewLoan> = {}): NewLoan {
	return {
		borrower: "alice",
		amount: 1000,
		interestRate: 5,
		durationMs: 60_000,
		collateral: { asset: "punks", tokenId: "7" },
		issuedAt: 1_000,
		...overrides,
	};
}

describe("TypeOrmLedgerStore", () => {
	let dataSource: DataSource;
	let store: TypeOrmLedgerStore;

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [LoanEntity, UserProfileEntity],
			synchronize: true,
		});
		await dataSource.initialize();
		store = new TypeOrmLedgerStore(dataSource);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	describe("create and get", () => {
		it("assigns ids from 1 and reads the loan back", async () => {
			const first = await store.create(draft());
			const second = await store.create(draft({ borrower: "bob" }));

			expect(first.id).toBe(1);
			expect(second.id).toBe(2);
			await expect(store.get(1)).resolves.toEqual({
				id: 1,
				borrower: "alice",
				amount: 1000,
				interestRate: 5,
				durationMs: 60_000,
				collateral: { asset: "punks", tokenId: "7" },
				issuedAt: 1_000,
				status: "requested",
			});
		});

		it("fails NOT_FOUND for 0 and for ids never assigned", async () => {
			await store.create(draft());

			await expect(store.get(0)).rejects.toMatchObject({ code: "NOT_FOUND" });
			await expect(store.get(2)).rejects.toMatchObject({
				code: "NOT_FOUND",
				message: "Loan 2 not found",
			});
			await expect(store.find(2)).resolves.toBeNull();
		});
	});

	describe("transitions", () => {
		beforeEach(async () => {
			await store.create(draft());
		});

		it("records the approval once", async () => {
			const approved = await store.markApproved(1, 2_000);
			expect(approved.approvedAt).toBe(2_000);
			expect((await store.get(1)).approvedAt).toBe(2_000);

			await expect(store.markApproved(1, 3_000)).rejects.toMatchObject({
				code: "PRECONDITION_FAILED",
			});
		});

		it("settles a loan exactly once", async () => {
			await store.markApproved(1, 2_000);
			const repaid = await store.markRepaid(1, 5_000);

			expect(repaid).toMatchObject({
				status: "repaid",
				repaidAt: 5_000,
				approvedAt: 2_000,
			});
			await expect(store.get(1)).resolves.toMatchObject({
				status: "repaid",
				repaidAt: 5_000,
			});
			await expect(store.markDefaulted(1, 6_000)).rejects.toMatchObject({
				code: "ALREADY_FINALIZED",
				message: "Loan 1 is already repaid",
			});
			await expect(store.markApproved(1, 6_000)).rejects.toMatchObject({
				code: "ALREADY_FINALIZED",
			});
		});

		it("records a default", async () => {
			await store.markDefaulted(1, 70_000);
			await expect(store.get(1)).resolves.toMatchObject({
				status: "defaulted",
				defaultedAt: 70_000,
			});
		});
	});

	describe("withTransaction", () => {
		it("discards every write when the callback throws", async () => {
			await expect(
				store.withTransaction(async (tx) => {
					await tx.create(draft());
					await tx.setVerified("alice", true);
					throw new Error("abort");
				}),
			).rejects.toThrow("abort");

			expect((await store.list()).total).toBe(0);
			await expect(store.isVerified("alice")).resolves.toBe(false);
		});

		it("runs transactions one at a time", async () => {
			const order: string[] = [];
			const slow = store.withTransaction(async (tx) => {
				order.push("first:start");
				await new Promise((resolve) => setTimeout(resolve, 10));
				await tx.create(draft());
				order.push("first:end");
			});
			const fast = store.withTransaction(async (tx) => {
				order.push("second:start");
				await tx.create(draft({ borrower: "bob" }));
				order.push("second:end");
			});

			await Promise.all([slow, fast]);
			expect(order).toEqual([
				"first:start",
				"first:end",
				"second:start",
				"second:end",
			]);
		});
	});

	describe("queries", () => {
		beforeEach(async () => {
			await store.create(draft());
			await store.create(draft({ borrower: "bob" }));
			await store.create(draft());
			await store.markRepaid(1, 2_000);
		});

		it("filters by borrower and status", async () => {
			const alices = await store.list({ borrower: "alice" });
			expect(alices.items.map((l) => l.id)).toEqual([3, 1]);
			expect(alices.total).toBe(2);

			const open = await store.list({ status: "requested", sortOrder: "asc" });
			expect(open.items.map((l) => l.id)).toEqual([2, 3]);

			const either = await store.list({ status: ["repaid", "defaulted"] });
			expect(either.items.map((l) => l.id)).toEqual([1]);
		});

		it("pages with offset and limit", async () => {
			const page = await store.list({ limit: 2, offset: 1 });
			expect(page.items.map((l) => l.id)).toEqual([2, 1]);
			expect(page.total).toBe(3);
			expect(page.hasMore).toBe(false);

			const head = await store.list({ limit: 1 });
			expect(head.hasMore).toBe(true);
		});

		it("counts loans per status", async () => {
			await expect(store.countByStatus()).resolves.toEqual({
				requested: 2,
				repaid: 1,
				defaulted: 0,
			});
		});
	});

	describe("verification", () => {
		it("defaults to unverified and stores the flag", async () => {
			await expect(store.isVerified("alice")).resolves.toBe(false);

			await store.setVerified("alice", true);
			await expect(store.isVerified("alice")).resolves.toBe(true);

			await store.setVerified("alice", false);
			await expect(store.isVerified("alice")).resolves.toBe(false);
		});
	});
});

describe("toLoan", () => {
	function entity(overrides: Partial<LoanEntity> = {}): LoanEntity {
		const row = new LoanEntity();
		Object.assign(row, {
			id: 9,
			borrower: "alice",
			amount: 1000,
			interestRate: 5,
			durationMs: 60_000,
			collateralAsset: "punks",
			collateralTokenId: "7",
			issuedAt: 1_000,
			approvedAt: null,
			status: "requested",
			settledAt: null,
			...overrides,
		});
		return row;
	}

	it("omits a missing approval time", () => {
		expect(toLoan(entity())).not.toHaveProperty("approvedAt");
	});

	it("rejects a settled row without a settlement time", () => {
		expect(() => toLoan(entity({ status: "repaid" }))).toThrow(
			expect.objectContaining({ code: "CORRUPT_RECORD" }),
		);
	});
});
