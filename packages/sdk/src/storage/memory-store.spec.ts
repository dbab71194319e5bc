import { isLedgerError } from "../core/types.js";
import type { NewLoan } from "../modules/lending/types.js";
import { MemoryLedgerStore } from "./memory-store.js";

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

describe("MemoryLedgerStore", () => {
	let store: MemoryLedgerStore;

	beforeEach(() => {
		store = new MemoryLedgerStore();
	});

	describe("create", () => {
		it("assigns ids from 1 and stores the loan as requested", async () => {
			const first = await store.create(draft());
			const second = await store.create(draft({ borrower: "bob" }));

			expect(first.id).toBe(1);
			expect(second.id).toBe(2);
			expect(first).toEqual({
				id: 1,
				borrower: "alice",
				amount: 1000,
				interestRate: 5,
				durationMs: 60_000,
				collateral: { asset: "punks", tokenId: "7" },
				issuedAt: 1_000,
				status: "requested",
			});
			expect(store.size()).toBe(2);
		});

		it("assigns distinct ids to concurrent creations", async () => {
			const loans = await Promise.all(
				Array.from({ length: 10 }, (_, i) =>
					store.create(draft({ collateral: { asset: "punks", tokenId: `${i}` } })),
				),
			);
			const ids = loans.map((l) => l.id).sort((a, b) => a - b);
			expect(ids).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
		});
	});

	describe("get", () => {
		it("fails NOT_FOUND for an id never assigned", async () => {
			await expect(store.get(1)).rejects.toMatchObject({
				code: "NOT_FOUND",
				message: "Loan 1 not found",
			});
			await expect(store.get(0)).rejects.toMatchObject({ code: "NOT_FOUND" });
			await expect(store.find(1)).resolves.toBeNull();
		});

		it("returns copies that do not alias the stored record", async () => {
			const created = await store.create(draft());
			created.collateral.tokenId = "changed";

			const loaded = await store.get(created.id);
			expect(loaded.collateral.tokenId).toBe("7");
		});
	});

	describe("status transitions", () => {
		it("marks a loan repaid and then refuses further transitions", async () => {
			const loan = await store.create(draft());
			const repaid = await store.markRepaid(loan.id, 5_000);

			expect(repaid.status).toBe("repaid");
			expect(repaid).toMatchObject({ repaidAt: 5_000 });

			await expect(store.markDefaulted(loan.id, 6_000)).rejects.toMatchObject({
				code: "ALREADY_FINALIZED",
			});
			await expect(store.markRepaid(loan.id, 6_000)).rejects.toMatchObject({
				code: "ALREADY_FINALIZED",
			});
		});

		it("marks a loan defaulted", async () => {
			const loan = await store.create(draft());
			const defaulted = await store.markDefaulted(loan.id, 70_000);
			expect(defaulted).toMatchObject({
				status: "defaulted",
				defaultedAt: 70_000,
			});
		});

		it("records an approval once", async () => {
			const loan = await store.create(draft());
			const approved = await store.markApproved(loan.id, 2_000);

			expect(approved.status).toBe("requested");
			expect(approved.approvedAt).toBe(2_000);
			await expect(store.markApproved(loan.id, 3_000)).rejects.toMatchObject({
				code: "PRECONDITION_FAILED",
			});
		});

		it("fails NOT_FOUND when marking an unknown loan", async () => {
			await expect(store.markRepaid(9, 1)).rejects.toMatchObject({
				code: "NOT_FOUND",
			});
		});
	});

	describe("verification flags", () => {
		it("defaults to unverified and stores the flag", async () => {
			expect(await store.isVerified("alice")).toBe(false);

			await store.setVerified("alice", true);
			expect(await store.isVerified("alice")).toBe(true);

			await store.setVerified("alice", false);
			expect(await store.isVerified("alice")).toBe(false);
		});
	});

	describe("withTransaction", () => {
		it("commits every mutation when the function resolves", async () => {
			const id = await store.withTransaction(async (tx) => {
				const loan = await tx.create(draft());
				await tx.setVerified("alice", true);
				return loan.id;
			});

			expect(id).toBe(1);
			expect(await store.isVerified("alice")).toBe(true);
			expect((await store.get(1)).status).toBe("requested");
		});

		it("discards every mutation when the function throws", async () => {
			await store.create(draft());

			await expect(
				store.withTransaction(async (tx) => {
					await tx.markRepaid(1, 2_000);
					await tx.create(draft({ borrower: "bob" }));
					await tx.setVerified("bob", true);
					throw new Error("transfer refused");
				}),
			).rejects.toThrow("transfer refused");

			expect((await store.get(1)).status).toBe("requested");
			expect(await store.find(2)).toBeNull();
			expect(await store.isVerified("bob")).toBe(false);

			// The discarded id is handed out again
			const next = await store.create(draft({ borrower: "carol" }));
			expect(next.id).toBe(2);
		});

		it("lets only one of two competing transitions succeed", async () => {
			await store.create(draft());

			const results = await Promise.allSettled([
				store.withTransaction(async (tx) => tx.markRepaid(1, 2_000)),
				store.withTransaction(async (tx) => tx.markDefaulted(1, 2_000)),
			]);

			expect(results[0].status).toBe("fulfilled");
			expect(results[1].status).toBe("rejected");
			if (results[1].status === "rejected") {
				expect(isLedgerError(results[1].reason, "ALREADY_FINALIZED")).toBe(true);
			}
			expect((await store.get(1)).status).toBe("repaid");
		});
	});

	describe("list", () => {
		beforeEach(async () => {
			await store.create(draft({ borrower: "alice" }));
			await store.create(draft({ borrower: "bob" }));
			await store.create(draft({ borrower: "alice" }));
			await store.markRepaid(1, 2_000);
		});

		it("returns every loan newest first by default", async () => {
			const result = await store.list();
			expect(result.items.map((l) => l.id)).toEqual([3, 2, 1]);
			expect(result.total).toBe(3);
			expect(result.hasMore).toBe(false);
		});

		it("filters by borrower and status", async () => {
			const mine = await store.list({ borrower: "alice", sortOrder: "asc" });
			expect(mine.items.map((l) => l.id)).toEqual([1, 3]);

			const open = await store.list({ status: "requested" });
			expect(open.items.map((l) => l.id)).toEqual([3, 2]);

			const either = await store.list({ status: ["repaid", "defaulted"] });
			expect(either.items.map((l) => l.id)).toEqual([1]);
		});

		it("paginates", async () => {
			const page = await store.list({ limit: 2, offset: 1 });
			expect(page.items.map((l) => l.id)).toEqual([2, 1]);
			expect(page.total).toBe(3);
			expect(page.hasMore).toBe(false);

			const first = await store.list({ limit: 1 });
			expect(first.hasMore).toBe(true);
		});

		it("counts loans per status", async () => {
			expect(await store.countByStatus()).toEqual({
				requested: 2,
				repaid: 1,
				defaulted: 0,
			});
		});
	});
});
