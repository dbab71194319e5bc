import { ForbiddenException } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	CollateralVault,
	CreditGate,
	LoanStateMachine,
	MemoryAssetRegistry,
	MemoryFungibleToken,
	MemoryLedgerStore,
	MemoryScoreOracle,
} from "@pledgebook/sdk";
import { LoansService } from "./loans.service";
import { LOAN_LEDGER } from "./loans.constants";
import {
	COLLATERAL_LIQUIDATED_ID,
	LOAN_DEFAULTED_ID,
	LOAN_REQUESTED_ID,
} from "../common/loan.event";
import { emptyCursor } from "../common/dto/envelopes";

const PUNK_7 = { asset: "punks", tokenId: "7" };
const PUNK_8 = { asset: "punks", tokenId: "8" };

describe("LoansService", () => {
	let now: number;
	let store: MemoryLedgerStore;
	let token: MemoryFungibleToken;
	let assets: MemoryAssetRegistry;
	let oracle: MemoryScoreOracle;
	let vault: CollateralVault;
	let ledger: LoanStateMachine;
	let emitter: { emit: jest.Mock };
	let moduleRef: TestingModule;
	let service: LoansService;

	function buildLedger(custody: CollateralVault) {
		return new LoanStateMachine({
			store,
			vault: custody,
			gate: new CreditGate(oracle),
			token,
			reserve: "reserve",
			admin: "admin",
			clock: () => now,
		});
	}

	async function compile(target: LoanStateMachine) {
		moduleRef = await Test.createTestingModule({
			providers: [LoansService, { provide: LOAN_LEDGER, useValue: target }],
		})
			.useMocker((injected) => {
				if (injected === EventEmitter2) {
					return emitter;
				}
			})
			.compile();
		await moduleRef.init();
		service = moduleRef.get(LoansService);
	}

	beforeEach(async () => {
		now = 1_000_000;
		store = new MemoryLedgerStore();
		token = new MemoryFungibleToken("reserve");
		token.mint("reserve", 1_000_000);
		assets = new MemoryAssetRegistry();
		assets.mint("punks", "7", "alice");
		assets.mint("punks", "8", "alice");
		oracle = new MemoryScoreOracle(() => now);
		oracle.publish("alice", 700);
		vault = new CollateralVault(assets, "vault");
		ledger = buildLedger(vault);
		await ledger.verifyUser("admin", "alice", true);
		emitter = { emit: jest.fn() };

		await compile(ledger);
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	describe("request", () => {
		it("converts the duration to milliseconds and returns the loan", async () => {
			const loan = await service.request("alice", {
				amount: 1000,
				durationSeconds: 60,
				collateral: PUNK_7,
			});

			expect(loan).toEqual({
				id: 1,
				borrower: "alice",
				amount: 1000,
				interestRate: 5,
				durationMs: 60_000,
				collateral: PUNK_7,
				status: "requested",
				totalRepayment: 1050,
				issuedAt: 1_000_000,
				dueAt: 1_060_000,
			});
		});

		it("re-emits the committed event", async () => {
			await service.request("alice", {
				amount: 1000,
				durationSeconds: 60,
				collateral: PUNK_7,
			});

			expect(emitter.emit).toHaveBeenCalledTimes(1);
			expect(emitter.emit).toHaveBeenCalledWith(LOAN_REQUESTED_ID, {
				eventId: expect.any(String),
				loanId: 1,
				borrower: "alice",
				amount: 1000,
				emittedAt: expect.any(String),
			});
		});
	});

	it("emits the default before the liquidation", async () => {
		await service.request("alice", {
			amount: 1000,
			durationSeconds: 60,
			collateral: PUNK_7,
		});
		emitter.emit.mockClear();
		now += 60_001;

		const loan = await service.checkDefault("bob", 1);

		expect(loan.status).toBe("defaulted");
		expect(loan.defaultedAt).toBe(1_060_001);
		expect(emitter.emit.mock.calls.map(([name]) => name)).toEqual([
			LOAN_DEFAULTED_ID,
			COLLATERAL_LIQUIDATED_ID,
		]);
		expect(await assets.ownerOf("punks", "7")).toBe("admin");
	});

	describe("visibility", () => {
		beforeEach(async () => {
			await service.request("alice", {
				amount: 1000,
				durationSeconds: 60,
				collateral: PUNK_7,
			});
		});

		it("shows a loan to its borrower and the administrator", async () => {
			await expect(service.getForCaller(1, "alice")).resolves.toMatchObject({
				id: 1,
			});
			await expect(service.getForCaller(1, "admin")).resolves.toMatchObject({
				id: 1,
			});
		});

		it("hides a loan from anyone else", async () => {
			await expect(service.getForCaller(1, "mallory")).rejects.toBeInstanceOf(
				ForbiddenException,
			);
			await expect(service.quoteForCaller(1, "mallory")).rejects.toBeInstanceOf(
				ForbiddenException,
			);
		});

		it("quotes what the borrower owes", async () => {
			await expect(service.quoteForCaller(1, "alice")).resolves.toEqual({
				loanId: 1,
				principal: 1000,
				interest: 50,
				totalRepayment: 1050,
				dueAt: 1_060_000,
				overdue: false,
			});
		});
	});

	it("pages a borrower's loans newest first", async () => {
		await service.request("alice", {
			amount: 1000,
			durationSeconds: 60,
			collateral: PUNK_7,
		});
		await service.request("alice", {
			amount: 2000,
			durationSeconds: 60,
			collateral: PUNK_8,
		});

		const first = await service.getByBorrower("alice", 1, emptyCursor);
		expect(first.items.map((l) => l.id)).toEqual([2]);
		expect(first.total).toBe(2);
		expect(first.nextCursor).toBe(Buffer.from("1").toString("base64"));

		const second = await service.getByBorrower("alice", 1, { offset: 1 });
		expect(second.items.map((l) => l.id)).toEqual([1]);
		expect(second.nextCursor).toBeUndefined();

		const none = await service.getByBorrower("bob", 10, emptyCursor);
		expect(none).toEqual({ items: [], total: 0, nextCursor: undefined });
	});

	it("counts loans per status", async () => {
		token.mint("alice", 50);
		await service.request("alice", {
			amount: 1000,
			durationSeconds: 60,
			collateral: PUNK_7,
		});
		await service.request("alice", {
			amount: 1000,
			durationSeconds: 60,
			collateral: PUNK_8,
		});
		await service.approve("admin", 1);
		await service.repay("alice", 1);

		await expect(service.stats()).resolves.toEqual({
			requested: 1,
			repaid: 1,
			defaulted: 0,
			total: 2,
		});
	});

	it("restores custody of open loans on startup", async () => {
		await service.request("alice", {
			amount: 1000,
			durationSeconds: 60,
			collateral: PUNK_7,
		});
		await moduleRef.close();

		const freshVault = new CollateralVault(assets, "vault");
		await compile(buildLedger(freshVault));

		expect(freshVault.isLocked(PUNK_7)).toBe(true);
		await service.approve("admin", 1);
		token.mint("alice", 50);
		await service.repay("alice", 1);
		expect(await assets.ownerOf("punks", "7")).toBe("alice");
	});

	it("refuses to start when an open loan's collateral is gone", async () => {
		await service.request("alice", {
			amount: 1000,
			durationSeconds: 60,
			collateral: PUNK_7,
		});
		await moduleRef.close();

		const emptyVault = new CollateralVault(new MemoryAssetRegistry(), "vault");
		await expect(compile(buildLedger(emptyVault))).rejects.toThrow(
			"Collateral not held for open loan(s): 1",
		);

		await compile(ledger);
	});

	it("stops re-emitting once the module is destroyed", async () => {
		service.onModuleDestroy();

		await ledger.request("alice", {
			amount: 1000,
			durationMs: 60_000,
			collateral: PUNK_7,
		});

		expect(emitter.emit).not.toHaveBeenCalled();
	});
});
