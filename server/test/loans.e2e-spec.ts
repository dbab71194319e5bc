import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { ADMIN, createTestApp, requestLoanBody, TestApp, verifyUser } from "./utils";

describe("Loan lifecycle from request to repayment", () => {
	let ctx: TestApp;
	let app: INestApplication;
	let adminJwt: string;
	let aliceJwt: string;
	let bobJwt: string;

	beforeAll(async () => {
		ctx = await createTestApp();
		app = ctx.app;
		adminJwt = await ctx.jwtFor(ADMIN);
		aliceJwt = await ctx.jwtFor("alice");
		bobJwt = await ctx.jwtFor("bob");
		ctx.assets.mint("punks", "7", "alice");
		ctx.oracle.publish("alice", 700);
	});

	afterAll(async () => {
		await app.close();
	});

	it("reports health without auth", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body.status).toBe("ok");
		expect(res.body.database).toBe("up");
	});

	it("rejects requests without a bearer token", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/loans")
			.send(requestLoanBody)
			.expect(401);
		expect(res.body.message).toBe("Missing bearer token");
	});

	it("rejects a forged token", async () => {
		await request(app.getHttpServer())
			.get("/api/v1/users/me")
			.set("Authorization", "Bearer not-a-jwt")
			.expect(401);
	});

	it("validates the request body", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/loans")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.send({ ...requestLoanBody, amount: -5 })
			.expect(400);
		expect(res.body.message).toEqual(["amount must not be less than 1"]);
	});

	it("refuses an unverified borrower", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/loans")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.send(requestLoanBody)
			.expect(422);
		expect(res.body).toEqual({
			statusCode: 422,
			message: "User alice is not eligible to borrow (unverified)",
			error: "Unprocessable Entity",
			code: "PRECONDITION_FAILED",
		});
		expect(await ctx.assets.ownerOf("punks", "7")).toBe("alice");
	});

	it("walks a loan from request to repayment", async () => {
		await verifyUser(app, adminJwt, "alice");

		const me = await request(app.getHttpServer())
			.get("/api/v1/users/me")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(200);
		expect(me.body.data).toEqual({
			principal: "alice",
			verified: true,
			eligibility: { eligible: true, verified: true, score: 700 },
		});

		const created = await request(app.getHttpServer())
			.post("/api/v1/loans")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.send(requestLoanBody)
			.expect(201);
		expect(created.body.data).toMatchObject({
			id: 1,
			borrower: "alice",
			amount: 1000,
			interestRate: 5,
			durationMs: 60_000,
			status: "requested",
			totalRepayment: 1050,
		});
		expect(await ctx.assets.ownerOf("punks", "7")).toBe("vault");

		await request(app.getHttpServer())
			.post("/api/admin/v1/loans/1/approve")
			.set("Authorization", `Bearer ${bobJwt}`)
			.expect(403);

		const approved = await request(app.getHttpServer())
			.post("/api/admin/v1/loans/1/approve")
			.set("Authorization", `Bearer ${adminJwt}`)
			.expect(200);
		expect(typeof approved.body.data.approvedAt).toBe("number");
		expect(ctx.token.balanceOf("alice")).toBe(1000);

		const again = await request(app.getHttpServer())
			.post("/api/admin/v1/loans/1/approve")
			.set("Authorization", `Bearer ${adminJwt}`)
			.expect(422);
		expect(again.body.message).toBe("Loan principal was already disbursed");

		const quote = await request(app.getHttpServer())
			.get("/api/v1/loans/1/quote")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(200);
		expect(quote.body.data).toMatchObject({
			loanId: 1,
			principal: 1000,
			interest: 50,
			totalRepayment: 1050,
			overdue: false,
		});

		const notBorrower = await request(app.getHttpServer())
			.post("/api/v1/loans/1/repay")
			.set("Authorization", `Bearer ${bobJwt}`)
			.expect(403);
		expect(notBorrower.body.code).toBe("UNAUTHORIZED");

		const short = await request(app.getHttpServer())
			.post("/api/v1/loans/1/repay")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(422);
		expect(short.body.message).toBe(
			"Could not collect repayment of 1050 for loan 1",
		);
		expect(ctx.token.balanceOf("alice")).toBe(1000);
		expect(await ctx.assets.ownerOf("punks", "7")).toBe("vault");

		ctx.token.mint("alice", 50);
		const repaid = await request(app.getHttpServer())
			.post("/api/v1/loans/1/repay")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(200);
		expect(repaid.body.data.status).toBe("repaid");
		expect(ctx.token.balanceOf("alice")).toBe(0);
		expect(ctx.token.balanceOf("reserve")).toBe(1_000_050);
		expect(await ctx.assets.ownerOf("punks", "7")).toBe("alice");

		const twice = await request(app.getHttpServer())
			.post("/api/v1/loans/1/repay")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(409);
		expect(twice.body.code).toBe("ALREADY_FINALIZED");

		await request(app.getHttpServer())
			.post("/api/v1/loans/1/check-default")
			.set("Authorization", `Bearer ${bobJwt}`)
			.expect(409);
	});

	it("lists only the caller's loans", async () => {
		const mine = await request(app.getHttpServer())
			.get("/api/v1/loans")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(200);
		expect(mine.body.data.map((l: { id: number }) => l.id)).toEqual([1]);
		expect(mine.body.meta).toEqual({ total: 1 });

		const theirs = await request(app.getHttpServer())
			.get("/api/v1/loans")
			.set("Authorization", `Bearer ${bobJwt}`)
			.expect(200);
		expect(theirs.body.data).toEqual([]);
	});

	it("hides a loan from other users and reports unknown ids", async () => {
		await request(app.getHttpServer())
			.get("/api/v1/loans/1")
			.set("Authorization", `Bearer ${bobJwt}`)
			.expect(403);

		const missing = await request(app.getHttpServer())
			.get("/api/v1/loans/999")
			.set("Authorization", `Bearer ${aliceJwt}`)
			.expect(404);
		expect(missing.body.message).toBe("Loan 999 not found");
	});
});
