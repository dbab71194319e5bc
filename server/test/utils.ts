import request from "supertest";
import { Test, type TestingModule } from "@nestjs/testing";
import { type INestApplication, ValidationPipe } from "@nestjs/common";
import type {
	MemoryAssetRegistry,
	MemoryFungibleToken,
	MemoryScoreOracle,
	Principal,
} from "@pledgebook/sdk";
import { AppModule } from "../src/app.module";
import { AuthService } from "../src/auth/auth.service";
import { HttpExceptionFilter } from "../src/common/filters/http-exception.filter";
import {
	FUNGIBLE_TOKEN,
	NFT_ASSETS,
	SCORE_ORACLE,
} from "../src/chain/chain.constants";

export const ADMIN = "admin";

export type TestApp = {
	app: INestApplication;
	token: MemoryFungibleToken;
	assets: MemoryAssetRegistry;
	oracle: MemoryScoreOracle;
	jwtFor(principal: Principal): Promise<string>;
};

/**
 * Boots the whole application on an in-memory database with the in-process
 * token, asset registry and score feed.
 */
export async function createTestApp(): Promise<TestApp> {
	process.env.NODE_ENV = "test";
	process.env.JWT_SECRET = "test-secret";
	process.env.ADMIN_PRINCIPAL = ADMIN;
	process.env.RESERVE_INITIAL_BALANCE = "1000000";

	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = moduleFixture.createNestApplication();
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	await app.init();

	const auth = app.get(AuthService);
	return {
		app,
		token: app.get<MemoryFungibleToken>(FUNGIBLE_TOKEN),
		assets: app.get<MemoryAssetRegistry>(NFT_ASSETS),
		oracle: app.get<MemoryScoreOracle>(SCORE_ORACLE),
		jwtFor: (principal) => auth.signToken(principal),
	};
}

export async function verifyUser(
	app: INestApplication,
	adminJwt: string,
	principal: Principal,
	verified = true,
) {
	await request(app.getHttpServer())
		.post(`/api/admin/v1/users/${principal}/verification`)
		.set("Authorization", `Bearer ${adminJwt}`)
		.send({ verified })
		.expect(200);
}

export const requestLoanBody = {
	amount: 1000,
	durationSeconds: 60,
	collateral: { asset: "punks", tokenId: "7" },
};
