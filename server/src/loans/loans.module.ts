import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import {
	CollateralVault,
	CreditGate,
	type FungibleToken,
	LoanStateMachine,
	type NonFungibleAssets,
	type ScoreOracle,
} from "@pledgebook/sdk";
import { AuthModule } from "../auth/auth.module";
import { ChainModule } from "../chain/chain.module";
import {
	DEFAULT_RESERVE_PRINCIPAL,
	DEFAULT_VAULT_PRINCIPAL,
	FUNGIBLE_TOKEN,
	NFT_ASSETS,
	SCORE_ORACLE,
} from "../chain/chain.constants";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { LoanEntity } from "./loan.entity";
import { UserProfileEntity } from "./user-profile.entity";
import { TypeOrmLedgerStore } from "./typeorm-ledger-store";
import { LOAN_LEDGER } from "./loans.constants";
import { LoansService } from "./loans.service";
import { LoansController } from "./loans.controller";
import { LoanEventsListener } from "./loan-events.listener";

@Module({
	imports: [
		TypeOrmModule.forFeature([LoanEntity, UserProfileEntity]),
		AuthModule,
		ChainModule,
	],
	providers: [
		TypeOrmLedgerStore,
		{
			provide: LOAN_LEDGER,
			inject: [
				ConfigService,
				TypeOrmLedgerStore,
				FUNGIBLE_TOKEN,
				NFT_ASSETS,
				SCORE_ORACLE,
			],
			useFactory: (
				cfg: ConfigService,
				store: TypeOrmLedgerStore,
				token: FungibleToken,
				assets: NonFungibleAssets,
				oracle: ScoreOracle,
			) => {
				const admin = cfg.get<string>("ADMIN_PRINCIPAL");
				if (!admin) {
					throw new Error("ADMIN_PRINCIPAL is not set");
				}
				const logger = new Logger(LoanStateMachine.name);
				return new LoanStateMachine({
					store,
					vault: new CollateralVault(
						assets,
						cfg.get<string>("VAULT_PRINCIPAL") ?? DEFAULT_VAULT_PRINCIPAL,
						{ logger: new Logger(CollateralVault.name) },
					),
					gate: new CreditGate(oracle, {
						logger: new Logger(CreditGate.name),
					}),
					token,
					reserve:
						cfg.get<string>("RESERVE_PRINCIPAL") ?? DEFAULT_RESERVE_PRINCIPAL,
					admin,
					liquidator: cfg.get<string>("LIQUIDATOR_PRINCIPAL") || undefined,
					logger,
				});
			},
		},
		LoansService,
		LoanEventsListener,
		ServerSentEventsService,
	],
	controllers: [LoansController],
	exports: [LoansService, ServerSentEventsService],
})
export class LoansModule {}
