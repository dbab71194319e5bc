import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	MemoryAssetRegistry,
	MemoryFungibleToken,
	MemoryScoreOracle,
} from "@pledgebook/sdk";
import {
	DEFAULT_RESERVE_PRINCIPAL,
	FUNGIBLE_TOKEN,
	NFT_ASSETS,
	SCORE_ORACLE,
} from "./chain.constants";
import { ChainService } from "./chain.service";

function optionalNumber(cfg: ConfigService, key: string): number | undefined {
	const raw = cfg.get<string>(key);
	if (raw === undefined || raw === "") return undefined;
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(`${key} must be a number, got ${raw}`);
	}
	return value;
}

/**
 * In-process token, asset registry and score feed. Balances, ownership
 * and scores live in memory and reset on restart; `ChainService` seeds them.
 */
@Module({
	providers: [
		{
			provide: FUNGIBLE_TOKEN,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const reserve =
					cfg.get<string>("RESERVE_PRINCIPAL") ?? DEFAULT_RESERVE_PRINCIPAL;
				const token = new MemoryFungibleToken(reserve);
				const initial = optionalNumber(cfg, "RESERVE_INITIAL_BALANCE");
				if (initial !== undefined && initial > 0) {
					token.mint(reserve, initial);
					Logger.log(`Reserve ${reserve} funded with ${initial}`, "ChainModule");
				}
				return token;
			},
		},
		{
			provide: NFT_ASSETS,
			useFactory: () => new MemoryAssetRegistry(),
		},
		{
			provide: SCORE_ORACLE,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) =>
				new MemoryScoreOracle(
					Date.now,
					optionalNumber(cfg, "ORACLE_FALLBACK_SCORE"),
				),
		},
		ChainService,
	],
	exports: [FUNGIBLE_TOKEN, NFT_ASSETS, SCORE_ORACLE, ChainService],
})
export class ChainModule {}
