import { ConflictException, Inject, Injectable, Logger } from "@nestjs/common";
import {
	type AssetId,
	MemoryAssetRegistry,
	MemoryFungibleToken,
	MemoryScoreOracle,
	type Principal,
	ProtocolError,
} from "@pledgebook/sdk";
import { FUNGIBLE_TOKEN, NFT_ASSETS, SCORE_ORACLE } from "./chain.constants";
import type {
	CreditBalanceOutDto,
	MintAssetOutDto,
	PublishScoreOutDto,
} from "./dto/chain-seed.dto";

/**
 * Seeds the in-process token, asset registry and score feed.
 */
@Injectable()
export class ChainService {
	private readonly logger = new Logger(ChainService.name);

	constructor(
		@Inject(FUNGIBLE_TOKEN) private readonly token: MemoryFungibleToken,
		@Inject(NFT_ASSETS) private readonly assets: MemoryAssetRegistry,
		@Inject(SCORE_ORACLE) private readonly oracle: MemoryScoreOracle,
	) {}

	mintAsset(asset: AssetId, tokenId: string, owner: Principal): MintAssetOutDto {
		try {
			this.assets.mint(asset, tokenId, owner);
		} catch (e) {
			if (e instanceof ProtocolError && e.code === "DUPLICATE_TOKEN") {
				throw new ConflictException(e.message);
			}
			throw e;
		}
		this.logger.log(`Minted ${asset}#${tokenId} to ${owner}`);
		return { asset, tokenId, owner };
	}

	credit(account: Principal, amount: number): CreditBalanceOutDto {
		this.token.mint(account, amount);
		const balance = this.token.balanceOf(account);
		this.logger.log(`Credited ${amount} to ${account}, balance ${balance}`);
		return { account, balance };
	}

	publishScore(subject: Principal, score: number): PublishScoreOutDto {
		const reading = this.oracle.publish(subject, score);
		this.logger.log(`Published score ${score} for ${subject}`);
		return { subject, score: reading.answer, roundId: reading.roundId };
	}
}
