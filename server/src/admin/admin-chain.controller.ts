import {
	Body,
	Controller,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { AdminGuard } from "../auth/admin.guard";
import { ChainService } from "../chain/chain.service";
import {
	CreditBalanceInDto,
	CreditBalanceOutDto,
	MintAssetInDto,
	MintAssetOutDto,
	PublishScoreInDto,
	PublishScoreOutDto,
} from "../chain/dto/chain-seed.dto";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";

/**
 * Seeding of the in-process chain: assets, balances and scores.
 */
@ApiTags("Admin")
@ApiBearerAuth()
@ApiExtraModels(
	ApiEnvelopeShellDto,
	MintAssetOutDto,
	CreditBalanceOutDto,
	PublishScoreOutDto,
)
@ApiForbiddenResponse({ description: "Administrator only" })
@UseGuards(AuthGuard, AdminGuard)
@Controller("api/admin/v1/chain")
export class AdminChainController {
	constructor(private readonly chainService: ChainService) {}

	@Post("assets")
	@ApiOperation({ summary: "Mint a non-fungible asset to an owner" })
	@ApiBody({ type: MintAssetInDto })
	@ApiCreatedResponse({
		description: "Asset minted",
		schema: getSchemaPathForDto(MintAssetOutDto),
	})
	@ApiConflictResponse({ description: "Asset already exists" })
	mintAsset(@Body() dto: MintAssetInDto): ApiEnvelope<MintAssetOutDto> {
		return envelope(
			this.chainService.mintAsset(dto.asset, dto.tokenId, dto.owner),
		);
	}

	@Post("balances")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Credit fungible tokens to an account" })
	@ApiBody({ type: CreditBalanceInDto })
	@ApiOkResponse({
		description: "Balance after the credit",
		schema: getSchemaPathForDto(CreditBalanceOutDto),
	})
	credit(@Body() dto: CreditBalanceInDto): ApiEnvelope<CreditBalanceOutDto> {
		return envelope(this.chainService.credit(dto.account, dto.amount));
	}

	@Post("scores/:subject")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Publish a credit score, opening an oracle round" })
	@ApiParam({ name: "subject", description: "Scored principal" })
	@ApiBody({ type: PublishScoreInDto })
	@ApiOkResponse({
		description: "Score published",
		schema: getSchemaPathForDto(PublishScoreOutDto),
	})
	publishScore(
		@Param("subject") subject: string,
		@Body() dto: PublishScoreInDto,
	): ApiEnvelope<PublishScoreOutDto> {
		return envelope(this.chainService.publishScore(subject, dto.score));
	}
}
