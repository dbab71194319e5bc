import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsInt,
	IsNotEmpty,
	IsString,
	Max,
	Min,
	ValidateNested,
} from "class-validator";

export class CollateralDto {
	@ApiProperty({ example: "punks", description: "Asset collection id" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({ example: "7", description: "Token id within the collection" })
	@IsString()
	@IsNotEmpty()
	tokenId!: string;
}

export class RequestLoanInDto {
	@ApiProperty({
		minimum: 1,
		example: 1000,
		description: "Principal, in the token's smallest unit",
	})
	@IsInt()
	@Min(1)
	@Max(Number.MAX_SAFE_INTEGER)
	amount!: number;

	@ApiProperty({
		minimum: 1,
		example: 86400,
		description: "Seconds until the loan may be defaulted",
	})
	@IsInt()
	@Min(1)
	durationSeconds!: number;

	@ApiProperty({ type: CollateralDto })
	@ValidateNested()
	@Type(() => CollateralDto)
	collateral!: CollateralDto;
}
