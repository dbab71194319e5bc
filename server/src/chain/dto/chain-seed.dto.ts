import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Max, Min } from "class-validator";

export class MintAssetInDto {
	@ApiProperty({ example: "punks", description: "Asset collection id" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({ example: "7" })
	@IsString()
	@IsNotEmpty()
	tokenId!: string;

	@ApiProperty({ example: "alice", description: "Initial owner" })
	@IsString()
	@IsNotEmpty()
	owner!: string;
}

export class MintAssetOutDto {
	@ApiProperty({ example: "punks" })
	asset!: string;

	@ApiProperty({ example: "7" })
	tokenId!: string;

	@ApiProperty({ example: "alice" })
	owner!: string;
}

export class CreditBalanceInDto {
	@ApiProperty({ example: "alice" })
	@IsString()
	@IsNotEmpty()
	account!: string;

	@ApiProperty({
		minimum: 1,
		example: 100,
		description: "Amount to credit, in the token's smallest unit",
	})
	@IsInt()
	@Min(1)
	@Max(Number.MAX_SAFE_INTEGER)
	amount!: number;
}

export class CreditBalanceOutDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: 1100, description: "Balance after the credit" })
	balance!: number;
}

export class PublishScoreInDto {
	@ApiProperty({ example: 700, description: "Credit score, signed" })
	@IsInt()
	score!: number;
}

export class PublishScoreOutDto {
	@ApiProperty({ example: "alice" })
	subject!: string;

	@ApiProperty({ example: 700 })
	score!: number;

	@ApiProperty({ example: 3, description: "Oracle round the score opened" })
	roundId!: number;
}
