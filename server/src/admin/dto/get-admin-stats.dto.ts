import { ApiProperty } from "@nestjs/swagger";

export class GetAdminStatsDto {
	@ApiProperty({ description: "All loans ever opened", example: 12 })
	total!: number;

	@ApiProperty({ description: "Open loans", example: 4 })
	requested!: number;

	@ApiProperty({ example: 7 })
	repaid!: number;

	@ApiProperty({ example: 1 })
	defaulted!: number;
}
