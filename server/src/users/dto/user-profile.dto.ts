import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";

export class EligibilityDto {
	@ApiProperty()
	eligible!: boolean;

	@ApiProperty()
	verified!: boolean;

	@ApiPropertyOptional({
		description: "Score read from the oracle; absent for unverified users",
		example: 720,
	})
	score?: number;

	@ApiPropertyOptional({
		enum: ["unverified", "score-too-low", "score-unavailable"],
	})
	reason?: "unverified" | "score-too-low" | "score-unavailable";
}

export class UserProfileDto {
	@ApiProperty({ example: "alice" })
	principal!: string;

	@ApiProperty()
	verified!: boolean;

	@ApiProperty({ type: EligibilityDto })
	eligibility!: EligibilityDto;
}
