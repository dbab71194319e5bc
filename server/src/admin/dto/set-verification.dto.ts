import { ApiProperty } from "@nestjs/swagger";
import { IsBoolean } from "class-validator";

export class SetVerificationInDto {
	@ApiProperty({ example: true })
	@IsBoolean()
	verified!: boolean;
}

export class SetVerificationOutDto {
	@ApiProperty({ example: "alice" })
	principal!: string;

	@ApiProperty()
	verified!: boolean;
}
