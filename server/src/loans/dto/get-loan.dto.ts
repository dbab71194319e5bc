import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { LOAN_STATUSES, type LoanStatus } from "@pledgebook/sdk";
import { CollateralDto } from "./request-loan.dto";

export class GetLoanDto {
	@ApiProperty({ example: 1 })
	id!: number;

	@ApiProperty({ example: "alice" })
	borrower!: string;

	@ApiProperty({ example: 1000 })
	amount!: number;

	@ApiProperty({ example: 5, description: "Flat interest in percent" })
	interestRate!: number;

	@ApiProperty({ example: 86400000 })
	durationMs!: number;

	@ApiProperty({ type: CollateralDto })
	collateral!: CollateralDto;

	@ApiProperty({ enum: LOAN_STATUSES })
	status!: LoanStatus;

	@ApiProperty({ example: 1050, description: "Principal plus interest" })
	totalRepayment!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	issuedAt!: number;

	@ApiProperty({
		description: "After this instant the loan may be defaulted",
		example: 1732776634123,
	})
	dueAt!: number;

	@ApiPropertyOptional({ description: "When the principal was disbursed" })
	approvedAt?: number;

	@ApiPropertyOptional()
	repaidAt?: number;

	@ApiPropertyOptional()
	defaultedAt?: number;
}
