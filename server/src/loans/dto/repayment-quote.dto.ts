import { ApiProperty } from "@nestjs/swagger";

export class RepaymentQuoteDto {
	@ApiProperty({ example: 1 })
	loanId!: number;

	@ApiProperty({ example: 1000 })
	principal!: number;

	@ApiProperty({ example: 50 })
	interest!: number;

	@ApiProperty({ example: 1050 })
	totalRepayment!: number;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	dueAt!: number;

	@ApiProperty({ description: "Whether the loan can be defaulted now" })
	overdue!: boolean;
}
