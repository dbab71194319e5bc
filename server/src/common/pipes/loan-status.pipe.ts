import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { LOAN_STATUSES, type LoanStatus } from "@pledgebook/sdk";

function isLoanStatus(value: string): value is LoanStatus {
	return LOAN_STATUSES.some((status) => status === value);
}

@Injectable()
export class ParseLoanStatusPipe
	implements PipeTransform<string | undefined, LoanStatus | undefined>
{
	transform(value: string | undefined): LoanStatus | undefined {
		if (!value) {
			return undefined;
		}
		if (!isLoanStatus(value)) {
			throw new BadRequestException(
				`Invalid status ${value}, expected one of ${LOAN_STATUSES.join(", ")}`,
			);
		}
		return value;
	}
}
