import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { LOAN_STATUSES, type LoanStatus, type Principal } from "@pledgebook/sdk";
import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import { ParseLoanStatusPipe } from "../common/pipes/loan-status.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { GetLoanDto } from "./dto/get-loan.dto";
import { RepaymentQuoteDto } from "./dto/repayment-quote.dto";
import { RequestLoanInDto } from "./dto/request-loan.dto";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "./loans.constants";
import { LoansService } from "./loans.service";

@ApiTags("1 - Loans")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	GetLoanDto,
	RepaymentQuoteDto,
)
@Controller("api/v1/loans")
export class LoansController {
	constructor(
		private readonly loansService: LoansService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary:
			"Request a loan, pledging an asset the caller owns. Requires a verified caller with a sufficient score",
	})
	@ApiBody({ type: RequestLoanInDto })
	@ApiCreatedResponse({
		description: "Loan opened, collateral in custody",
		schema: getSchemaPathForDto(GetLoanDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiUnprocessableEntityResponse({
		description: "Caller not eligible, or collateral cannot be locked",
	})
	async request(
		@Body() dto: RequestLoanInDto,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<GetLoanDto>> {
		return envelope(await this.loansService.request(caller, dto));
	}

	@Get("")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Get the caller's loans, newest first" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiQuery({ name: "status", required: false, enum: LOAN_STATUSES })
	@ApiOkResponse({
		description: "A page of the caller's loans",
		schema: getSchemaPathForPaginatedDto(GetLoanDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getMine(
		@Caller() caller: Principal,
		@Query("limit", new DefaultValuePipe(DEFAULT_PAGE_SIZE), ParseIntPipe)
		limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("status", ParseLoanStatusPipe) status?: LoanStatus,
	): Promise<ApiEnvelope<GetLoanDto[]>> {
		const { items, total, nextCursor } = await this.loansService.getByBorrower(
			caller,
			clampLimit(limit),
			cursor,
			status,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Sse("sse")
	@ApiOperation({
		summary: "Subscribe to loan events, optionally for one borrower",
	})
	@ApiQuery({ name: "borrower", required: false })
	sse(@Query("borrower") borrower?: string): Observable<SseEvent> {
		return this.sseService.loanEvents(borrower).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@Get(":id")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Get one loan (borrower or administrator)" })
	@ApiParam({ name: "id", description: "Loan id" })
	@ApiOkResponse({
		description: "The loan",
		schema: getSchemaPathForDto(GetLoanDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Not allowed to view this loan" })
	@ApiNotFoundResponse({ description: "Loan not found" })
	async getOne(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<GetLoanDto>> {
		return envelope(await this.loansService.getForCaller(id, caller));
	}

	@Get(":id/quote")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "What the borrower owes on a loan" })
	@ApiParam({ name: "id", description: "Loan id" })
	@ApiOkResponse({
		description: "Repayment quote",
		schema: getSchemaPathForDto(RepaymentQuoteDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Not allowed to view this loan" })
	@ApiNotFoundResponse({ description: "Loan not found" })
	async quote(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<RepaymentQuoteDto>> {
		return envelope(await this.loansService.quoteForCaller(id, caller));
	}

	@Post(":id/repay")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary:
			"Repay principal plus interest and take the collateral back. Only the borrower can do this",
	})
	@ApiParam({ name: "id", description: "Loan id" })
	@ApiOkResponse({
		description: "Loan repaid",
		schema: getSchemaPathForDto(GetLoanDto),
	})
	@ApiForbiddenResponse({ description: "Caller is not the borrower" })
	@ApiNotFoundResponse({ description: "Loan not found" })
	@ApiConflictResponse({ description: "Loan already repaid or defaulted" })
	@ApiUnprocessableEntityResponse({
		description: "Repayment could not be collected",
	})
	async repay(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<GetLoanDto>> {
		return envelope(await this.loansService.repay(caller, id));
	}

	@Post(":id/check-default")
	@HttpCode(200)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary:
			"Default an overdue loan and seize its collateral. Anyone can do this",
	})
	@ApiParam({ name: "id", description: "Loan id" })
	@ApiOkResponse({
		description: "Loan defaulted",
		schema: getSchemaPathForDto(GetLoanDto),
	})
	@ApiNotFoundResponse({ description: "Loan not found" })
	@ApiConflictResponse({ description: "Loan already repaid or defaulted" })
	@ApiUnprocessableEntityResponse({ description: "Loan is not yet due" })
	async checkDefault(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<GetLoanDto>> {
		return envelope(await this.loansService.checkDefault(caller, id));
	}
}

export function clampLimit(limit: number): number {
	return Math.min(Math.max(limit, 1), MAX_PAGE_SIZE);
}
