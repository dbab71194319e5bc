import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
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
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { LOAN_STATUSES, type LoanStatus, type Principal } from "@pledgebook/sdk";
import { AuthGuard } from "../auth/auth.guard";
import { AdminGuard } from "../auth/admin.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	type ApiPaginatedEnvelope,
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
import { GetLoanDto } from "../loans/dto/get-loan.dto";
import { DEFAULT_PAGE_SIZE } from "../loans/loans.constants";
import { clampLimit } from "../loans/loans.controller";
import { LoansService } from "../loans/loans.service";
import { GetAdminStatsDto } from "./dto/get-admin-stats.dto";
import {
	SetVerificationInDto,
	SetVerificationOutDto,
} from "./dto/set-verification.dto";

@ApiTags("Admin")
@ApiBearerAuth()
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	GetLoanDto,
	GetAdminStatsDto,
	SetVerificationOutDto,
)
@ApiForbiddenResponse({ description: "Administrator only" })
@UseGuards(AuthGuard, AdminGuard)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly loansService: LoansService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("users/:principal/verification")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Set a user's verification flag" })
	@ApiParam({ name: "principal", description: "The user to (un)verify" })
	@ApiBody({ type: SetVerificationInDto })
	@ApiOkResponse({
		description: "Verification updated",
		schema: getSchemaPathForDto(SetVerificationOutDto),
	})
	async setVerification(
		@Param("principal") principal: string,
		@Body() dto: SetVerificationInDto,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<SetVerificationOutDto>> {
		await this.loansService.verifyUser(caller, principal, dto.verified);
		return envelope({ principal, verified: dto.verified });
	}

	@Post("loans/:id/approve")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({
		summary: "Approve a loan, disbursing its principal from the reserve",
	})
	@ApiParam({ name: "id", description: "Loan id" })
	@ApiOkResponse({
		description: "Loan approved",
		schema: getSchemaPathForDto(GetLoanDto),
	})
	@ApiNotFoundResponse({ description: "Loan not found" })
	@ApiConflictResponse({ description: "Loan already repaid or defaulted" })
	@ApiUnprocessableEntityResponse({
		description: "Loan already approved, or the reserve refused",
	})
	async approve(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: Principal,
	): Promise<ApiEnvelope<GetLoanDto>> {
		return envelope(await this.loansService.approve(caller, id));
	}

	@Get("loans")
	@ApiOperation({ summary: "List all loans paginated, newest first" })
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
		description: "A page of all loans",
		schema: getSchemaPathForPaginatedDto(GetLoanDto),
	})
	async allLoans(
		@Query("limit", new DefaultValuePipe(DEFAULT_PAGE_SIZE), ParseIntPipe)
		limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("status", ParseLoanStatusPipe) status?: LoanStatus,
	): Promise<ApiPaginatedEnvelope<GetLoanDto[]>> {
		const { items, nextCursor, total } = await this.loansService.getAll(
			clampLimit(limit),
			cursor,
			status,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get("stats")
	@ApiOperation({ summary: "Loan counts per status" })
	@ApiOkResponse({
		description: "Loan statistics",
		schema: getSchemaPathForDto(GetAdminStatsDto),
	})
	async stats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope(await this.loansService.stats());
	}

	@Sse("sse")
	@ApiOperation({ summary: "Subscribe to all loan events" })
	sse(): Observable<SseEvent> {
		return this.sseService.adminEvents.pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}
