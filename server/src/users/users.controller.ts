import { Controller, Get, UseGuards } from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import type { Principal } from "@pledgebook/sdk";
import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { LoansService } from "../loans/loans.service";
import { UserProfileDto } from "./dto/user-profile.dto";

@ApiTags("2 - Users")
@ApiExtraModels(ApiEnvelopeShellDto, UserProfileDto)
@Controller("api/v1/users")
export class UsersController {
	constructor(private readonly loansService: LoansService) {}

	@Get("me")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "The caller's verification flag and borrowing eligibility",
	})
	@ApiOkResponse({
		description: "The caller's profile",
		schema: getSchemaPathForDto(UserProfileDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async me(@Caller() caller: Principal): Promise<ApiEnvelope<UserProfileDto>> {
		return envelope(await this.loansService.profile(caller));
	}
}
