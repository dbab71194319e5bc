import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { Principal } from "@pledgebook/sdk";
import type { AuthenticatedRequest } from "./auth.constants";

/**
 * The principal `AuthGuard` resolved from the bearer token.
 */
export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): Principal => {
		const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!req.caller) {
			throw new UnauthorizedException("No authenticated caller");
		}
		return req.caller;
	},
);
